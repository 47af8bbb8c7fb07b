import { describe, expect, it } from 'vitest';
import { InvalidGridError } from './errors';
import { assignTargetPositions, createPieces, resetPieces, scatterPieces, sortByZOrder } from './pieces';
import { createPixelBuffer } from './pixelBuffer';
import { rectInside } from './geometry';
import { makePiece, sequence } from './testPieces';

const playArea = { x: 20, y: 20, width: 200, height: 100 };
const images = (count: number) => Array.from({ length: count }, () => createPixelBuffer(100, 50));

describe('createPieces', () => {
  it('creates one unscattered piece per cell in row-major order', () => {
    const pieces = createPieces(images(4), { rows: 2, cols: 2 }, playArea);

    expect(pieces.map(p => p.id)).toEqual([0, 1, 2, 3]);
    expect(pieces.map(p => p.homeCell)).toEqual([
      { row: 0, col: 0 },
      { row: 0, col: 1 },
      { row: 1, col: 0 },
      { row: 1, col: 1 },
    ]);
    expect(pieces.every(p => p.position === null && !p.isPlaced && !p.isDragging && p.zOrder === 0)).toBe(true);
  });

  it('assigns every target from the play area', () => {
    const pieces = createPieces(images(4), { rows: 2, cols: 2 }, playArea);
    expect(pieces.map(p => p.targetPosition)).toEqual([
      { x: 20, y: 20 },
      { x: 120, y: 20 },
      { x: 20, y: 70 },
      { x: 120, y: 70 },
    ]);
  });

  it('refuses an image count that does not match the grid', () => {
    expect(() => createPieces(images(3), { rows: 2, cols: 2 }, playArea)).toThrow(InvalidGridError);
  });
});

describe('assignTargetPositions', () => {
  it('moves targets without touching positions', () => {
    const pieces = createPieces(images(4), { rows: 2, cols: 2 }, playArea);
    pieces[3].position = { x: 5, y: 5 };

    assignTargetPositions(pieces, { x: 0, y: 0, width: 400, height: 200 }, { rows: 2, cols: 2 });

    expect(pieces[3].targetPosition).toEqual({ x: 200, y: 100 });
    expect(pieces[3].position).toEqual({ x: 5, y: 5 });
  });
});

describe('scatterPieces', () => {
  const staging = { x: 500, y: 40, width: 300, height: 200 };

  it('keeps every piece of a 2x2 grid inside the staging rect', () => {
    const pieces = createPieces(images(4), { rows: 2, cols: 2 }, playArea);
    for (const random of [() => 0, () => 0.999999, Math.random]) {
      scatterPieces(pieces, staging, random);
      for (const piece of pieces) {
        expect(piece.position).not.toBeNull();
        const { x, y } = piece.position ?? { x: NaN, y: NaN };
        expect(rectInside({ x, y, width: 100, height: 50 }, staging)).toBe(true);
      }
    }
  });

  it('maps the random source onto the free span', () => {
    const piece = makePiece({ size: 100 });
    // Free span is 200 x 100; floor(0.5 * 201) = 100, floor(0.25 * 101) = 25
    scatterPieces([piece], staging, sequence(0.5, 0.25));
    expect(piece.position).toEqual({ x: 600, y: 65 });
  });

  it('pins a piece larger than the rect to its corner', () => {
    const piece = makePiece({ size: 400 });
    scatterPieces([piece], staging, () => 0.7);
    expect(piece.position).toEqual({ x: 500, y: 40 });
  });
});

describe('resetPieces', () => {
  it('clears placement, dragging and zOrder', () => {
    const piece = makePiece({ isPlaced: true, zOrder: 7, position: { x: 1, y: 2 } });
    piece.isDragging = true;

    resetPieces([piece]);

    expect(piece).toMatchObject({ isPlaced: false, isDragging: false, zOrder: 0, position: { x: 1, y: 2 } });
  });
});

describe('sortByZOrder', () => {
  it('orders bottom first and keeps registry order on ties', () => {
    const pieces = [
      makePiece({ id: 0, zOrder: 3 }),
      makePiece({ id: 1, zOrder: 0 }),
      makePiece({ id: 2, zOrder: 3 }),
      makePiece({ id: 3, zOrder: 1 }),
    ];
    expect(sortByZOrder(pieces).map(p => p.id)).toEqual([1, 3, 0, 2]);
  });
});
