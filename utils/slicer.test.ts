import { describe, expect, it } from 'vitest';
import type { PixelBuffer } from '../types';
import { InvalidGridError } from './errors';
import { createPixelBuffer, getPixel } from './pixelBuffer';
import { computePieceSize, fitAndSlice, fitImage, splitImage } from './slicer';

// Each column gets red = column index, so crops can be traced back to the source.
const columnRamp = (width: number, height: number): PixelBuffer => {
  const buffer = createPixelBuffer(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      buffer.data.set([x * 10, 0, 0, 255], (y * width + x) * 4);
    }
  }
  return buffer;
};

const rowRamp = (width: number, height: number): PixelBuffer => {
  const buffer = createPixelBuffer(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      buffer.data.set([0, y * 10, 0, 255], (y * width + x) * 4);
    }
  }
  return buffer;
};

describe('computePieceSize', () => {
  it('floors each axis', () => {
    expect(computePieceSize({ width: 103, height: 61 }, { rows: 3, cols: 4 })).toEqual({ width: 25, height: 20 });
  });
});

describe('fitImage', () => {
  it('crops a relatively wider source left and right around the centre', () => {
    const fitted = fitImage(columnRamp(8, 2), { width: 2, height: 2 });
    expect(fitted.width).toBe(2);
    expect(fitted.height).toBe(2);
    // Trimmed (8 - 2) / 2 = 3 columns from the left
    expect(getPixel(fitted, 0, 0)).toEqual([30, 0, 0, 255]);
    expect(getPixel(fitted, 1, 1)).toEqual([40, 0, 0, 255]);
  });

  it('crops a relatively taller source top and bottom around the centre', () => {
    const fitted = fitImage(rowRamp(2, 8), { width: 2, height: 2 });
    expect(getPixel(fitted, 0, 0)).toEqual([0, 30, 0, 255]);
    expect(getPixel(fitted, 1, 1)).toEqual([0, 40, 0, 255]);
  });

  it('scales a uniform source to the exact target size', () => {
    const fitted = fitImage(createPixelBuffer(100, 50, [10, 20, 30, 255]), { width: 100, height: 60 });
    expect(fitted.width).toBe(100);
    expect(fitted.height).toBe(60);
    expect(getPixel(fitted, 99, 59)).toEqual([10, 20, 30, 255]);
  });
});

describe('splitImage', () => {
  it('emits pieces in row-major order', () => {
    const image = createPixelBuffer(4, 4);
    const colours: Array<[number, number, number, number]> = [
      [255, 0, 0, 255],
      [0, 255, 0, 255],
      [0, 0, 255, 255],
      [255, 255, 0, 255],
    ];
    for (let y = 0; y < 4; y++) {
      for (let x = 0; x < 4; x++) {
        const quadrant = (y < 2 ? 0 : 2) + (x < 2 ? 0 : 1);
        image.data.set(colours[quadrant], (y * 4 + x) * 4);
      }
    }

    const pieces = splitImage(image, { rows: 2, cols: 2 });
    expect(pieces.map(p => getPixel(p, 0, 0))).toEqual(colours);
    expect(pieces.map(p => getPixel(p, 1, 1))).toEqual(colours);
  });
});

describe('fitAndSlice', () => {
  const source = createPixelBuffer(50, 40, [90, 90, 90, 255]);

  it('drops the remainder of the floor division', () => {
    const { fitted, pieces, pieceSize } = fitAndSlice(source, { width: 10, height: 7 }, { rows: 3, cols: 3 });
    expect(pieceSize).toEqual({ width: 3, height: 2 });
    expect(fitted.width).toBe(9);
    expect(fitted.height).toBe(6);
    expect(pieces).toHaveLength(9);
  });

  it.each([
    [{ rows: 2, cols: 3 }, { width: 301, height: 199 }],
    [{ rows: 3, cols: 3 }, { width: 90, height: 90 }],
    [{ rows: 3, cols: 4 }, { width: 103, height: 61 }],
    [{ rows: 4, cols: 5 }, { width: 64, height: 250 }],
    [{ rows: 5, cols: 5 }, { width: 27, height: 33 }],
  ])('tiles a %o grid over %o exactly', (grid, target) => {
    const { fitted, pieces, pieceSize } = fitAndSlice(source, target, grid);

    expect(pieces).toHaveLength(grid.rows * grid.cols);
    for (const piece of pieces) {
      expect(piece.width).toBe(pieceSize.width);
      expect(piece.height).toBe(pieceSize.height);
    }
    expect(fitted.width).toBe(pieceSize.width * grid.cols);
    expect(fitted.height).toBe(pieceSize.height * grid.rows);
  });

  it('rejects a grid without rows', () => {
    expect(() => fitAndSlice(source, { width: 100, height: 100 }, { rows: 0, cols: 3 })).toThrow(InvalidGridError);
  });

  it('rejects a target too small to give every piece a pixel', () => {
    expect(() => fitAndSlice(source, { width: 2, height: 2 }, { rows: 3, cols: 3 })).toThrow(InvalidGridError);
  });
});
