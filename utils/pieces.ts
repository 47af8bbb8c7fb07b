import type { Cell, GridSize, PixelBuffer, Point, PuzzlePiece, Rect } from '../types';
import { cellTargetPosition } from './layout';
import { InvalidGridError } from './errors';

// Returns a float in [0, 1). Math.random in the app, a seeded sequence in tests.
export type RandomSource = () => number;

/**
 * One piece per grid cell, in row-major order so `id` matches the slice index.
 * Every piece gets its target from the play area straight away; none has a
 * position until it is scattered.
 */
export const createPieces = (images: PixelBuffer[], grid: GridSize, playArea: Rect): PuzzlePiece[] => {
  if (images.length !== grid.rows * grid.cols) {
    throw new InvalidGridError(
      `Expected ${grid.rows * grid.cols} piece images for a ${grid.rows}x${grid.cols} grid, got ${images.length}`
    );
  }

  return images.map((image, id) => {
    const homeCell: Cell = { row: Math.floor(id / grid.cols), col: id % grid.cols };
    return {
      id,
      homeCell,
      image,
      position: null,
      targetPosition: cellTargetPosition(playArea, grid, homeCell),
      isDragging: false,
      isPlaced: false,
      zOrder: 0,
    };
  });
};

// Call after the layout is recomputed. Positions and flags are left alone.
export const assignTargetPositions = (pieces: readonly PuzzlePiece[], playArea: Rect, grid: GridSize) => {
  for (const piece of pieces) {
    piece.targetPosition = cellTargetPosition(playArea, grid, piece.homeCell);
  }
};

const randomOffset = (span: number, random: RandomSource) =>
  span <= 0 ? 0 : Math.min(span, Math.floor(random() * (span + 1)));

/**
 * Drops every piece at a random spot inside the staging rect. A piece larger
 * than the rect is pinned to the rect's top-left corner on that axis.
 */
export const scatterPieces = (pieces: readonly PuzzlePiece[], staging: Rect, random: RandomSource = Math.random) => {
  for (const piece of pieces) {
    const position: Point = {
      x: staging.x + randomOffset(staging.width - piece.image.width, random),
      y: staging.y + randomOffset(staging.height - piece.image.height, random),
    };
    piece.position = position;
  }
};

export const resetPieces = (pieces: readonly PuzzlePiece[]) => {
  for (const piece of pieces) {
    piece.isPlaced = false;
    piece.isDragging = false;
    piece.zOrder = 0;
  }
};

// Draw order: bottom first. Equal zOrder keeps registry order, so the later piece draws on top.
export const sortByZOrder = (pieces: readonly PuzzlePiece[]): PuzzlePiece[] =>
  pieces
    .map((piece, index) => ({ piece, index }))
    .sort((a, b) => a.piece.zOrder - b.piece.zOrder || a.index - b.index)
    .map(({ piece }) => piece);
