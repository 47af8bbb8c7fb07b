import type { GridSize, PixelBuffer, Size } from '../types';
import { InvalidGridError } from './errors';
import { cropPixelBuffer, resizePixelBuffer } from './pixelBuffer';

export interface SliceResult {
  // The source scaled and centre-cropped to exactly pieceSize * grid
  fitted: PixelBuffer;
  // Row-major: row 0 left to right, then row 1, ...
  pieces: PixelBuffer[];
  pieceSize: Size;
}

export const validateGrid = (grid: GridSize) => {
  const ok = (n: number) => Number.isInteger(n) && n > 0;
  if (!ok(grid.rows) || !ok(grid.cols)) {
    throw new InvalidGridError(`Grid must have positive integer rows and cols, got ${grid.rows}x${grid.cols}`);
  }
};

/**
 * Size of a single piece when `area` is divided into `grid`.
 * Remainders are dropped so the pieces tile an integer-sized image exactly.
 * Shared with the layout so snap targets line up with the sliced pixels.
 */
export const computePieceSize = (area: Size, grid: GridSize): Size => ({
  width: Math.floor(area.width / grid.cols),
  height: Math.floor(area.height / grid.rows),
});

/**
 * Scales the source uniformly so it covers the fitted size, then crops the
 * overflowing axis around the centre.
 */
export const fitImage = (source: PixelBuffer, target: Size): PixelBuffer => {
  const sourceRatio = source.width / source.height;
  const targetRatio = target.width / target.height;

  if (sourceRatio > targetRatio) {
    // Relatively wider: match height, trim left and right
    const scale = target.height / source.height;
    const scaledWidth = Math.max(target.width, Math.floor(source.width * scale));
    const scaled = resizePixelBuffer(source, scaledWidth, target.height);
    const left = Math.floor((scaledWidth - target.width) / 2);
    return cropPixelBuffer(scaled, { x: left, y: 0, width: target.width, height: target.height });
  }

  // Relatively taller (or identical ratio): match width, trim top and bottom
  const scale = target.width / source.width;
  const scaledHeight = Math.max(target.height, Math.floor(source.height * scale));
  const scaled = resizePixelBuffer(source, target.width, scaledHeight);
  const top = Math.floor((scaledHeight - target.height) / 2);
  return cropPixelBuffer(scaled, { x: 0, y: top, width: target.width, height: target.height });
};

export const splitImage = (image: PixelBuffer, grid: GridSize): PixelBuffer[] => {
  validateGrid(grid);
  const { width, height } = computePieceSize(image, grid);
  const pieces: PixelBuffer[] = [];

  for (let row = 0; row < grid.rows; row++) {
    for (let col = 0; col < grid.cols; col++) {
      pieces.push(cropPixelBuffer(image, { x: col * width, y: row * height, width, height }));
    }
  }
  return pieces;
};

export const fitAndSlice = (source: PixelBuffer, targetRect: Size, grid: GridSize): SliceResult => {
  validateGrid(grid);
  if (source.width <= 0 || source.height <= 0) {
    throw new InvalidGridError(`Source image has no pixels (${source.width}x${source.height})`);
  }

  const pieceSize = computePieceSize(targetRect, grid);
  if (pieceSize.width < 1 || pieceSize.height < 1) {
    throw new InvalidGridError(
      `Target ${targetRect.width}x${targetRect.height} is too small for a ${grid.rows}x${grid.cols} grid`
    );
  }

  const fitted = fitImage(source, {
    width: pieceSize.width * grid.cols,
    height: pieceSize.height * grid.rows,
  });

  return { fitted, pieces: splitImage(fitted, grid), pieceSize };
};
