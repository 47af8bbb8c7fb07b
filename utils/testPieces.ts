import type { Point, PuzzlePiece } from '../types';
import { createPixelBuffer } from './pixelBuffer';

interface PieceInit {
  id?: number;
  row?: number;
  col?: number;
  size?: number;
  position?: Point | null;
  targetPosition?: Point;
  zOrder?: number;
  isPlaced?: boolean;
}

// Square test piece with a blank image. Only used by tests.
export const makePiece = ({
  id = 0,
  row = 0,
  col = 0,
  size = 50,
  position = null,
  targetPosition = { x: 0, y: 0 },
  zOrder = 0,
  isPlaced = false,
}: PieceInit = {}): PuzzlePiece => ({
  id,
  homeCell: { row, col },
  image: createPixelBuffer(size, size),
  position,
  targetPosition,
  isDragging: false,
  isPlaced,
  zOrder,
});

// Replays the given values in order, then repeats the last one.
export const sequence = (...values: number[]) => {
  let i = 0;
  return () => values[Math.min(i++, values.length - 1)];
};
