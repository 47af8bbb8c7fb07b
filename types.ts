export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

// Axis-aligned rectangle in screen pixels. (x, y) is the top-left corner.
export interface Rect extends Point, Size {}

export interface GridSize {
  rows: number;
  cols: number;
}

export interface Cell {
  row: number;
  col: number;
}

// Raw RGBA pixels, 4 bytes per pixel, row-major. Same layout as canvas ImageData.
export interface PixelBuffer {
  width: number;
  height: number;
  data: Uint8ClampedArray;
}

export interface PuzzlePiece {
  id: number;
  // The grid cell this piece belongs to
  homeCell: Cell;
  image: PixelBuffer;
  // Top-left on screen. null until the piece is scattered.
  position: Point | null;
  // Top-left of the home cell inside the play area
  targetPosition: Point;
  isDragging: boolean;
  isPlaced: boolean;
  zOrder: number;
}

export type GameMode = 'free' | 'timed' | 'challenge';

export interface Layout {
  playArea: Rect;
  stagingArea: Rect;
  previewArea: Rect;
  infoArea: Rect;
}

export interface PieceFrame {
  id: number;
  image: PixelBuffer;
  position: Point | null;
  isDragging: boolean;
  isPlaced: boolean;
}

export interface SessionStats {
  elapsedTime: number;
  moveCount: number;
  completionPercentage: number;
  mode: GameMode;
  isCompleted: boolean;
  isFailed: boolean;
  timeLimit: number | null;
  moveLimit: number | null;
}

// Everything a renderer needs for one frame. Never mutated after creation.
export interface FrameSnapshot {
  pieces: readonly PieceFrame[];
  layout: Layout;
  gridSize: GridSize;
  stats: SessionStats;
}
