import type { Point, PuzzlePiece } from '../types';
import { distance, rectContains, subtract } from './geometry';
import { sortByZOrder } from './pieces';
import { SNAP_THRESHOLD } from '../constants';

// The drag offset only exists while something is being dragged.
export type DragState =
  | { kind: 'idle' }
  | { kind: 'dragging'; piece: PuzzlePiece; offset: Point };

export interface HitTestOptions {
  // Placed pieces still cover whatever lies beneath them, but cannot be picked up.
  includePlaced?: boolean;
}

const pieceBounds = (piece: PuzzlePiece, position: Point) => ({
  x: position.x,
  y: position.y,
  width: piece.image.width,
  height: piece.image.height,
});

/**
 * Snaps `piece` onto its target when it was released close enough.
 * Returns true only when this call placed the piece.
 */
export const checkSnap = (piece: PuzzlePiece, snapThreshold: number): boolean => {
  if (piece.isPlaced) return false;

  const gap = piece.position === null ? Infinity : distance(piece.position, piece.targetPosition);
  if (gap > snapThreshold) return false;

  piece.position = { ...piece.targetPosition };
  piece.isPlaced = true;
  return true;
};

/**
 * Drag-and-drop state machine over a piece registry.
 *
 * idle --startDrag--> dragging --updateDrag--> dragging
 * dragging --endDrag / cancelDrag--> idle
 *
 * Input that does not fit the current state (a press on empty space, a move or
 * release with nothing held) is ignored.
 */
export class InteractionEngine {
  private drag: DragState = { kind: 'idle' };
  private lastZOrder = 0;

  constructor(
    private readonly pieces: readonly PuzzlePiece[],
    readonly snapThreshold: number = SNAP_THRESHOLD
  ) {}

  get state(): DragState {
    return this.drag;
  }

  // Highest zOrder handed out so far
  get maxZOrder(): number {
    return this.lastZOrder;
  }

  isDragging(): boolean {
    return this.drag.kind === 'dragging';
  }

  draggedPiece(): PuzzlePiece | null {
    return this.drag.kind === 'dragging' ? this.drag.piece : null;
  }

  /**
   * Topmost piece under `pointer`. Higher zOrder wins; on equal zOrder the
   * piece later in the registry wins, matching draw order.
   */
  hitTest(pointer: Point, { includePlaced = true }: HitTestOptions = {}): PuzzlePiece | null {
    const topFirst = sortByZOrder(this.pieces).reverse();
    for (const piece of topFirst) {
      if (piece.position === null) continue;
      if (!includePlaced && piece.isPlaced) continue;
      if (rectContains(pieceBounds(piece, piece.position), pointer)) return piece;
    }
    return null;
  }

  // Picks up the topmost piece under the pointer. A placed piece on top absorbs the press.
  startDrag(pointer: Point): PuzzlePiece | null {
    if (this.drag.kind === 'dragging') return null;
    const piece = this.hitTest(pointer);
    return this.beginDrag(piece, pointer) ? piece : null;
  }

  beginDrag(piece: PuzzlePiece | null, pointer: Point): boolean {
    if (piece === null || piece.isPlaced || this.drag.kind === 'dragging') return false;

    const offset = piece.position === null ? { x: 0, y: 0 } : subtract(pointer, piece.position);
    piece.isDragging = true;
    // Stay above any zOrder set on a piece from outside the engine
    const highest = this.pieces.reduce((max, p) => Math.max(max, p.zOrder), this.lastZOrder);
    this.lastZOrder = highest + 1;
    piece.zOrder = this.lastZOrder;
    this.drag = { kind: 'dragging', piece, offset };
    return true;
  }

  updateDrag(pointer: Point) {
    if (this.drag.kind !== 'dragging') return;
    this.drag.piece.position = subtract(pointer, this.drag.offset);
  }

  // Drops the held piece and tries to snap it. Returns true if it was placed.
  endDrag(): boolean {
    if (this.drag.kind !== 'dragging') return false;
    const { piece } = this.drag;
    const placed = checkSnap(piece, this.snapThreshold);
    this.release(piece);
    return placed;
  }

  // Drops the held piece where it is, without a snap check.
  cancelDrag() {
    if (this.drag.kind !== 'dragging') return;
    this.release(this.drag.piece);
  }

  checkSnap(piece: PuzzlePiece): boolean {
    return checkSnap(piece, this.snapThreshold);
  }

  // Back to a fresh engine: nothing held, zOrder numbering restarts.
  reset() {
    if (this.drag.kind === 'dragging') this.drag.piece.isDragging = false;
    this.drag = { kind: 'idle' };
    this.lastZOrder = 0;
  }

  private release(piece: PuzzlePiece) {
    piece.isDragging = false;
    this.drag = { kind: 'idle' };
  }
}
