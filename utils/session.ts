import type {
  Cell,
  FrameSnapshot,
  GameMode,
  GridSize,
  Layout,
  PixelBuffer,
  Point,
  PuzzlePiece,
  SessionStats,
  Size,
} from '../types';
import type { GameConfig } from './config';
import { DEFAULT_CONFIG } from './config';
import { clamp } from './geometry';
import { InteractionEngine } from './interaction';
import { computeLayout } from './layout';
import { createLogger } from './logger';
import type { RandomSource } from './pieces';
import { assignTargetPositions, createPieces, resetPieces, scatterPieces, sortByZOrder } from './pieces';
import { createThumbnail } from './pixelBuffer';
import { fitAndSlice } from './slicer';

const log = createLogger('session');

export type CancelOutcome = 'cancelled' | 'quit';

export interface SessionLimits {
  timeLimit: number | null; // seconds
  moveLimit: number | null;
}

export interface PuzzleSessionOptions {
  gridSize: GridSize;
  pieces: PuzzlePiece[];
  layout: Layout;
  mode?: GameMode;
  config?: GameConfig;
  random?: RandomSource;
  // The fitted source and its thumbnail, when the session was built from an image
  image?: PixelBuffer;
  preview?: PixelBuffer;
}

// mm:ss
export const formatClock = (seconds: number) => {
  const total = Math.floor(seconds);
  return `${Math.floor(total / 60).toString().padStart(2, '0')}:${(total % 60).toString().padStart(2, '0')}`;
};

/**
 * One game: the piece registry, the drag engine and the running stats.
 * Owned by a single control loop; the renderer only ever sees snapshot().
 */
export class PuzzleSession {
  readonly gridSize: GridSize;
  readonly pieces: readonly PuzzlePiece[];
  readonly mode: GameMode;
  readonly engine: InteractionEngine;
  readonly image: PixelBuffer | null;
  readonly preview: PixelBuffer | null;

  layout: Layout;
  moveCount = 0;
  elapsedTime = 0;
  isCompleted = false;
  isFailed = false;

  private readonly config: GameConfig;
  private readonly random: RandomSource;

  constructor(options: PuzzleSessionOptions) {
    this.gridSize = options.gridSize;
    this.pieces = options.pieces;
    this.layout = options.layout;
    this.mode = options.mode ?? 'free';
    this.config = options.config ?? DEFAULT_CONFIG;
    this.random = options.random ?? Math.random;
    this.image = options.image ?? null;
    this.preview = options.preview ?? null;
    this.engine = new InteractionEngine(this.pieces, this.config.snapThreshold);
  }

  get pieceCount(): number {
    return this.pieces.length;
  }

  limits(): SessionLimits {
    return {
      timeLimit: this.mode === 'timed' ? this.pieceCount * this.config.secondsPerPiece : null,
      moveLimit: this.mode === 'challenge' ? this.pieceCount * this.config.movesPerPiece : null,
    };
  }

  isSolved(): boolean {
    return this.pieces.length > 0 && this.pieces.every(p => p.isPlaced);
  }

  checkCompletion(): boolean {
    const solved = this.isSolved();
    this.isCompleted = solved || this.isFailed;
    return solved;
  }

  completionPercentage(): number {
    if (this.pieces.length === 0) return 0;
    const placed = this.pieces.filter(p => p.isPlaced).length;
    return (placed / this.pieces.length) * 100;
  }

  // The placed piece that belongs to `cell`, if any. Not used for pointer hit-testing.
  getPieceAt(cell: Cell): PuzzlePiece | null {
    return (
      this.pieces.find(p => p.isPlaced && p.homeCell.row === cell.row && p.homeCell.col === cell.col) ?? null
    );
  }

  scatter(staging = this.layout.stagingArea) {
    scatterPieces(this.pieces, staging, this.random);
  }

  // --- Input ---

  pointerDown(pointer: Point): PuzzlePiece | null {
    if (this.isCompleted) return null;
    return this.engine.startDrag(pointer);
  }

  pointerMove(pointer: Point) {
    this.engine.updateDrag(pointer);
  }

  // Returns true when the release placed a piece.
  pointerUp(): boolean {
    // A piece still held when the game ends is dropped where it is
    if (this.isCompleted) {
      this.engine.cancelDrag();
      return false;
    }
    const placed = this.engine.endDrag();
    if (!placed) return false;

    this.moveCount += 1;
    log.info(`Piece placed. Move ${this.moveCount}, ${this.completionPercentage().toFixed(0)}% complete`);

    // Completion first: a move that both solves the puzzle and uses the last allowed move is a win.
    if (this.checkCompletion()) {
      log.info(`Puzzle completed in ${this.moveCount} moves, ${formatClock(this.elapsedTime)}`);
    }
    this.enforceLimits();
    return true;
  }

  cancelOrQuit(): CancelOutcome {
    if (this.engine.isDragging()) {
      this.engine.cancelDrag();
      return 'cancelled';
    }
    return 'quit';
  }

  // --- Clock ---

  /**
   * Called once per frame with seconds since the game started. The clock
   * stops once the session is over.
   */
  tick(elapsedSeconds: number) {
    if (this.isCompleted) return;
    this.elapsedTime = Math.max(this.elapsedTime, elapsedSeconds);
    this.enforceLimits();
  }

  private enforceLimits() {
    if (this.isCompleted) return;
    const { timeLimit, moveLimit } = this.limits();

    if (timeLimit !== null && this.elapsedTime >= timeLimit && !this.isSolved()) {
      this.fail(`Time's up after ${formatClock(timeLimit)}`);
      return;
    }
    if (moveLimit !== null && this.moveCount >= moveLimit && !this.isSolved()) {
      this.fail(`Move limit of ${moveLimit} reached`);
    }
  }

  private fail(reason: string) {
    this.isCompleted = true;
    this.isFailed = true;
    log.info(`${reason}. Game over at ${this.completionPercentage().toFixed(0)}%`);
  }

  // --- Lifecycle ---

  // Same image and grid, fresh shuffle.
  newGame() {
    this.engine.reset();
    resetPieces(this.pieces);
    this.moveCount = 0;
    this.elapsedTime = 0;
    this.isCompleted = false;
    this.isFailed = false;
    this.scatter();
    log.info('New game started');
  }

  /**
   * Recomputes the layout for a new screen size. Placed pieces follow their
   * cells; loose pieces are pulled back on screen.
   */
  relayout(screen: Size) {
    this.layout = computeLayout(screen, this.config);
    assignTargetPositions(this.pieces, this.layout.playArea, this.gridSize);

    for (const piece of this.pieces) {
      if (piece.isPlaced) {
        piece.position = { ...piece.targetPosition };
      } else if (piece.position !== null) {
        piece.position = {
          x: clamp(piece.position.x, 0, Math.max(0, screen.width - piece.image.width)),
          y: clamp(piece.position.y, 0, Math.max(0, screen.height - piece.image.height)),
        };
      }
    }
  }

  stats(): SessionStats {
    const { timeLimit, moveLimit } = this.limits();
    return {
      elapsedTime: this.elapsedTime,
      moveCount: this.moveCount,
      completionPercentage: this.completionPercentage(),
      mode: this.mode,
      isCompleted: this.isCompleted,
      isFailed: this.isFailed,
      timeLimit,
      moveLimit,
    };
  }

  snapshot(): FrameSnapshot {
    const pieces = sortByZOrder(this.pieces).map(p =>
      Object.freeze({
        id: p.id,
        image: p.image,
        position: p.position === null ? null : { ...p.position },
        isDragging: p.isDragging,
        isPlaced: p.isPlaced,
      })
    );
    return Object.freeze({
      pieces: Object.freeze(pieces),
      layout: copyLayout(this.layout),
      gridSize: { ...this.gridSize },
      stats: this.stats(),
    });
  }
}

const copyLayout = (layout: Layout): Layout => ({
  playArea: { ...layout.playArea },
  stagingArea: { ...layout.stagingArea },
  previewArea: { ...layout.previewArea },
  infoArea: { ...layout.infoArea },
});

export interface CreateSessionOptions {
  source: PixelBuffer;
  gridSize: GridSize;
  mode?: GameMode;
  screenSize?: Size;
  config?: GameConfig;
  random?: RandomSource;
}

/**
 * Layout, slice, build the registry, then scatter. Any failure propagates and
 * no session is returned.
 */
export const createSession = (options: CreateSessionOptions): PuzzleSession => {
  const config = options.config ?? DEFAULT_CONFIG;
  const layout = computeLayout(options.screenSize ?? config.screenSize, config);
  const { fitted, pieces: images } = fitAndSlice(options.source, layout.playArea, options.gridSize);
  const pieces = createPieces(images, options.gridSize, layout.playArea);

  const session = new PuzzleSession({
    gridSize: options.gridSize,
    pieces,
    layout,
    mode: options.mode,
    config,
    random: options.random,
    image: fitted,
    preview: createThumbnail(fitted, layout.previewArea),
  });
  session.scatter();

  log.info(
    `Session ready: ${options.gridSize.rows}x${options.gridSize.cols} grid, ${session.mode} mode, ` +
      `${fitted.width}x${fitted.height} image`
  );
  return session;
};
