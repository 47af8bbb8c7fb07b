import { create } from 'zustand';
import type { FrameSnapshot, GameMode, GridSize, PixelBuffer, Point, Size } from '../types';
import type { GameConfig } from '../utils/config';
import { DEFAULT_CONFIG } from '../utils/config';
import { isPuzzleError } from '../utils/errors';
import { createLogger, setLogLevel } from '../utils/logger';
import type { RandomSource } from '../utils/pieces';
import { createSession, PuzzleSession } from '../utils/session';

const log = createLogger('store');

export type Status = 'idle' | 'loading' | 'playing' | 'error';

interface PuzzleState {
  status: Status;
  error: string | null;
  config: GameConfig;
  gridSize: GridSize;
  mode: GameMode;
  screenSize: Size;
  // Owned here and mutated only through the actions below
  session: PuzzleSession | null;
  // What React renders. Replaced after every state change.
  snapshot: FrameSnapshot | null;
  lastPlacedId: number | null;
  // Bumped whenever a game (re)starts, so the clock knows to restart
  round: number;

  // Actions
  configure: (config: GameConfig) => void;
  setGridSize: (gridSize: GridSize) => void;
  setMode: (mode: GameMode) => void;
  openImage: (load: () => Promise<PixelBuffer>) => Promise<void>;
  startSession: (source: PixelBuffer) => void;
  // True when the press picked up a piece
  pointerDown: (pointer: Point) => boolean;
  pointerMove: (pointer: Point) => void;
  pointerUp: () => boolean;
  cancelOrQuit: () => void;
  newGame: () => void;
  tick: (elapsedSeconds: number) => void;
  resize: (screenSize: Size) => void;
  reset: () => void;
}

let random: RandomSource = Math.random;

// Tests swap in a deterministic sequence.
export const setRandomSource = (source: RandomSource) => {
  random = source;
};

export const usePuzzleStore = create<PuzzleState>((set, get) => {
  // Runs `fn` against the live session, then publishes a fresh snapshot.
  const withSession = <T>(fn: (session: PuzzleSession) => T, fallback: T): T => {
    const { session } = get();
    if (!session) return fallback;
    const result = fn(session);
    set({ snapshot: session.snapshot() });
    return result;
  };

  return {
    status: 'idle',
    error: null,
    config: DEFAULT_CONFIG,
    gridSize: DEFAULT_CONFIG.gridOptions[0],
    mode: 'free',
    screenSize: DEFAULT_CONFIG.screenSize,
    session: null,
    snapshot: null,
    lastPlacedId: null,
    round: 0,

    configure: (config) => {
      setLogLevel(config.logLevel);
      set({ config, gridSize: config.gridOptions[0], screenSize: config.screenSize });
    },

    setGridSize: (gridSize) => set({ gridSize }),
    setMode: (mode) => set({ mode }),

    openImage: async (load) => {
      set({ status: 'loading', error: null });
      try {
        const source = await load();
        get().startSession(source);
      } catch (e) {
        if (!isPuzzleError(e)) log.error('Unexpected failure while starting a puzzle', e);
        const message = e instanceof Error ? e.message : String(e);
        set({ status: 'error', error: message, session: null, snapshot: null });
      }
    },

    startSession: (source) => {
      const { gridSize, mode, screenSize, config } = get();
      // Throws before anything is replaced, so a failed start keeps nothing half built
      const session = createSession({ source, gridSize, mode, screenSize, config, random });
      set(state => ({
        session,
        snapshot: session.snapshot(),
        status: 'playing',
        error: null,
        lastPlacedId: null,
        round: state.round + 1,
      }));
    },

    pointerDown: (pointer) => withSession(session => session.pointerDown(pointer) !== null, false),

    pointerMove: (pointer) => {
      // Nothing to redraw unless a piece is held
      const { session } = get();
      if (!session?.engine.isDragging()) return;
      withSession(s => s.pointerMove(pointer), undefined);
    },

    pointerUp: () =>
      withSession(session => {
        const held = session.engine.draggedPiece();
        const placed = session.pointerUp();
        if (placed && held) set({ lastPlacedId: held.id });
        return placed;
      }, false),

    cancelOrQuit: () => {
      const outcome = withSession(session => session.cancelOrQuit(), 'quit');
      if (outcome === 'quit') {
        log.info('Leaving the current puzzle');
        get().reset();
      }
    },

    newGame: () => {
      if (!get().session) return;
      withSession(session => session.newGame(), undefined);
      set(state => ({ lastPlacedId: null, round: state.round + 1 }));
    },

    tick: (elapsedSeconds) => {
      const { session } = get();
      if (!session || session.isCompleted) return;
      withSession(s => s.tick(elapsedSeconds), undefined);
    },

    resize: (screenSize) => {
      set({ screenSize });
      withSession(session => session.relayout(screenSize), undefined);
    },

    reset: () => set({ status: 'idle', error: null, session: null, snapshot: null, lastPlacedId: null }),
  };
});
