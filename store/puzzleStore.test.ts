import { beforeEach, describe, expect, it } from 'vitest';
import { parseGameConfig } from '../utils/config';
import { ImageNotFoundError } from '../utils/errors';
import { getLogLevel, setLogLevel } from '../utils/logger';
import { createPixelBuffer } from '../utils/pixelBuffer';
import { sequence } from '../utils/testPieces';
import { setRandomSource, usePuzzleStore } from './puzzleStore';

const image = () => createPixelBuffer(800, 600, [200, 100, 50, 255]);

// Default 1400x900 screen and a 2x3 grid: pieces are 290x430, all scattered to (930, 20)
const startGame = async () => {
  await usePuzzleStore.getState().openImage(async () => image());
};

describe('usePuzzleStore', () => {
  beforeEach(() => {
    usePuzzleStore.setState(usePuzzleStore.getInitialState(), true);
    setLogLevel('silent');
    setRandomSource(sequence(0));
  });

  it('starts a session from a loaded image', async () => {
    await startGame();

    const { status, snapshot, round, error } = usePuzzleStore.getState();
    expect(status).toBe('playing');
    expect(error).toBeNull();
    expect(round).toBe(1);
    expect(snapshot?.pieces).toHaveLength(6);
    expect(snapshot?.pieces.every(p => p.position?.x === 930 && p.position.y === 20)).toBe(true);
  });

  it('reports a load failure without a session', async () => {
    await usePuzzleStore.getState().openImage(async () => {
      throw new ImageNotFoundError('missing.png');
    });

    const { status, error, session, snapshot } = usePuzzleStore.getState();
    expect(status).toBe('error');
    expect(error).toBe('Image file not found: missing.png');
    expect(session).toBeNull();
    expect(snapshot).toBeNull();
  });

  it('reports an invalid grid as an error', async () => {
    usePuzzleStore.getState().setGridSize({ rows: 0, cols: 3 });
    await startGame();

    expect(usePuzzleStore.getState().status).toBe('error');
    expect(usePuzzleStore.getState().error).toMatch(/positive integer/);
  });

  it('drags a piece onto its cell', async () => {
    await startGame();
    const { pointerDown, pointerMove, pointerUp } = usePuzzleStore.getState();

    // Equal zOrder everywhere, so the last piece is on top
    pointerDown({ x: 935, y: 25 });
    expect(usePuzzleStore.getState().snapshot?.pieces[5]).toMatchObject({ id: 5, isDragging: true });

    // Cell (1, 2) starts at (600, 450)
    pointerMove({ x: 605, y: 455 });
    expect(pointerUp()).toBe(true);

    const { snapshot, lastPlacedId } = usePuzzleStore.getState();
    expect(lastPlacedId).toBe(5);
    expect(snapshot?.stats.moveCount).toBe(1);
    expect(snapshot?.pieces.find(p => p.id === 5)).toMatchObject({ position: { x: 600, y: 450 }, isPlaced: true });
  });

  it('reports whether a press picked up a piece', async () => {
    await startGame();
    const { pointerDown } = usePuzzleStore.getState();

    expect(pointerDown({ x: 5, y: 5 })).toBe(false);
    expect(pointerDown({ x: 935, y: 25 })).toBe(true);
  });

  it('publishes nothing for pointer moves with no piece held', async () => {
    await startGame();
    const before = usePuzzleStore.getState().snapshot;

    usePuzzleStore.getState().pointerMove({ x: 10, y: 10 });

    expect(usePuzzleStore.getState().snapshot).toBe(before);
  });

  it('cancels a drag and keeps playing', async () => {
    await startGame();
    const { pointerDown, pointerMove, cancelOrQuit } = usePuzzleStore.getState();
    pointerDown({ x: 935, y: 25 });
    pointerMove({ x: 605, y: 455 });

    cancelOrQuit();

    const { status, snapshot } = usePuzzleStore.getState();
    expect(status).toBe('playing');
    expect(snapshot?.pieces.find(p => p.id === 5)).toMatchObject({ position: { x: 600, y: 450 }, isPlaced: false });
  });

  it('quits back to the start screen when nothing is held', async () => {
    await startGame();

    usePuzzleStore.getState().cancelOrQuit();

    const { status, session, snapshot } = usePuzzleStore.getState();
    expect(status).toBe('idle');
    expect(session).toBeNull();
    expect(snapshot).toBeNull();
  });

  it('advances the clock and fails a timed game at its limit', async () => {
    usePuzzleStore.getState().setMode('timed');
    await startGame();

    usePuzzleStore.getState().tick(12.5);
    expect(usePuzzleStore.getState().snapshot?.stats).toMatchObject({ elapsedTime: 12.5, timeLimit: 180 });

    usePuzzleStore.getState().tick(180);
    expect(usePuzzleStore.getState().snapshot?.stats).toMatchObject({ isCompleted: true, isFailed: true });
  });

  it('restarts the same puzzle', async () => {
    await startGame();
    const { pointerDown, pointerMove, pointerUp, newGame } = usePuzzleStore.getState();
    pointerDown({ x: 935, y: 25 });
    pointerMove({ x: 605, y: 455 });
    pointerUp();

    newGame();

    const { round, snapshot, lastPlacedId } = usePuzzleStore.getState();
    expect(round).toBe(2);
    expect(lastPlacedId).toBeNull();
    expect(snapshot?.stats.moveCount).toBe(0);
    expect(snapshot?.pieces.every(p => !p.isPlaced)).toBe(true);
  });

  it('lays the board out again on resize', async () => {
    await startGame();

    usePuzzleStore.getState().resize({ width: 1000, height: 600 });

    const { screenSize, snapshot } = usePuzzleStore.getState();
    expect(screenSize).toEqual({ width: 1000, height: 600 });
    expect(snapshot?.layout.stagingArea).toEqual({ x: 670, y: 20, width: 280, height: 280 });
  });

  it('applies a new configuration', () => {
    usePuzzleStore.getState().configure(parseGameConfig({ gridOptions: [{ rows: 3, cols: 3 }], logLevel: 'warn' }));

    expect(usePuzzleStore.getState().gridSize).toEqual({ rows: 3, cols: 3 });
    expect(getLogLevel()).toBe('warn');
  });
});
