import React, { useEffect, useMemo, useRef, useState } from 'react';
import type { GameMode, Point } from './types';
import { GAME_MODES, MODE_LABELS } from './constants';
import { PieceCanvas } from './components/PieceCanvas';
import { PreviewCanvas } from './components/PreviewCanvas';
import { InfoPanel } from './components/InfoPanel';
import { Confetti } from './components/Confetti';
import { usePuzzleStore } from './store/puzzleStore';
import { encodeForDisplay, loadImage, loadImageFile } from './utils/imageLoader';
import { formatClock } from './utils/session';

// --- Icons ---
const UploadIcon = () => <svg xmlns="http://www.w3.org/2000/svg" fill="none" viewBox="0 0 24 24" strokeWidth={1.5} stroke="currentColor" className="w-6 h-6"><path strokeLinecap="round" strokeLinejoin="round" d="M3 16.5v2.25A2.25 2.25 0 005.25 21h13.5A2.25 2.25 0 0021 18.75V16.5m-13.5-9L12 3m0 0l4.5 4.5M12 3v13.5" /></svg>;
const PlayIcon = () => <svg xmlns="http://www.w3.org/2000/svg" fill="none" viewBox="0 0 24 24" strokeWidth={1.5} stroke="currentColor" className="w-6 h-6"><path strokeLinecap="round" strokeLinejoin="round" d="M5.25 5.653c0-.856.917-1.398 1.667-.986l11.54 6.348a1.125 1.125 0 010 1.971l-11.54 6.347a1.125 1.125 0 01-1.667-.985V5.653z" /></svg>;

const SCATTER_ANIMATION_MS = 600;

export default function App() {
  const status = usePuzzleStore(s => s.status);
  const error = usePuzzleStore(s => s.error);
  const snapshot = usePuzzleStore(s => s.snapshot);
  const preview = usePuzzleStore(s => s.session?.preview ?? null);
  const round = usePuzzleStore(s => s.round);
  const gridSize = usePuzzleStore(s => s.gridSize);
  const mode = usePuzzleStore(s => s.mode);
  const gridOptions = usePuzzleStore(s => s.config.gridOptions);
  const {
    setGridSize, setMode, openImage, pointerDown, pointerMove, pointerUp,
    cancelOrQuit, newGame, tick, resize
  } = usePuzzleStore.getState();

  const [imageUrl, setImageUrl] = useState('');
  const [isScattering, setIsScattering] = useState(false);
  const boardRef = useRef<HTMLDivElement>(null);
  // Shown again in the finish overlay
  const previewUrl = useMemo(() => (preview ? encodeForDisplay(preview) : null), [preview]);

  // --- Screen size ---
  useEffect(() => {
    let timeoutId: ReturnType<typeof setTimeout>;
    const handleResize = () => {
      clearTimeout(timeoutId);
      timeoutId = setTimeout(() => resize({ width: window.innerWidth, height: window.innerHeight }), 100);
    };

    resize({ width: window.innerWidth, height: window.innerHeight });
    window.addEventListener('resize', handleResize);
    return () => {
      window.removeEventListener('resize', handleResize);
      clearTimeout(timeoutId);
    };
  }, [resize]);

  // --- Clock: one sample per animation frame ---
  useEffect(() => {
    if (status !== 'playing') return;
    const startedAt = performance.now();
    let frameId = 0;
    const loop = () => {
      tick((performance.now() - startedAt) / 1000);
      frameId = requestAnimationFrame(loop);
    };
    frameId = requestAnimationFrame(loop);
    return () => cancelAnimationFrame(frameId);
  }, [status, round, tick]);

  // Animate the shuffle for a moment after every (re)start
  useEffect(() => {
    if (round === 0) return;
    setIsScattering(true);
    const timeoutId = setTimeout(() => setIsScattering(false), SCATTER_ANIMATION_MS);
    return () => clearTimeout(timeoutId);
  }, [round]);

  // --- Keyboard ---
  useEffect(() => {
    const handleKey = (e: KeyboardEvent) => {
      if (e.key === 'Escape') {
        cancelOrQuit();
      } else if ((e.key === 'n' || e.key === 'N') && usePuzzleStore.getState().snapshot?.stats.isCompleted) {
        newGame();
      }
    };
    window.addEventListener('keydown', handleKey);
    return () => window.removeEventListener('keydown', handleKey);
  }, [cancelOrQuit, newGame]);

  // --- Pointer input ---

  const toBoard = (e: React.PointerEvent): Point => {
    const rect = boardRef.current?.getBoundingClientRect();
    return { x: e.clientX - (rect?.left ?? 0), y: e.clientY - (rect?.top ?? 0) };
  };

  const handlePointerDown = (e: React.PointerEvent) => {
    if (isScattering) return;
    // Only capture for a drag; presses on the info panel must still reach its buttons
    if (pointerDown(toBoard(e))) {
      e.currentTarget.setPointerCapture(e.pointerId);
    }
  };

  const handlePointerMove = (e: React.PointerEvent) => {
    pointerMove(toBoard(e));
  };

  const handlePointerUp = () => {
    pointerUp();
  };

  // --- Image selection ---

  const handleImageUpload = (e: React.ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    if (file) {
      void openImage(() => loadImageFile(file));
    }
  };

  const handleOpenUrl = () => {
    const src = imageUrl.trim();
    if (src) {
      void openImage(() => loadImage(src));
    }
  };

  if (status !== 'playing' || !snapshot) {
    return (
      <div className="flex flex-col items-center justify-center h-screen gap-6 text-white bg-slate-900">
        <h1 className="text-3xl font-bold">Picture Puzzle</h1>

        <div className="flex gap-2">
          {gridOptions.map(g => (
            <button
              key={`${g.rows}x${g.cols}`}
              className={`rounded px-3 py-1 ${g.rows === gridSize.rows && g.cols === gridSize.cols ? 'bg-sky-600' : 'bg-slate-700 hover:bg-slate-600'}`}
              onClick={() => setGridSize(g)}
            >
              {g.rows}x{g.cols}
            </button>
          ))}
        </div>

        <div className="flex gap-2">
          {GAME_MODES.map((m: GameMode) => (
            <button
              key={m}
              className={`rounded px-3 py-1 ${m === mode ? 'bg-sky-600' : 'bg-slate-700 hover:bg-slate-600'}`}
              onClick={() => setMode(m)}
            >
              {MODE_LABELS[m]}
            </button>
          ))}
        </div>

        <label className="flex items-center gap-2 cursor-pointer rounded bg-slate-700 px-4 py-2 hover:bg-slate-600">
          <UploadIcon />
          <span>Choose an image</span>
          <input type="file" accept=".png,.jpg,.jpeg,.bmp,.webp" className="hidden" onChange={handleImageUpload} />
        </label>

        <div className="flex gap-2">
          <input
            className="rounded bg-slate-800 px-3 py-2 w-80"
            placeholder="...or an image URL"
            value={imageUrl}
            onChange={e => setImageUrl(e.target.value)}
          />
          <button className="flex items-center gap-1 rounded bg-sky-600 px-3 py-2 hover:bg-sky-500" onClick={handleOpenUrl}>
            <PlayIcon /> Start
          </button>
        </div>

        {status === 'loading' && <div className="text-slate-300">Loading image...</div>}
        {status === 'error' && error && <div className="text-red-400">{error}</div>}
      </div>
    );
  }

  const { layout, stats, pieces } = snapshot;
  const { playArea, stagingArea } = layout;
  const cellW = Math.floor(playArea.width / snapshot.gridSize.cols);
  const cellH = Math.floor(playArea.height / snapshot.gridSize.rows);

  return (
    <div
      className="h-screen text-white overflow-hidden bg-slate-900"
      style={{ touchAction: 'none' }}
    >
      <main
        className="relative w-full h-full overflow-hidden"
        ref={boardRef}
        onPointerDown={handlePointerDown}
        onPointerMove={handlePointerMove}
        onPointerUp={handlePointerUp}
        onPointerLeave={handlePointerUp}
      >
        {/* Play area with the target grid */}
        <div
          className="absolute bg-slate-600"
          style={{
            left: playArea.x,
            top: playArea.y,
            width: cellW * snapshot.gridSize.cols,
            height: cellH * snapshot.gridSize.rows,
            backgroundImage:
              'linear-gradient(to right, rgba(200,200,200,0.6) 2px, transparent 2px),' +
              'linear-gradient(to bottom, rgba(200,200,200,0.6) 2px, transparent 2px)',
            backgroundSize: `${cellW}px ${cellH}px`
          }}
        />

        {/* Staging area */}
        <div
          className="absolute rounded-lg bg-slate-400/40"
          style={{ left: stagingArea.x, top: stagingArea.y, width: stagingArea.width, height: stagingArea.height }}
        />

        {preview && <PreviewCanvas image={preview} area={layout.previewArea} gridSize={snapshot.gridSize} />}

        <InfoPanel area={layout.infoArea} stats={stats} onNewGame={newGame} />

        {/* Pieces, bottom to top */}
        {pieces.map((piece, index) => (
          <PieceCanvas
            key={piece.id}
            piece={piece}
            layer={index + 1}
            animatePosition={isScattering}
            animationDuration={SCATTER_ANIMATION_MS}
          />
        ))}

        {stats.isCompleted && !stats.isFailed && <Confetti key={round} area={playArea} />}

        {stats.isCompleted && (
          <div
            className="absolute flex flex-col items-center justify-center gap-2 rounded-xl bg-black/70 px-8 py-6"
            style={{ left: playArea.x + playArea.width / 2, top: playArea.y + playArea.height / 2, transform: 'translate(-50%, -50%)', zIndex: 200 }}
          >
            {previewUrl && <img src={previewUrl} alt="Finished picture" className="rounded" />}
            <div className="text-2xl font-bold">
              {stats.isFailed ? (stats.mode === 'timed' ? "Time's up!" : 'Out of moves!') : 'Puzzle complete!'}
            </div>
            <div>
              {stats.moveCount} moves, {formatClock(stats.elapsedTime)}, {stats.completionPercentage.toFixed(0)}%
            </div>
            <div className="text-sm text-slate-300">Press N for a new game</div>
          </div>
        )}
      </main>
    </div>
  );
}
