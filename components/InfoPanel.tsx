import React from 'react';
import type { Rect, SessionStats } from '../types';
import { MODE_LABELS } from '../constants';
import { formatClock } from '../utils/session';

interface Props {
  area: Rect;
  stats: SessionStats;
  onNewGame: () => void;
}

export const InfoPanel: React.FC<Props> = ({ area, stats, onNewGame }) => {
  const remaining = stats.timeLimit === null ? null : Math.max(0, stats.timeLimit - stats.elapsedTime);

  return (
    <div
      className="absolute rounded-lg bg-slate-800/80 p-4 text-sm flex flex-col gap-2"
      style={{ left: area.x, top: area.y, width: area.width, height: area.height }}
    >
      <div className="font-bold text-base">{MODE_LABELS[stats.mode]}</div>
      <div>Time: {formatClock(stats.elapsedTime)}{remaining !== null && ` (left ${formatClock(remaining)})`}</div>
      <div>Moves: {stats.moveCount}{stats.moveLimit !== null && ` / ${stats.moveLimit}`}</div>
      <div>Completion: {stats.completionPercentage.toFixed(0)}%</div>
      <div className="h-2 w-full rounded bg-slate-600 overflow-hidden">
        <div className="h-full bg-sky-500" style={{ width: `${stats.completionPercentage}%` }} />
      </div>
      <button
        className="mt-auto rounded bg-sky-600 px-3 py-1 hover:bg-sky-500"
        onClick={onNewGame}
      >
        New Game (N)
      </button>
      <div className="text-xs text-slate-400">Esc drops the held piece, or leaves the puzzle.</div>
    </div>
  );
};
