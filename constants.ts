import type { GameMode, GridSize, Size } from './types';

export const DEFAULT_SCREEN_SIZE: Size = { width: 1400, height: 900 };

// Layout ratios
export const PLAY_AREA_WIDTH_RATIO = 0.65;
export const STAGING_WIDTH_RATIO = 0.30;
export const STAGING_HEIGHT_RATIO = 0.5; // Share of the side column's height
export const MARGIN = 20;
export const PREVIEW_MAX_SIZE = 200;

export const SNAP_THRESHOLD = 40; // Pixels

// Mode budgets
export const SECONDS_PER_PIECE = 30;
export const MOVES_PER_PIECE = 3;

export const GRID_OPTIONS: GridSize[] = [
  { rows: 2, cols: 3 },
  { rows: 3, cols: 3 },
  { rows: 3, cols: 4 },
  { rows: 4, cols: 4 },
  { rows: 4, cols: 5 },
  { rows: 5, cols: 5 },
];

export const GAME_MODES: GameMode[] = ['free', 'timed', 'challenge'];

export const MODE_LABELS: Record<GameMode, string> = {
  free: 'Free Play',
  timed: 'Time Attack',
  challenge: 'Challenge',
};

export const SUPPORTED_FORMATS = ['.png', '.jpg', '.jpeg', '.bmp', '.webp'];
