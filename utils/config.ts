import { z } from 'zod';
import {
  DEFAULT_SCREEN_SIZE,
  GRID_OPTIONS,
  MARGIN,
  MOVES_PER_PIECE,
  PLAY_AREA_WIDTH_RATIO,
  PREVIEW_MAX_SIZE,
  SECONDS_PER_PIECE,
  SNAP_THRESHOLD,
  STAGING_HEIGHT_RATIO,
  STAGING_WIDTH_RATIO,
} from '../constants';
import { ConfigError } from './errors';

const ratio = z.number().gt(0).lte(1);
const gridSchema = z.object({
  rows: z.number().int().positive(),
  cols: z.number().int().positive(),
});

export const GameConfigSchema = z.object({
  gridOptions: z.array(gridSchema).min(1).default(GRID_OPTIONS),
  snapThreshold: z.number().nonnegative().default(SNAP_THRESHOLD),
  secondsPerPiece: z.number().positive().default(SECONDS_PER_PIECE),
  movesPerPiece: z.number().int().positive().default(MOVES_PER_PIECE),
  playAreaWidthRatio: ratio.default(PLAY_AREA_WIDTH_RATIO),
  stagingWidthRatio: ratio.default(STAGING_WIDTH_RATIO),
  stagingHeightRatio: ratio.default(STAGING_HEIGHT_RATIO),
  margin: z.number().int().nonnegative().default(MARGIN),
  previewMaxSize: z.number().int().positive().default(PREVIEW_MAX_SIZE),
  screenSize: z
    .object({
      width: z.number().int().positive(),
      height: z.number().int().positive(),
    })
    .default(DEFAULT_SCREEN_SIZE),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type GameConfig = z.infer<typeof GameConfigSchema>;

/**
 * Validates user supplied settings and fills in defaults for anything missing.
 * Throws a ConfigError listing every offending field.
 */
export const parseGameConfig = (input: unknown = {}): GameConfig => {
  const result = GameConfigSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid game config: ${details}`);
  }
  if (result.data.playAreaWidthRatio + result.data.stagingWidthRatio > 1) {
    throw new ConfigError('Invalid game config: playAreaWidthRatio + stagingWidthRatio must not exceed 1');
  }
  return result.data;
};

export const DEFAULT_CONFIG: GameConfig = parseGameConfig();

// Vite exposes VITE_* variables on import.meta.env; anything unset keeps its default.
export const configFromEnv = (env: Record<string, unknown>): GameConfig => {
  const str = (key: string) => {
    const raw = env[key];
    return typeof raw === 'string' && raw !== '' ? raw : undefined;
  };
  const num = (key: string) => {
    const raw = str(key);
    return raw === undefined ? undefined : Number(raw);
  };
  return parseGameConfig({
    snapThreshold: num('VITE_SNAP_THRESHOLD'),
    secondsPerPiece: num('VITE_SECONDS_PER_PIECE'),
    movesPerPiece: num('VITE_MOVES_PER_PIECE'),
    logLevel: str('VITE_LOG_LEVEL'),
  });
};
