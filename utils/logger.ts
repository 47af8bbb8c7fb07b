export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
}

// Shared by every logger so one setLogLevel call reaches all of them
let threshold: LogLevel = 'info';

export const setLogLevel = (level: LogLevel) => {
  threshold = level;
};

export const getLogLevel = (): LogLevel => threshold;

const enabled = (level: LogLevel) => LEVEL_RANK[level] >= LEVEL_RANK[threshold];

export const createLogger = (tag: string): Logger => {
  const prefix = `[${tag}]`;
  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(prefix, message, ...details);
    },
    info: (message, ...details) => {
      if (enabled('info')) console.info(prefix, message, ...details);
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(prefix, message, ...details);
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(prefix, message, ...details);
    },
  };
};
