export type PuzzleErrorCode =
  | 'IMAGE_NOT_FOUND'
  | 'IMAGE_FORMAT_INVALID'
  | 'INVALID_GRID'
  | 'INVALID_CONFIG';

/**
 * Base class for failures that abort building a puzzle session.
 * Drag and drop never throws these; spurious pointer input is a no-op.
 */
export class PuzzleError extends Error {
  readonly code: PuzzleErrorCode;

  constructor(code: PuzzleErrorCode, message: string) {
    super(message);
    this.name = 'PuzzleError';
    this.code = code;
  }
}

export class ImageNotFoundError extends PuzzleError {
  readonly src: string;

  constructor(src: string) {
    super('IMAGE_NOT_FOUND', `Image file not found: ${src}`);
    this.name = 'ImageNotFoundError';
    this.src = src;
  }
}

export class ImageFormatError extends PuzzleError {
  readonly src: string;

  constructor(src: string) {
    super('IMAGE_FORMAT_INVALID', `Invalid image format: ${src}`);
    this.name = 'ImageFormatError';
    this.src = src;
  }
}

export class InvalidGridError extends PuzzleError {
  constructor(message: string) {
    super('INVALID_GRID', message);
    this.name = 'InvalidGridError';
  }
}

export class ConfigError extends PuzzleError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
    this.name = 'ConfigError';
  }
}

export const isPuzzleError = (e: unknown): e is PuzzleError => e instanceof PuzzleError;
