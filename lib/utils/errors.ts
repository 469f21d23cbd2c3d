// SHARED ERROR MODEL - Used across the document, settings and export services

export interface AppErrorJson {
  code: string;
  message: string;
  details?: unknown;
}

export class AppError extends Error {
  code: string;
  metadata?: unknown;

  constructor(code: string, message: string, metadata?: unknown) {
    super(message);
    this.code = code;
    this.metadata = metadata;
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): AppErrorJson {
    return {
      code: this.code,
      message: this.message,
      details: this.metadata
    };
  }
}

// Common error codes
export const ErrorCodes = {
  ENCODING_ERROR: 'ENCODING_ERROR',
  RENDER_ERROR: 'RENDER_ERROR',
  SETTINGS_PARSE_ERROR: 'SETTINGS_PARSE_ERROR',
  INVALID_INPUT: 'INVALID_INPUT'
} as const;

/**
 * The payload cannot be represented at the requested error correction level.
 * Surfaced to the caller of `update`; never retried.
 */
export class EncodingError extends AppError {
  constructor(message: string, metadata?: unknown) {
    super(ErrorCodes.ENCODING_ERROR, message, metadata);
    this.name = 'EncodingError';
  }
}

/**
 * A raster surface or PDF document could not be produced.
 * Export calls log it and return null.
 */
export class RenderError extends AppError {
  constructor(message: string, metadata?: unknown) {
    super(ErrorCodes.RENDER_ERROR, message, metadata);
    this.name = 'RenderError';
  }
}

/**
 * The settings container itself is unusable (not JSON, not an object).
 * Individual bad fields never raise this; they fall back to defaults.
 */
export class SettingsParseError extends AppError {
  constructor(message: string, metadata?: unknown) {
    super(ErrorCodes.SETTINGS_PARSE_ERROR, message, metadata);
    this.name = 'SettingsParseError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
