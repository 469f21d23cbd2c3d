/**
 * QR Content Types
 *
 * Shared types for the content side of a QR document: the error correction
 * level, the module matrix produced by the encoder, and the message
 * formatter capability that turns higher-level inputs into payload bytes.
 */

/**
 * Error correction level.
 * Higher levels survive more damage but need more modules for the same payload.
 */
export enum ErrorCorrection {
  /** ~7% recovery */
  LOW = 'LOW',
  /** ~15% recovery */
  MEDIUM = 'MEDIUM',
  /** ~25% recovery */
  QUANTIZE = 'QUANTIZE',
  /** ~30% recovery */
  HIGH = 'HIGH',
}

/**
 * Single character code used in persisted settings.
 */
export type ErrorCorrectionCode = 'L' | 'M' | 'Q' | 'H';

const CODE_BY_LEVEL: Record<ErrorCorrection, ErrorCorrectionCode> = {
  [ErrorCorrection.LOW]: 'L',
  [ErrorCorrection.MEDIUM]: 'M',
  [ErrorCorrection.QUANTIZE]: 'Q',
  [ErrorCorrection.HIGH]: 'H',
};

const LEVEL_BY_CODE: Record<ErrorCorrectionCode, ErrorCorrection> = {
  L: ErrorCorrection.LOW,
  M: ErrorCorrection.MEDIUM,
  Q: ErrorCorrection.QUANTIZE,
  H: ErrorCorrection.HIGH,
};

/**
 * Ordered as the view adapter exposes them through an integer index.
 */
export const ERROR_CORRECTION_ORDER: readonly ErrorCorrection[] = [
  ErrorCorrection.LOW,
  ErrorCorrection.MEDIUM,
  ErrorCorrection.QUANTIZE,
  ErrorCorrection.HIGH,
];

export function errorCorrectionCode(level: ErrorCorrection): ErrorCorrectionCode {
  return CODE_BY_LEVEL[level];
}

function isErrorCorrectionCode(value: string): value is ErrorCorrectionCode {
  return value === 'L' || value === 'M' || value === 'Q' || value === 'H';
}

/**
 * Resolve a persisted code. Only the first character is significant,
 * matching is case-insensitive. Returns null for anything unrecognised.
 */
export function errorCorrectionFromCode(code: string): ErrorCorrection | null {
  const first = code.charAt(0).toUpperCase();
  return isErrorCorrectionCode(first) ? LEVEL_BY_CODE[first] : null;
}

/**
 * Square grid of modules, `modules[row][col] === true` for a dark module.
 * The empty payload is represented by `size === 0`.
 */
export interface ModuleMatrix {
  readonly size: number;
  readonly modules: readonly (readonly boolean[])[];
}

export const EMPTY_MATRIX: ModuleMatrix = { size: 0, modules: [] };

/**
 * Anything that can produce payload bytes for a QR document.
 */
export interface QrMessageFormatter {
  toPayloadBytes(): Uint8Array;
}

export interface Size {
  width: number;
  height: number;
}

export interface Point {
  x: number;
  y: number;
}

export interface Rect extends Point, Size {}
