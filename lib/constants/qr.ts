/**
 * QR Rendering Constants
 *
 * Single source of truth for values shared by the encoder wrapper,
 * the path builder and the exporters.
 */

import { ErrorCorrection } from '../types/qr';

// Standard finder pattern ("locator eye") is 7x7 modules
export const FINDER_SIZE = 7;

// Smallest symbol (version 1) is 21x21 modules
export const MIN_SYMBOL_SIZE = 21;

// Used whenever a level is missing or unrecognised, on construction and on load alike
export const DEFAULT_ERROR_CORRECTION: ErrorCorrection = ErrorCorrection.LOW;

// PDF user space is 72 points per inch
export const POINTS_PER_INCH = 72;
export const DEFAULT_PDF_RESOLUTION = POINTS_PER_INCH;

// Bump when the persisted design encoding changes
export const DESIGN_SETTINGS_VERSION = 1;

// Decimal places kept when writing SVG coordinates
export const SVG_COORDINATE_PRECISION = 4;
