/**
 * QR Document
 *
 * Aggregate root for a styled QR code: payload bytes, error correction
 * level, design, and the module matrix derived from the first two.
 *
 * INVARIANTS:
 * - The matrix always matches (payload, errorCorrection); every mutator
 *   regenerates it before returning
 * - A failed update leaves payload, level and matrix untouched
 * - Design changes never regenerate the matrix
 * - Rendering and export calls never mutate the document
 * - Stored and per-call designs are normalized, so settings() always reloads
 *   to the same design
 */

import { DEFAULT_ERROR_CORRECTION, DEFAULT_PDF_RESOLUTION, POINTS_PER_INCH } from '../constants/qr';
import { RENDER_CONFIG } from '../config/render';
import { defaultDesign, solidFill, type Design, type Fill } from '../types/design';
import {
  EMPTY_MATRIX,
  ErrorCorrection,
  errorCorrectionCode,
  type ErrorCorrectionCode,
  type ModuleMatrix,
  type QrMessageFormatter,
  type Rect,
  type Size,
} from '../types/qr';
import type { QrDrawingContext, RasterImage } from '../types/render';
import {
  designFromSettings,
  designSettings,
  isPlainObject,
  normalizeDesign,
  type DesignSettings,
} from './designSettings';
import { asciiRepresentation, generateMatrix, smallAsciiRepresentation } from './matrixEngine';
import { buildPath, translatePath, type QrPath } from './pathBuilder';
import { renderSvgToPdf, renderSvgToPng } from './qrExport';
import { SvgContext } from './svgContext';
import { EncodingError, SettingsParseError, errorMessage } from '../utils/errors';
import { sortKeysDeep } from '../utils/formatters';
import { base64Schema, errorCorrectionSchema } from '../utils/validators';

export interface SettingsDocument {
  data: string;
  correction: ErrorCorrectionCode;
  design: DesignSettings;
}

export interface JsonStringOptions {
  pretty?: boolean;
  sortedKeys?: boolean;
}

function cloneDesign(design: Design): Design {
  return structuredClone(design);
}

// A gradient restarted over the logo rect would not line up with the one behind it
function logoBackdrop(fill: Fill): Fill {
  return fill.type === 'solid' ? fill : solidFill(fill.stops[0].color);
}

export class QrDocument {
  private _payload: Uint8Array = new Uint8Array(0);
  private _errorCorrection: ErrorCorrection = DEFAULT_ERROR_CORRECTION;
  private _design: Design = defaultDesign();
  private _matrix: ModuleMatrix = EMPTY_MATRIX;

  // ============================================
  // STATE
  // ============================================

  /** Copy of the payload bytes */
  get payload(): Uint8Array {
    return this._payload.slice();
  }

  get errorCorrection(): ErrorCorrection {
    return this._errorCorrection;
  }

  /** Copy of the stored design */
  get design(): Design {
    return cloneDesign(this._design);
  }

  get matrix(): ModuleMatrix {
    return this._matrix;
  }

  /**
   * Matrix side length in modules. Rendering below this many device pixels
   * per side makes modules sub-pixel.
   */
  get pixelSize(): number {
    return this._matrix.size;
  }

  asciiRepresentation(): string {
    return asciiRepresentation(this._matrix);
  }

  smallAsciiRepresentation(): string {
    return smallAsciiRepresentation(this._matrix);
  }

  // ============================================
  // MUTATORS
  // ============================================

  /**
   * Replace payload and level, regenerating the matrix.
   *
   * @throws EncodingError if the payload does not fit at the level
   */
  update(payload: Uint8Array, errorCorrection: ErrorCorrection): void {
    const bytes = Uint8Array.from(payload);
    const matrix = generateMatrix(bytes, errorCorrection);

    this._payload = bytes;
    this._errorCorrection = errorCorrection;
    this._matrix = matrix;

    if (RENDER_CONFIG.verboseLogging) {
      console.log('[qrDocument] Regenerated matrix:', {
        bytes: bytes.length,
        correction: errorCorrectionCode(errorCorrection),
        size: matrix.size,
      });
    }
  }

  updateText(text: string, errorCorrection: ErrorCorrection = DEFAULT_ERROR_CORRECTION): void {
    this.update(new TextEncoder().encode(text), errorCorrection);
  }

  updateMessage(message: QrMessageFormatter, errorCorrection: ErrorCorrection = DEFAULT_ERROR_CORRECTION): void {
    this.update(message.toPayloadBytes(), errorCorrection);
  }

  setPayload(payload: Uint8Array): void {
    this.update(payload, this._errorCorrection);
  }

  setErrorCorrection(errorCorrection: ErrorCorrection): void {
    this.update(this._payload, errorCorrection);
  }

  /**
   * @throws AppError(INVALID_INPUT) if a field would not survive save and load
   */
  setDesign(design: Design): void {
    this._design = normalizeDesign(design);
  }

  // ============================================
  // RENDERING
  // ============================================

  /**
   * Foreground path for a square of edge `size`.
   */
  path(size: number, design?: Design): QrPath {
    return buildPath(this._matrix, size, this.resolveDesign(design));
  }

  /**
   * Background over `rect`, then the foreground centered in it, then the logo.
   * `design` overrides the stored design for this call only.
   */
  draw(ctx: QrDrawingContext, rect: Rect, override?: Design): void {
    const design = this.resolveDesign(override);
    ctx.fillRect(rect, design.background);

    const side = Math.min(rect.width, rect.height);
    const originX = rect.x + (rect.width - side) / 2;
    const originY = rect.y + (rect.height - side) / 2;

    ctx.fillPath(translatePath(this.path(side, design), originX, originY), design.foreground);

    if (design.logo) {
      const logoRect: Rect = {
        x: originX + design.logo.rect.x * side,
        y: originY + design.logo.rect.y * side,
        width: design.logo.rect.width * side,
        height: design.logo.rect.height * side,
      };
      // Clear the modules under the logo
      ctx.fillRect(logoRect, logoBackdrop(design.background));
      ctx.drawImage(design.logo.image, logoRect);
    }
  }

  /**
   * Standalone SVG document of `size` user units.
   */
  svg(size: Size, design?: Design): string {
    const ctx = new SvgContext();
    this.draw(ctx, { x: 0, y: 0, width: size.width, height: size.height }, design);
    return ctx.toSvg(size);
  }

  /**
   * PNG of `size × scale` device pixels, or null if the surface cannot be produced.
   */
  rasterize(size: Size, scale: number = 1, design?: Design): RasterImage | null {
    return renderSvgToPng(this.svg(size, design), size, scale);
  }

  /**
   * Single-page vector PDF. The page measures `size` at `resolution`
   * units per inch, i.e. `size × 72 / resolution` points.
   */
  async pdf(
    size: Size,
    resolution: number = DEFAULT_PDF_RESOLUTION,
    design?: Design
  ): Promise<Buffer | null> {
    const factor = POINTS_PER_INCH / resolution;
    const page: Size = { width: size.width * factor, height: size.height * factor };
    return renderSvgToPdf(this.svg(size, design), page);
  }

  /**
   * Build a document from text and rasterize it in one step.
   */
  static image(
    text: string,
    size: Size,
    options: { errorCorrection?: ErrorCorrection; scale?: number; design?: Design } = {}
  ): RasterImage | null {
    const doc = new QrDocument();
    doc.updateText(text, options.errorCorrection ?? DEFAULT_ERROR_CORRECTION);
    return doc.rasterize(size, options.scale ?? 1, options.design);
  }

  private resolveDesign(override?: Design): Design {
    return override ? normalizeDesign(override) : this._design;
  }

  // ============================================
  // SAVE / LOAD
  // ============================================

  /**
   * The current payload, level and design as a plain map.
   */
  settings(): SettingsDocument {
    return {
      correction: errorCorrectionCode(this._errorCorrection),
      data: Buffer.from(this._payload).toString('base64'),
      design: designSettings(this._design),
    };
  }

  /**
   * Build a document from a settings map. Missing or invalid fields keep
   * their defaults; returns null only when `settings` is not an object.
   */
  static create(settings: unknown): QrDocument | null {
    if (!isPlainObject(settings)) {
      const error = new SettingsParseError('Settings must be an object', {
        received: Array.isArray(settings) ? 'array' : typeof settings,
      });
      console.error('[qrSettings] Cannot load document:', error.toJSON());
      return null;
    }

    const doc = new QrDocument();

    let payload = new Uint8Array(0);
    if (settings.data !== undefined) {
      const parsed = base64Schema.safeParse(settings.data);
      if (parsed.success) {
        payload = Uint8Array.from(Buffer.from(parsed.data, 'base64'));
      } else {
        console.warn('[qrSettings] Ignoring invalid data field, using empty payload');
      }
    }

    let errorCorrection = DEFAULT_ERROR_CORRECTION;
    if (settings.correction !== undefined) {
      const parsed = errorCorrectionSchema.safeParse(settings.correction);
      if (parsed.success) {
        errorCorrection = parsed.data;
      } else {
        console.warn('[qrSettings] Unknown correction field, using default:', {
          correction: settings.correction,
          fallback: errorCorrectionCode(DEFAULT_ERROR_CORRECTION),
        });
      }
    }

    try {
      doc.update(payload, errorCorrection);
    } catch (err) {
      if (!(err instanceof EncodingError)) throw err;
      console.warn('[qrSettings] Payload does not fit, using empty payload:', { reason: err.message });
      doc.update(new Uint8Array(0), errorCorrection);
    }

    const design = designFromSettings(settings.design);
    if (design) {
      doc._design = design;
    } else if (settings.design !== undefined) {
      console.warn('[qrSettings] Ignoring design field that is not an object');
    }

    return doc;
  }

  /**
   * Compact JSON of `settings()`.
   */
  jsonData(): Buffer {
    return Buffer.from(this.jsonString(), 'utf8');
  }

  jsonString(options: JsonStringOptions = {}): string {
    const settings = options.sortedKeys ? sortKeysDeep(this.settings()) : this.settings();
    return options.pretty ? JSON.stringify(settings, null, 2) : JSON.stringify(settings);
  }

  /**
   * Parse JSON produced by `jsonData()`/`jsonString()`. Returns null when the
   * input is not JSON or not an object.
   */
  static fromJson(json: string | Uint8Array): QrDocument | null {
    const text = typeof json === 'string' ? json : Buffer.from(json).toString('utf8');

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      const error = new SettingsParseError('Settings JSON is not parseable', { reason: errorMessage(err) });
      console.error('[qrSettings] Cannot load document:', error.toJSON());
      return null;
    }

    return QrDocument.create(parsed);
  }
}
