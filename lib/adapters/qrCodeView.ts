/**
 * QR Code View
 *
 * Headless view model for hosts that display a single QR code: text or
 * binary content, a two-color style and a bounds size. Everything is
 * delegated to a QrDocument it owns; the host is told to redraw through
 * `onInvalidate`.
 */

import { QrDocument } from '../services/qrDocument';
import { BLACK, WHITE, solidFill, type Color, type Design } from '../types/design';
import { ERROR_CORRECTION_ORDER, ErrorCorrection, type QrMessageFormatter, type Size } from '../types/qr';
import type { QrDrawingContext, RasterImage } from '../types/render';

export interface QrCodeViewStyle {
  foregroundColor: Color;
  backgroundColor: Color;
}

export interface QrCodeViewOptions {
  bounds?: Size;
  errorCorrection?: ErrorCorrection;
  onInvalidate?: () => void;
}

export class QrCodeView {
  private readonly document = new QrDocument();
  private readonly onInvalidate?: () => void;
  private _style: QrCodeViewStyle = { foregroundColor: { ...BLACK }, backgroundColor: { ...WHITE } };

  bounds: Size;

  constructor(options: QrCodeViewOptions = {}) {
    this.bounds = options.bounds ?? { width: 0, height: 0 };
    this.onInvalidate = options.onInvalidate;
    if (options.errorCorrection) {
      this.document.setErrorCorrection(options.errorCorrection);
    }
  }

  get data(): Uint8Array {
    return this.document.payload;
  }

  /** Content decoded as UTF-8; invalid sequences become U+FFFD */
  get textContent(): string {
    return new TextDecoder().decode(this.document.payload);
  }

  get errorCorrection(): ErrorCorrection {
    return this.document.errorCorrection;
  }

  /** Position of the level in L, M, Q, H order */
  get correctionLevelIndex(): number {
    return ERROR_CORRECTION_ORDER.indexOf(this.document.errorCorrection);
  }

  get style(): QrCodeViewStyle {
    return { foregroundColor: { ...this._style.foregroundColor }, backgroundColor: { ...this._style.backgroundColor } };
  }

  /** Minimum sensible bounds edge, in device pixels */
  get pixelSize(): number {
    return this.document.pixelSize;
  }

  setData(data: Uint8Array): void {
    this.document.setPayload(data);
    this.invalidate();
  }

  setTextContent(text: string): void {
    this.setData(new TextEncoder().encode(text));
  }

  setMessage(message: QrMessageFormatter): void {
    this.setData(message.toPayloadBytes());
  }

  setErrorCorrection(errorCorrection: ErrorCorrection): void {
    this.document.setErrorCorrection(errorCorrection);
    this.invalidate();
  }

  /**
   * Out-of-range indexes select LOW.
   */
  setCorrectionLevelIndex(index: number): void {
    const valid = Number.isInteger(index) && index >= 0 && index < ERROR_CORRECTION_ORDER.length;
    this.setErrorCorrection(valid ? ERROR_CORRECTION_ORDER[index] : ErrorCorrection.LOW);
  }

  setStyle(style: Partial<QrCodeViewStyle>): void {
    this._style = { ...this._style, ...style };
    this.invalidate();
  }

  draw(ctx: QrDrawingContext): void {
    this.document.draw(ctx, { x: 0, y: 0, width: this.bounds.width, height: this.bounds.height }, this.design());
  }

  render(): string {
    return this.document.svg(this.bounds, this.design());
  }

  snapshot(scale: number = 1): RasterImage | null {
    return this.document.rasterize(this.bounds, scale, this.design());
  }

  /**
   * Render text content straight to an image.
   */
  static image(content: string, size: Size): RasterImage | null {
    const view = new QrCodeView({ bounds: size });
    view.setTextContent(content);
    return view.snapshot();
  }

  private design(): Design {
    return {
      ...this.document.design,
      foreground: solidFill(this._style.foregroundColor),
      background: solidFill(this._style.backgroundColor),
    };
  }

  private invalidate(): void {
    this.onInvalidate?.();
  }
}
