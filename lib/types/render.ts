/**
 * Rendering Types
 *
 * The drawing protocol every render target implements, and the shapes of
 * export results.
 */

import type { Fill } from './design';
import type { Rect } from './qr';
import type { QrPath } from '../services/pathBuilder';

/**
 * Minimal 2D drawing surface. A QR document draws in three steps:
 * background rectangle, foreground path, then an optional logo image.
 */
export interface QrDrawingContext {
  fillRect(rect: Rect, fill: Fill): void;
  /** `path` is already positioned in context coordinates */
  fillPath(path: QrPath, fill: Fill): void;
  drawImage(image: string, rect: Rect): void;
}

export interface RasterImage {
  /** Device pixels */
  width: number;
  height: number;
  scale: number;
  png: Buffer;
}
