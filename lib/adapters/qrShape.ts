/**
 * Shape adapter: the foreground of a document as SVG path data fitted into
 * an arbitrary rectangle, for hosts that compose their own scene.
 */

import type { QrDocument } from '../services/qrDocument';
import { pathToSvgData, translatePath, type PathShapes } from '../services/pathBuilder';
import type { Rect } from '../types/qr';

export function qrShapePath(document: QrDocument, rect: Rect, shapes: PathShapes = document.design): string {
  const side = Math.min(rect.width, rect.height);
  const path = document.path(side, { ...document.design, ...shapes });
  return pathToSvgData(
    translatePath(path, rect.x + (rect.width - side) / 2, rect.y + (rect.height - side) / 2)
  );
}
