/**
 * QR Design Types
 *
 * Presentational configuration applied on top of the module matrix.
 * Every field has its own default; a design with no explicit settings
 * renders as black square modules on white.
 *
 * DESIGN LAWS:
 * - Shapes and fills are closed tagged unions, not open class hierarchies
 * - A design never references the document it is rendered with
 * - Gradient points are normalized to the bounding box of the filled region
 */

import type { Point, Rect } from './qr';

/**
 * sRGB color, every channel an integer in 0-255 (alpha included).
 */
export interface Color {
  r: number;
  g: number;
  b: number;
  a: number;
}

export interface GradientStop {
  /** Position along the gradient, 0-1 */
  offset: number;
  color: Color;
}

export type Fill =
  | { type: 'solid'; color: Color }
  | { type: 'linear'; start: Point; end: Point; stops: GradientStop[] }
  | { type: 'radial'; center: Point; radius: number; stops: GradientStop[] };

/**
 * Geometry for a data ("on") module.
 *
 * - square: full cell, horizontal runs merged into single rectangles
 * - circle: one circle per cell
 * - roundedRect: one rounded square per cell
 * - horizontal / vertical: runs along the axis merged into one rounded bar
 *
 * `inset` is a fraction of the cell edge removed from each side (0 to <0.5).
 * `cornerRadius` is a fraction of the largest possible radius (0-1).
 */
export type PixelShape =
  | { type: 'square' }
  | { type: 'circle'; inset: number }
  | { type: 'roundedRect'; inset: number; cornerRadius: number }
  | { type: 'horizontal'; inset: number; cornerRadius: number }
  | { type: 'vertical'; inset: number; cornerRadius: number };

/**
 * Geometry for the three 7x7 locator eyes.
 */
export type EyeShape =
  | { type: 'square' }
  | { type: 'roundedRect'; cornerRadius: number }
  | { type: 'circle' };

/**
 * Overlay image placed over the symbol.
 * `rect` is normalized to the symbol square, [0,1] x [0,1].
 * `image` is passed to the renderer untouched (data URL or file path).
 */
export interface LogoPlacement {
  rect: Rect;
  image: string;
}

export interface Design {
  foreground: Fill;
  background: Fill;
  eyeShape: EyeShape;
  pixelShape: PixelShape;
  logo: LogoPlacement | null;
}

export const BLACK: Color = { r: 0, g: 0, b: 0, a: 255 };
export const WHITE: Color = { r: 255, g: 255, b: 255, a: 255 };

export function solidFill(color: Color): Fill {
  return { type: 'solid', color: { ...color } };
}

/**
 * Fresh default design. Returned objects are never shared between callers.
 */
export function defaultDesign(): Design {
  return {
    foreground: solidFill(BLACK),
    background: solidFill(WHITE),
    eyeShape: { type: 'square' },
    pixelShape: { type: 'square' },
    logo: null,
  };
}
