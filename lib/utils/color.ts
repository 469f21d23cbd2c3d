/**
 * Color encoding helpers.
 *
 * The persisted form is `#RRGGBBAA` (uppercase). It is part of the settings
 * format: changing it requires a DESIGN_SETTINGS_VERSION bump.
 */

import type { Color } from '../types/design';

const HEX_COLOR = /^#([0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i;

// Channels are rounded and clamped to 0-255 before writing
function clampChannel(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(255, Math.max(0, Math.round(value)));
}

function channelHex(value: number): string {
  return clampChannel(value).toString(16).padStart(2, '0').toUpperCase();
}

export function formatColorHex(color: Color): string {
  return `#${channelHex(color.r)}${channelHex(color.g)}${channelHex(color.b)}${channelHex(color.a)}`;
}

/**
 * Parse `#RGB`, `#RRGGBB` or `#RRGGBBAA`. Missing alpha means opaque.
 */
export function parseColorHex(value: string): Color | null {
  const match = HEX_COLOR.exec(value.trim());
  if (!match) return null;

  let hex = match[1];
  if (hex.length === 3) {
    hex = hex.split('').map((c) => c + c).join('');
  }
  if (hex.length === 6) {
    hex += 'FF';
  }

  return {
    r: parseInt(hex.slice(0, 2), 16),
    g: parseInt(hex.slice(2, 4), 16),
    b: parseInt(hex.slice(4, 6), 16),
    a: parseInt(hex.slice(6, 8), 16),
  };
}

/**
 * SVG and PDF want the color and its opacity as separate attributes.
 */
export function colorToPaint(color: Color): { color: string; opacity: number } {
  const rgb = `#${channelHex(color.r)}${channelHex(color.g)}${channelHex(color.b)}`;
  return { color: rgb, opacity: Math.round((clampChannel(color.a) / 255) * 10000) / 10000 };
}
