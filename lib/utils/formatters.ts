// Formatting utilities for SVG output and settings JSON

import { SVG_COORDINATE_PRECISION } from '../constants/qr';

export function formatSvgNumber(value: number): string {
  return Number(value.toFixed(SVG_COORDINATE_PRECISION)).toString();
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Deep copy with object keys in sorted order, for stable JSON diffs.
 */
export function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, entry] of entries) {
      sorted[key] = sortKeysDeep(entry);
    }
    return sorted;
  }
  return value;
}
