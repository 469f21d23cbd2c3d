/**
 * Path Builder
 *
 * Converts a module matrix into a fill-able vector path.
 *
 * The path is a list of primitives (rectangles with an optional corner
 * radius, and circles) filled with the even-odd rule. Even-odd lets the
 * locator eyes express their ring as an outer shape plus a hole without
 * caring about winding direction.
 *
 * INVARIANTS:
 * - Pure: same (matrix, size, shapes) = same primitives in the same order
 * - Square shapes cover exactly the dark cells; run merging only shrinks the path
 * - No minimum size; sub-pixel cells are valid
 */

import { FINDER_SIZE, MIN_SYMBOL_SIZE } from '../constants/qr';
import type { Design, EyeShape, PixelShape } from '../types/design';
import type { ModuleMatrix, Rect } from '../types/qr';
import { formatSvgNumber as fmt } from '../utils/formatters';

export type PathPrimitive =
  | { type: 'rect'; x: number; y: number; width: number; height: number; radius: number }
  | { type: 'circle'; cx: number; cy: number; r: number };

export interface QrPath {
  /** Edge of the square the path was built for */
  size: number;
  fillRule: 'evenodd';
  primitives: PathPrimitive[];
}

export type PathShapes = Pick<Design, 'eyeShape' | 'pixelShape'>;

interface CellOrigin {
  row: number;
  col: number;
}

/**
 * Top-left module of each locator eye: top-left, top-right, bottom-left.
 */
export function eyeOrigins(size: number): CellOrigin[] {
  if (size < MIN_SYMBOL_SIZE) return [];
  return [
    { row: 0, col: 0 },
    { row: 0, col: size - FINDER_SIZE },
    { row: size - FINDER_SIZE, col: 0 },
  ];
}

/**
 * Check if a cell is part of a locator eye
 */
export function isEyeCell(row: number, col: number, size: number): boolean {
  if (size < MIN_SYMBOL_SIZE) return false;

  // Top-left eye (0,0) to (6,6)
  if (row < FINDER_SIZE && col < FINDER_SIZE) return true;

  // Top-right eye
  if (row < FINDER_SIZE && col >= size - FINDER_SIZE) return true;

  // Bottom-left eye
  if (row >= size - FINDER_SIZE && col < FINDER_SIZE) return true;

  return false;
}

function rect(x: number, y: number, width: number, height: number, radius = 0): PathPrimitive {
  return { type: 'rect', x, y, width, height, radius };
}

/**
 * Horizontal runs of dark cells in one row, limited to [fromCol, toCol).
 */
function rowRuns(
  matrix: ModuleMatrix,
  row: number,
  fromCol: number,
  toCol: number,
  include: (row: number, col: number) => boolean
): Array<{ start: number; length: number }> {
  const runs: Array<{ start: number; length: number }> = [];
  let start = -1;
  for (let col = fromCol; col <= toCol; col++) {
    const on = col < toCol && matrix.modules[row][col] && include(row, col);
    if (on && start < 0) {
      start = col;
    } else if (!on && start >= 0) {
      runs.push({ start, length: col - start });
      start = -1;
    }
  }
  return runs;
}

function columnRuns(
  matrix: ModuleMatrix,
  col: number,
  include: (row: number, col: number) => boolean
): Array<{ start: number; length: number }> {
  const runs: Array<{ start: number; length: number }> = [];
  let start = -1;
  for (let row = 0; row <= matrix.size; row++) {
    const on = row < matrix.size && matrix.modules[row][col] && include(row, col);
    if (on && start < 0) {
      start = row;
    } else if (!on && start >= 0) {
      runs.push({ start, length: row - start });
      start = -1;
    }
  }
  return runs;
}

function buildEye(matrix: ModuleMatrix, origin: CellOrigin, cell: number, shape: EyeShape): PathPrimitive[] {
  const x = origin.col * cell;
  const y = origin.row * cell;

  switch (shape.type) {
    case 'square': {
      // Use the matrix itself so coverage matches the dark cells exactly
      const primitives: PathPrimitive[] = [];
      const inEye = () => true;
      for (let row = origin.row; row < origin.row + FINDER_SIZE; row++) {
        for (const run of rowRuns(matrix, row, origin.col, origin.col + FINDER_SIZE, inEye)) {
          primitives.push(rect(run.start * cell, row * cell, run.length * cell, cell));
        }
      }
      return primitives;
    }
    case 'roundedRect': {
      // Outer 7x7, hole 5x5, pupil 3x3
      const outer = FINDER_SIZE * cell;
      return [
        rect(x, y, outer, outer, shape.cornerRadius * (outer / 2)),
        rect(x + cell, y + cell, 5 * cell, 5 * cell, shape.cornerRadius * (5 * cell) / 2),
        rect(x + 2 * cell, y + 2 * cell, 3 * cell, 3 * cell, shape.cornerRadius * (3 * cell) / 2),
      ];
    }
    case 'circle': {
      const cx = x + (FINDER_SIZE / 2) * cell;
      const cy = y + (FINDER_SIZE / 2) * cell;
      return [
        { type: 'circle', cx, cy, r: 3.5 * cell },
        { type: 'circle', cx, cy, r: 2.5 * cell },
        { type: 'circle', cx, cy, r: 1.5 * cell },
      ];
    }
  }
}

function buildPixels(matrix: ModuleMatrix, cell: number, shape: PixelShape): PathPrimitive[] {
  const { size } = matrix;
  const primitives: PathPrimitive[] = [];
  const isData = (row: number, col: number) => !isEyeCell(row, col, size);

  switch (shape.type) {
    case 'square': {
      for (let row = 0; row < size; row++) {
        for (const run of rowRuns(matrix, row, 0, size, isData)) {
          primitives.push(rect(run.start * cell, row * cell, run.length * cell, cell));
        }
      }
      return primitives;
    }
    case 'circle': {
      const r = cell * (0.5 - shape.inset);
      for (let row = 0; row < size; row++) {
        for (let col = 0; col < size; col++) {
          if (!matrix.modules[row][col] || !isData(row, col)) continue;
          primitives.push({ type: 'circle', cx: (col + 0.5) * cell, cy: (row + 0.5) * cell, r });
        }
      }
      return primitives;
    }
    case 'roundedRect': {
      const inset = shape.inset * cell;
      const edge = cell - 2 * inset;
      const radius = shape.cornerRadius * (edge / 2);
      for (let row = 0; row < size; row++) {
        for (let col = 0; col < size; col++) {
          if (!matrix.modules[row][col] || !isData(row, col)) continue;
          primitives.push(rect(col * cell + inset, row * cell + inset, edge, edge, radius));
        }
      }
      return primitives;
    }
    case 'horizontal': {
      const inset = shape.inset * cell;
      const thickness = cell - 2 * inset;
      const radius = shape.cornerRadius * (thickness / 2);
      for (let row = 0; row < size; row++) {
        for (const run of rowRuns(matrix, row, 0, size, isData)) {
          primitives.push(
            rect(run.start * cell + inset, row * cell + inset, run.length * cell - 2 * inset, thickness, radius)
          );
        }
      }
      return primitives;
    }
    case 'vertical': {
      const inset = shape.inset * cell;
      const thickness = cell - 2 * inset;
      const radius = shape.cornerRadius * (thickness / 2);
      for (let col = 0; col < size; col++) {
        for (const run of columnRuns(matrix, col, isData)) {
          primitives.push(
            rect(col * cell + inset, run.start * cell + inset, thickness, run.length * cell - 2 * inset, radius)
          );
        }
      }
      return primitives;
    }
  }
}

/**
 * Build the foreground path for a square of edge `targetSize`.
 */
export function buildPath(matrix: ModuleMatrix, targetSize: number, shapes: PathShapes): QrPath {
  if (matrix.size === 0) {
    return { size: targetSize, fillRule: 'evenodd', primitives: [] };
  }

  const cell = targetSize / matrix.size;
  const primitives: PathPrimitive[] = [];

  for (const origin of eyeOrigins(matrix.size)) {
    primitives.push(...buildEye(matrix, origin, cell, shapes.eyeShape));
  }
  primitives.push(...buildPixels(matrix, cell, shapes.pixelShape));

  return { size: targetSize, fillRule: 'evenodd', primitives };
}

export function translatePath(path: QrPath, dx: number, dy: number): QrPath {
  return {
    ...path,
    primitives: path.primitives.map((p) =>
      p.type === 'rect' ? { ...p, x: p.x + dx, y: p.y + dy } : { ...p, cx: p.cx + dx, cy: p.cy + dy }
    ),
  };
}

/**
 * Smallest rectangle containing every primitive, or null for an empty path.
 */
export function pathBounds(path: QrPath): Rect | null {
  if (path.primitives.length === 0) return null;

  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of path.primitives) {
    const [left, top, right, bottom] =
      p.type === 'rect'
        ? [p.x, p.y, p.x + p.width, p.y + p.height]
        : [p.cx - p.r, p.cy - p.r, p.cx + p.r, p.cy + p.r];
    minX = Math.min(minX, left);
    minY = Math.min(minY, top);
    maxX = Math.max(maxX, right);
    maxY = Math.max(maxY, bottom);
  }
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

function primitiveContains(p: PathPrimitive, x: number, y: number): boolean {
  if (p.type === 'circle') {
    const dx = x - p.cx;
    const dy = y - p.cy;
    return dx * dx + dy * dy <= p.r * p.r;
  }

  const r = Math.min(p.radius, p.width / 2, p.height / 2);
  if (r <= 0) {
    // Half-open, so an edge shared by two abutting rects counts once
    return x >= p.x && x < p.x + p.width && y >= p.y && y < p.y + p.height;
  }

  if (x < p.x || x > p.x + p.width || y < p.y || y > p.y + p.height) return false;

  // Only the corner squares can exclude the point
  const cx = Math.min(Math.max(x, p.x + r), p.x + p.width - r);
  const cy = Math.min(Math.max(y, p.y + r), p.y + p.height - r);
  const dx = x - cx;
  const dy = y - cy;
  return dx * dx + dy * dy <= r * r;
}

/**
 * Even-odd hit test.
 */
export function pathContainsPoint(path: QrPath, x: number, y: number): boolean {
  let hits = 0;
  for (const p of path.primitives) {
    if (primitiveContains(p, x, y)) hits++;
  }
  return hits % 2 === 1;
}

function primitiveToSvgData(p: PathPrimitive): string {
  if (p.type === 'circle') {
    const { cx, cy, r } = p;
    return `M${fmt(cx - r)} ${fmt(cy)}A${fmt(r)} ${fmt(r)} 0 1 0 ${fmt(cx + r)} ${fmt(cy)}A${fmt(r)} ${fmt(r)} 0 1 0 ${fmt(cx - r)} ${fmt(cy)}Z`;
  }

  const { x, y, width: w, height: h } = p;
  const r = Math.min(p.radius, w / 2, h / 2);
  if (r <= 0) {
    return `M${fmt(x)} ${fmt(y)}h${fmt(w)}v${fmt(h)}h${fmt(-w)}Z`;
  }

  const arc = `A${fmt(r)} ${fmt(r)} 0 0 1`;
  return (
    `M${fmt(x + r)} ${fmt(y)}H${fmt(x + w - r)}${arc} ${fmt(x + w)} ${fmt(y + r)}` +
    `V${fmt(y + h - r)}${arc} ${fmt(x + w - r)} ${fmt(y + h)}` +
    `H${fmt(x + r)}${arc} ${fmt(x)} ${fmt(y + h - r)}` +
    `V${fmt(y + r)}${arc} ${fmt(x + r)} ${fmt(y)}Z`
  );
}

/**
 * SVG path data (`d` attribute). Pair with `fill-rule="evenodd"`.
 */
export function pathToSvgData(path: QrPath): string {
  return path.primitives.map(primitiveToSvgData).join('');
}
