/**
 * Matrix Engine
 *
 * Thin wrapper around the `qrcode` encoder. Turns payload bytes and an
 * error correction level into a boolean module matrix.
 *
 * INVARIANTS:
 * - Payload is always encoded as a single byte-mode segment
 * - Deterministic output (same bytes + level = same matrix)
 * - No quiet zone; the matrix is the symbol only
 * - The empty payload maps to the empty matrix without calling the encoder
 */

import * as QRCode from 'qrcode';
import {
  EMPTY_MATRIX,
  ErrorCorrection,
  errorCorrectionCode,
  type ModuleMatrix,
} from '../types/qr';
import { EncodingError, errorMessage } from '../utils/errors';

/**
 * Generate the module matrix for a payload.
 *
 * @throws EncodingError if the payload exceeds the capacity of a version 40
 * symbol at the requested level
 */
export function generateMatrix(payload: Uint8Array, level: ErrorCorrection): ModuleMatrix {
  if (payload.length === 0) {
    return EMPTY_MATRIX;
  }

  let qr: ReturnType<typeof QRCode.create>;
  try {
    qr = QRCode.create([{ data: Buffer.from(payload), mode: 'byte' }], {
      errorCorrectionLevel: errorCorrectionCode(level),
    });
  } catch (error) {
    throw new EncodingError(
      `Payload of ${payload.length} bytes cannot be encoded at level ${errorCorrectionCode(level)}: ${errorMessage(error)}`,
      { byteLength: payload.length, level }
    );
  }

  const size = qr.modules.size;
  const data = qr.modules.data;

  // Convert flat Uint8Array to 2D boolean matrix
  const modules: boolean[][] = [];
  for (let row = 0; row < size; row++) {
    const rowData: boolean[] = [];
    for (let col = 0; col < size; col++) {
      rowData.push(data[row * size + col] === 1);
    }
    modules.push(rowData);
  }

  return { size, modules };
}

export function countOnCells(matrix: ModuleMatrix): number {
  let count = 0;
  for (const row of matrix.modules) {
    for (const cell of row) {
      if (cell) count++;
    }
  }
  return count;
}

export function matricesEqual(a: ModuleMatrix, b: ModuleMatrix): boolean {
  if (a.size !== b.size) return false;
  for (let row = 0; row < a.size; row++) {
    for (let col = 0; col < a.size; col++) {
      if (a.modules[row][col] !== b.modules[row][col]) return false;
    }
  }
  return true;
}

/**
 * Two characters per module, one line per row.
 */
export function asciiRepresentation(matrix: ModuleMatrix): string {
  return matrix.modules
    .map((row) => row.map((on) => (on ? '██' : '  ')).join(''))
    .join('\n');
}

/**
 * Half-height rendering: each character covers two rows of one column.
 */
export function smallAsciiRepresentation(matrix: ModuleMatrix): string {
  const lines: string[] = [];
  for (let row = 0; row < matrix.size; row += 2) {
    let line = '';
    for (let col = 0; col < matrix.size; col++) {
      const top = matrix.modules[row][col];
      const bottom = row + 1 < matrix.size ? matrix.modules[row + 1][col] : false;
      if (top && bottom) line += '█';
      else if (top) line += '▀';
      else if (bottom) line += '▄';
      else line += ' ';
    }
    lines.push(line);
  }
  return lines.join('\n');
}
