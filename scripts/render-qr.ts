/**
 * Render a QR code to SVG, PNG or PDF
 *
 * Usage:
 *   tsx scripts/render-qr.ts "<text>" out.png [size]
 *   tsx scripts/render-qr.ts --settings doc.json out.pdf [size]
 *
 * The output format follows the file extension.
 */

import fs from 'fs';
import path from 'path';
import { QrDocument } from '../lib/services/qrDocument';
import { AppError, ErrorCodes } from '../lib/utils/errors';

function loadDocument(args: string[]): { doc: QrDocument; rest: string[] } {
  if (args[0] === '--settings') {
    const file = args[1];
    if (!file) throw new AppError(ErrorCodes.INVALID_INPUT, '--settings requires a file path');
    const doc = QrDocument.fromJson(fs.readFileSync(file));
    if (!doc) throw new AppError(ErrorCodes.INVALID_INPUT, `Could not load settings from ${file}`);
    return { doc, rest: args.slice(2) };
  }

  const doc = new QrDocument();
  doc.updateText(args[0] ?? '');
  return { doc, rest: args.slice(1) };
}

async function main() {
  const { doc, rest } = loadDocument(process.argv.slice(2));
  const [outFile, sizeArg] = rest;
  if (!outFile) {
    console.error('❌ Missing output file');
    process.exit(1);
  }

  const edge = Number(sizeArg ?? 512);
  if (!Number.isFinite(edge) || edge <= 0) {
    throw new AppError(ErrorCodes.INVALID_INPUT, `Invalid size: ${sizeArg}`);
  }
  const size = { width: edge, height: edge };
  const ext = path.extname(outFile).toLowerCase();

  let output: string | Buffer | null;
  if (ext === '.svg') {
    output = doc.svg(size);
  } else if (ext === '.png') {
    output = doc.rasterize(size)?.png ?? null;
  } else if (ext === '.pdf') {
    output = await doc.pdf(size);
  } else if (ext === '.json') {
    output = doc.jsonString({ pretty: true, sortedKeys: true });
  } else {
    throw new AppError(ErrorCodes.INVALID_INPUT, `Unsupported output format: ${ext}`);
  }

  if (!output) {
    console.error('❌ Rendering failed');
    process.exit(1);
  }

  fs.writeFileSync(outFile, output);
  console.log(`✅ Wrote ${outFile} (${doc.pixelSize}x${doc.pixelSize} modules)`);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
