/**
 * QR Export Service
 *
 * Turns rendered SVG into deliverable bytes.
 * Uses resvg for SVG → PNG conversion and pdfkit + svg-to-pdfkit for
 * vector PDF generation.
 *
 * Failures never throw: they are logged as RenderError and surface as null.
 * Renderers and PDF documents live only for the duration of one call.
 */

import { Resvg } from '@resvg/resvg-js';
import PDFDocument from 'pdfkit';
import SVGtoPDF from 'svg-to-pdfkit';
import { RENDER_CONFIG } from '../config/render';
import type { Size } from '../types/qr';
import type { RasterImage } from '../types/render';
import { RenderError, errorMessage } from '../utils/errors';

function isUsableDimension(value: number): boolean {
  return Number.isFinite(value) && value >= 1 && value <= RENDER_CONFIG.maxRasterDimension;
}

/**
 * Rasterize an SVG document to PNG at `size × scale` device pixels.
 */
export function renderSvgToPng(svg: string, size: Size, scale: number): RasterImage | null {
  const pixelWidth = Math.round(size.width * scale);
  const pixelHeight = Math.round(size.height * scale);

  if (!isUsableDimension(pixelWidth) || !isUsableDimension(pixelHeight)) {
    const error = new RenderError('Raster surface size out of range', {
      pixelWidth,
      pixelHeight,
      max: RENDER_CONFIG.maxRasterDimension,
    });
    console.error('[qrExport] Cannot allocate raster surface:', error.toJSON());
    return null;
  }

  try {
    const resvg = new Resvg(svg, {
      fitTo: {
        mode: 'width',
        value: pixelWidth,
      },
      font: {
        loadSystemFonts: false,
      },
      shapeRendering: 2, // geometricPrecision
    });
    const rendered = resvg.render();

    if (RENDER_CONFIG.verboseLogging) {
      console.log('[qrExport] Rasterized:', { width: rendered.width, height: rendered.height, scale });
    }

    return {
      width: rendered.width,
      height: rendered.height,
      scale,
      png: rendered.asPng(),
    };
  } catch (err) {
    const error = new RenderError('SVG rasterization failed', { reason: errorMessage(err) });
    console.error('[qrExport] SVG rasterization failed:', error.toJSON());
    return null;
  }
}

/**
 * Place an SVG document on a single PDF page of `page` points, as vectors.
 */
export async function renderSvgToPdf(svg: string, page: Size): Promise<Buffer | null> {
  if (!(page.width > 0 && page.height > 0 && Number.isFinite(page.width) && Number.isFinite(page.height))) {
    const error = new RenderError('PDF page size out of range', { ...page });
    console.error('[qrExport] Cannot create PDF page:', error.toJSON());
    return null;
  }

  try {
    return await new Promise<Buffer>((resolve, reject) => {
      const chunks: Buffer[] = [];

      const doc = new PDFDocument({
        size: [page.width, page.height],
        margin: 0,
        info: {
          Title: RENDER_CONFIG.pdf.title,
          Creator: RENDER_CONFIG.pdf.creator,
          ...(RENDER_CONFIG.pdf.author ? { Author: RENDER_CONFIG.pdf.author } : {}),
        },
      });

      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);

      SVGtoPDF(doc, svg, 0, 0, {
        width: page.width,
        height: page.height,
        preserveAspectRatio: 'xMidYMid meet',
        warningCallback: (message: string) => console.warn('[qrExport] svg-to-pdfkit:', message),
      });

      doc.end();
    });
  } catch (err) {
    const error = new RenderError('PDF generation failed', { reason: errorMessage(err) });
    console.error('[qrExport] PDF generation failed:', error.toJSON());
    return null;
  }
}
