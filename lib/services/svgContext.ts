/**
 * SVG Drawing Context
 *
 * Collects drawing calls into a standalone SVG document. This is the
 * vector form every export goes through: resvg rasterizes it for PNG
 * output and svg-to-pdfkit places it on a PDF page.
 */

import type { Fill, GradientStop } from '../types/design';
import type { Size, Rect } from '../types/qr';
import type { QrDrawingContext } from '../types/render';
import { pathToSvgData, type QrPath } from './pathBuilder';
import { colorToPaint } from '../utils/color';
import { escapeXml, formatSvgNumber as fmt } from '../utils/formatters';

export class SvgContext implements QrDrawingContext {
  private readonly defs: string[] = [];
  private readonly elements: string[] = [];
  private gradientCount = 0;

  fillRect(rect: Rect, fill: Fill): void {
    this.elements.push(
      `<rect x="${fmt(rect.x)}" y="${fmt(rect.y)}" width="${fmt(rect.width)}" height="${fmt(rect.height)}" ${this.paint(fill)}/>`
    );
  }

  fillPath(path: QrPath, fill: Fill): void {
    if (path.primitives.length === 0) return;
    this.elements.push(`<path d="${pathToSvgData(path)}" fill-rule="evenodd" ${this.paint(fill)}/>`);
  }

  drawImage(image: string, rect: Rect): void {
    // xlink:href for compatibility with resvg and svg-to-pdfkit
    this.elements.push(
      `<image xlink:href="${escapeXml(image)}" x="${fmt(rect.x)}" y="${fmt(rect.y)}" width="${fmt(rect.width)}" height="${fmt(rect.height)}" preserveAspectRatio="xMidYMid meet"/>`
    );
  }

  toSvg(size: Size): string {
    const width = fmt(size.width);
    const height = fmt(size.height);
    const defs = this.defs.length > 0 ? `<defs>${this.defs.join('')}</defs>` : '';
    return (
      `<svg xmlns="http://www.w3.org/2000/svg" xmlns:xlink="http://www.w3.org/1999/xlink" ` +
      `width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">` +
      `${defs}${this.elements.join('')}</svg>`
    );
  }

  private paint(fill: Fill): string {
    switch (fill.type) {
      case 'solid': {
        const { color, opacity } = colorToPaint(fill.color);
        return opacity < 1 ? `fill="${color}" fill-opacity="${opacity}"` : `fill="${color}"`;
      }
      case 'linear': {
        const id = this.nextGradientId();
        this.defs.push(
          `<linearGradient id="${id}" x1="${fmt(fill.start.x)}" y1="${fmt(fill.start.y)}" x2="${fmt(fill.end.x)}" y2="${fmt(fill.end.y)}">` +
            `${stopsToSvg(fill.stops)}</linearGradient>`
        );
        return `fill="url(#${id})"`;
      }
      case 'radial': {
        const id = this.nextGradientId();
        this.defs.push(
          `<radialGradient id="${id}" cx="${fmt(fill.center.x)}" cy="${fmt(fill.center.y)}" r="${fmt(fill.radius)}">` +
            `${stopsToSvg(fill.stops)}</radialGradient>`
        );
        return `fill="url(#${id})"`;
      }
    }
  }

  private nextGradientId(): string {
    this.gradientCount += 1;
    return `qrFill${this.gradientCount}`;
  }
}

function stopsToSvg(stops: GradientStop[]): string {
  return stops
    .map((stop) => {
      const { color, opacity } = colorToPaint(stop.color);
      return `<stop offset="${fmt(stop.offset)}" stop-color="${color}" stop-opacity="${opacity}"/>`;
    })
    .join('');
}
