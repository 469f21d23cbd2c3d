import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { QrDocument } from './qrDocument';
import { TextMessage } from './messageFormatters';
import { pathBounds, type QrPath } from './pathBuilder';
import { defaultDesign, type Design, type Fill } from '../types/design';
import { ErrorCorrection, type Rect } from '../types/qr';
import type { QrDrawingContext } from '../types/render';
import { AppError, EncodingError } from '../utils/errors';

type DrawCall =
  | { op: 'fillRect'; rect: Rect; fill: Fill }
  | { op: 'fillPath'; path: QrPath; fill: Fill }
  | { op: 'drawImage'; image: string; rect: Rect };

class RecordingContext implements QrDrawingContext {
  readonly calls: DrawCall[] = [];

  fillRect(rect: Rect, fill: Fill): void {
    this.calls.push({ op: 'fillRect', rect, fill });
  }

  fillPath(path: QrPath, fill: Fill): void {
    this.calls.push({ op: 'fillPath', path, fill });
  }

  drawImage(image: string, rect: Rect): void {
    this.calls.push({ op: 'drawImage', image, rect });
  }
}

function thrownBy(fn: () => void): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

const text = (doc: QrDocument) => new TextDecoder().decode(doc.payload);
const base64 = (value: string) => Buffer.from(value).toString('base64');

const EMPTY_DOCUMENT_JSON =
  '{"correction":"L","data":"","design":{"version":1,' +
  '"foreground":{"type":"solid","color":"#000000FF"},' +
  '"background":{"type":"solid","color":"#FFFFFFFF"},' +
  '"eyeShape":{"type":"square"},"pixelShape":{"type":"square"}}}';

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('QrDocument state', () => {
  it('starts empty at low correction with the default design', () => {
    const doc = new QrDocument();

    expect(doc.payload).toHaveLength(0);
    expect(doc.errorCorrection).toBe(ErrorCorrection.LOW);
    expect(doc.design).toEqual(defaultDesign());
    expect(doc.pixelSize).toBe(0);
  });

  it('regenerates the matrix on update', () => {
    const doc = new QrDocument();
    doc.updateText('HELLO');

    expect(text(doc)).toBe('HELLO');
    expect(doc.pixelSize).toBe(21);
    expect(doc.asciiRepresentation().split('\n')).toHaveLength(21);
  });

  it('grows the symbol when the level rises', () => {
    const doc = new QrDocument();
    doc.updateText('https://example.com/some/longer/path', ErrorCorrection.LOW);
    expect(doc.pixelSize).toBe(29);

    doc.setErrorCorrection(ErrorCorrection.HIGH);
    expect(doc.errorCorrection).toBe(ErrorCorrection.HIGH);
    expect(doc.pixelSize).toBe(37);
  });

  it('accepts messages', () => {
    const doc = new QrDocument();
    doc.updateMessage(new TextMessage('hi'), ErrorCorrection.MEDIUM);

    expect(text(doc)).toBe('hi');
    expect(doc.errorCorrection).toBe(ErrorCorrection.MEDIUM);
  });

  it('leaves the document untouched when an update does not fit', () => {
    const doc = new QrDocument();
    doc.updateText('HELLO');
    const matrix = doc.matrix;

    expect(() => doc.setPayload(new Uint8Array(2954).fill(0x41))).toThrow(EncodingError);
    expect(text(doc)).toBe('HELLO');
    expect(doc.errorCorrection).toBe(ErrorCorrection.LOW);
    expect(doc.matrix).toBe(matrix);
  });

  it('does not regenerate the matrix for design changes', () => {
    const doc = new QrDocument();
    doc.updateText('HELLO');
    const matrix = doc.matrix;

    doc.setDesign({ ...defaultDesign(), pixelShape: { type: 'circle', inset: 0.1 } });

    expect(doc.matrix).toBe(matrix);
    expect(doc.design.pixelShape).toEqual({ type: 'circle', inset: 0.1 });
  });

  it('stores fractional channels the way they are saved', () => {
    const doc = new QrDocument();
    doc.updateText('HELLO');
    doc.setDesign({ ...defaultDesign(), foreground: { type: 'solid', color: { r: 127.5, g: 0, b: 0, a: 255 } } });

    expect(doc.design.foreground).toEqual({ type: 'solid', color: { r: 128, g: 0, b: 0, a: 255 } });
    expect(doc.settings().design.foreground).toEqual({ type: 'solid', color: '#800000FF' });
    expect(doc.svg({ width: 210, height: 210 })).toContain('fill="#800000"/></svg>');
    expect(QrDocument.create(doc.settings())?.design).toEqual(doc.design);
  });

  it('rejects designs the loader would not restore', () => {
    const doc = new QrDocument();
    const invalid: Design[] = [
      { ...defaultDesign(), pixelShape: { type: 'circle', inset: 0.6 } },
      { ...defaultDesign(), logo: { rect: { x: 0.9, y: 0, width: 0.5, height: 0.5 }, image: 'a.png' } },
      { ...defaultDesign(), foreground: { type: 'linear', start: { x: 0, y: 0 }, end: { x: 1, y: 0 }, stops: [] } },
    ];

    for (const design of invalid) {
      const error = thrownBy(() => doc.setDesign(design));
      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({ code: 'INVALID_INPUT' });
    }
    expect(doc.design).toEqual(defaultDesign());
  });

  it('rejects an invalid per-call design', () => {
    const doc = new QrDocument();
    doc.updateText('HELLO');
    const design: Design = { ...defaultDesign(), pixelShape: { type: 'roundedRect', inset: -1, cornerRadius: 0.5 } };

    expect(thrownBy(() => doc.svg({ width: 210, height: 210 }, design))).toBeInstanceOf(AppError);
  });

  it('hands out copies of the payload and design', () => {
    const doc = new QrDocument();
    doc.updateText('HELLO');

    doc.payload.fill(0);
    doc.design.eyeShape = { type: 'circle' };

    expect(text(doc)).toBe('HELLO');
    expect(doc.design.eyeShape).toEqual({ type: 'square' });
  });
});

describe('QrDocument.draw', () => {
  it('fills the background, then the centered foreground', () => {
    const doc = new QrDocument();
    doc.updateText('HELLO');
    const ctx = new RecordingContext();
    const rect = { x: 0, y: 0, width: 310, height: 210 };

    doc.draw(ctx, rect);

    expect(ctx.calls.map((call) => call.op)).toEqual(['fillRect', 'fillPath']);
    const [background, foreground] = ctx.calls;
    expect(background).toEqual({ op: 'fillRect', rect, fill: defaultDesign().background });
    expect(foreground.op).toBe('fillPath');
    if (foreground.op === 'fillPath') {
      expect(pathBounds(foreground.path)).toEqual({ x: 50, y: 0, width: 210, height: 210 });
      expect(foreground.fill).toEqual(defaultDesign().foreground);
    }
  });

  it('clears the area under the logo before drawing it', () => {
    const doc = new QrDocument();
    doc.updateText('HELLO');
    const design: Design = {
      ...defaultDesign(),
      logo: { rect: { x: 0.4, y: 0.4, width: 0.2, height: 0.2 }, image: 'data:image/png;base64,AAAA' },
    };
    const ctx = new RecordingContext();

    doc.draw(ctx, { x: 0, y: 0, width: 310, height: 210 }, design);

    expect(ctx.calls.map((call) => call.op)).toEqual(['fillRect', 'fillPath', 'fillRect', 'drawImage']);
    const image = ctx.calls[3];
    if (image.op === 'drawImage') {
      expect(image.image).toBe('data:image/png;base64,AAAA');
      expect(image.rect.x).toBeCloseTo(134);
      expect(image.rect.y).toBeCloseTo(84);
      expect(image.rect.width).toBeCloseTo(42);
      expect(image.rect.height).toBeCloseTo(42);
    }
    // Per-call designs do not replace the stored one
    expect(doc.design.logo).toBeNull();
  });

  it('clears the logo area with the first stop of a gradient background', () => {
    const doc = new QrDocument();
    doc.updateText('HELLO');
    const stop = { r: 10, g: 20, b: 30, a: 255 };
    const design: Design = {
      ...defaultDesign(),
      background: {
        type: 'radial',
        center: { x: 0.5, y: 0.5 },
        radius: 0.5,
        stops: [
          { offset: 0, color: stop },
          { offset: 1, color: { r: 255, g: 255, b: 255, a: 255 } },
        ],
      },
      logo: { rect: { x: 0.4, y: 0.4, width: 0.2, height: 0.2 }, image: 'logo.png' },
    };
    const ctx = new RecordingContext();

    doc.draw(ctx, { x: 0, y: 0, width: 210, height: 210 }, design);

    expect(ctx.calls[0]).toMatchObject({ op: 'fillRect', fill: { type: 'radial' } });
    expect(ctx.calls[2]).toMatchObject({ op: 'fillRect', fill: { type: 'solid', color: stop } });
  });

  it('draws only the background for an empty payload', () => {
    const ctx = new RecordingContext();
    new QrDocument().draw(ctx, { x: 0, y: 0, width: 50, height: 50 });

    expect(ctx.calls[1]).toEqual({
      op: 'fillPath',
      path: { size: 50, fillRule: 'evenodd', primitives: [] },
      fill: defaultDesign().foreground,
    });
  });
});

describe('QrDocument.svg', () => {
  it('renders background and foreground', () => {
    const doc = new QrDocument();
    doc.updateText('HELLO');

    const svg = doc.svg({ width: 210, height: 210 });

    expect(
      svg.startsWith(
        '<svg xmlns="http://www.w3.org/2000/svg" xmlns:xlink="http://www.w3.org/1999/xlink" width="210" height="210" viewBox="0 0 210 210">' +
          '<rect x="0" y="0" width="210" height="210" fill="#FFFFFF"/>' +
          '<path d="M0 0h70v10h-70Z'
      )
    ).toBe(true);
    expect(svg.endsWith('fill-rule="evenodd" fill="#000000"/></svg>')).toBe(true);
  });
});

describe('QrDocument settings', () => {
  it('exposes payload, level and design', () => {
    const doc = new QrDocument();
    doc.updateText('HELLO');

    expect(doc.settings()).toEqual({
      correction: 'L',
      data: 'SEVMTE8=',
      design: {
        version: 1,
        foreground: { type: 'solid', color: '#000000FF' },
        background: { type: 'solid', color: '#FFFFFFFF' },
        eyeShape: { type: 'square' },
        pixelShape: { type: 'square' },
      },
    });
  });

  it('round-trips through settings', () => {
    const doc = new QrDocument();
    doc.updateText('round trip', ErrorCorrection.HIGH);
    doc.setDesign({
      ...defaultDesign(),
      foreground: { type: 'solid', color: { r: 10, g: 20, b: 30, a: 200 } },
      eyeShape: { type: 'circle' },
      pixelShape: { type: 'vertical', inset: 0.25, cornerRadius: 0.5 },
      logo: { rect: { x: 0.375, y: 0.375, width: 0.25, height: 0.25 }, image: 'logo.png' },
    });

    const restored = QrDocument.create(doc.settings());

    expect(restored?.payload).toEqual(doc.payload);
    expect(restored?.errorCorrection).toBe(ErrorCorrection.HIGH);
    expect(restored?.design).toEqual(doc.design);
    expect(restored?.matrix.modules).toEqual(doc.matrix.modules);
  });

  it('loads an empty map as a fresh document', () => {
    const doc = QrDocument.create({});
    const fresh = new QrDocument();

    expect(doc?.payload).toEqual(fresh.payload);
    expect(doc?.errorCorrection).toBe(fresh.errorCorrection);
    expect(doc?.design).toEqual(fresh.design);
    expect(doc?.pixelSize).toBe(0);
  });

  it('reads the level from the first character of the code', () => {
    const doc = QrDocument.create({ correction: 'Q', data: base64('TEST') });

    expect(doc?.errorCorrection).toBe(ErrorCorrection.QUANTIZE);
    expect(doc && text(doc)).toBe('TEST');
    expect(QrDocument.create({ correction: 'high' })?.errorCorrection).toBe(ErrorCorrection.HIGH);
  });

  it('falls back to low correction for an unknown code', () => {
    const doc = QrDocument.create({ correction: 'Z', data: base64('TEST') });

    expect(doc?.errorCorrection).toBe(ErrorCorrection.LOW);
    expect(doc && text(doc)).toBe('TEST');
    expect(vi.mocked(console.warn)).toHaveBeenCalledTimes(1);
  });

  it('falls back to an empty payload for invalid base64', () => {
    const doc = QrDocument.create({ correction: 'M', data: 'not base64!' });

    expect(doc?.payload).toHaveLength(0);
    expect(doc?.errorCorrection).toBe(ErrorCorrection.MEDIUM);
  });

  it('falls back to an empty payload when the data does not fit', () => {
    const data = Buffer.alloc(2954, 0x41).toString('base64');
    const doc = QrDocument.create({ correction: 'L', data });

    expect(doc?.payload).toHaveLength(0);
    expect(doc?.pixelSize).toBe(0);
    expect(vi.mocked(console.warn)).toHaveBeenCalledWith(
      '[qrSettings] Payload does not fit, using empty payload:',
      expect.objectContaining({ reason: expect.any(String) })
    );
  });

  it('returns null for containers that are not objects', () => {
    expect(QrDocument.create(null)).toBeNull();
    expect(QrDocument.create([])).toBeNull();
    expect(QrDocument.create('settings')).toBeNull();
    expect(vi.mocked(console.error)).toHaveBeenCalledTimes(3);
  });
});

describe('QrDocument JSON', () => {
  it('writes compact JSON in insertion order', () => {
    expect(new QrDocument().jsonString()).toBe(EMPTY_DOCUMENT_JSON);
    expect(new QrDocument().jsonData().toString('utf8')).toBe(EMPTY_DOCUMENT_JSON);
  });

  it('sorts keys and pretty-prints on request', () => {
    const json = new QrDocument().jsonString({ pretty: true, sortedKeys: true });
    const parsed: unknown = JSON.parse(json);

    expect(json.startsWith('{\n  "correction": "L",\n  "data": "",\n  "design": {\n    "background"')).toBe(true);
    expect(parsed).toEqual(JSON.parse(EMPTY_DOCUMENT_JSON));
  });

  it('round-trips through jsonData', () => {
    const doc = new QrDocument();
    doc.updateText('json', ErrorCorrection.QUANTIZE);

    const restored = QrDocument.fromJson(doc.jsonData());

    expect(restored?.jsonString()).toBe(doc.jsonString());
  });

  it('returns null for input that is not a JSON object', () => {
    expect(QrDocument.fromJson('{')).toBeNull();
    expect(QrDocument.fromJson('[1]')).toBeNull();
    expect(QrDocument.fromJson('42')).toBeNull();
  });
});
