/**
 * Design Settings Service
 *
 * Converts a typed Design to and from the portable settings map.
 *
 * INVARIANTS:
 * - designFromSettings(designSettings(d)) equals d field for field
 * - Every field loads on its own; a bad field is skipped and keeps its default
 * - Only a container that is not an object fails the load (returns null)
 * - normalizeDesign(d) is what the loader would return for d, or throws
 */

import { z } from 'zod';
import { DESIGN_SETTINGS_VERSION } from '../constants/qr';
import {
  defaultDesign,
  type Design,
  type EyeShape,
  type Fill,
  type LogoPlacement,
  type PixelShape,
} from '../types/design';
import { formatColorHex } from '../utils/color';
import { AppError, ErrorCodes } from '../utils/errors';
import {
  designSchema,
  eyeShapeSchema,
  fillSchema,
  logoSchema,
  pixelShapeSchema,
  type FillSettings,
} from '../utils/validators';

export interface DesignSettings {
  version: number;
  foreground: FillSettings;
  background: FillSettings;
  eyeShape: EyeShape;
  pixelShape: PixelShape;
  logo?: LogoPlacement;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fillToSettings(fill: Fill): FillSettings {
  switch (fill.type) {
    case 'solid':
      return { type: 'solid', color: formatColorHex(fill.color) };
    case 'linear':
      return {
        type: 'linear',
        start: { ...fill.start },
        end: { ...fill.end },
        stops: fill.stops.map((s) => ({ offset: s.offset, color: formatColorHex(s.color) })),
      };
    case 'radial':
      return {
        type: 'radial',
        center: { ...fill.center },
        radius: fill.radius,
        stops: fill.stops.map((s) => ({ offset: s.offset, color: formatColorHex(s.color) })),
      };
  }
}

/**
 * The current design as a plain, JSON-safe map.
 */
export function designSettings(design: Design): DesignSettings {
  const settings: DesignSettings = {
    version: DESIGN_SETTINGS_VERSION,
    foreground: fillToSettings(design.foreground),
    background: fillToSettings(design.background),
    eyeShape: { ...design.eyeShape },
    pixelShape: { ...design.pixelShape },
  };
  if (design.logo) {
    settings.logo = { rect: { ...design.logo.rect }, image: design.logo.image };
  }
  return settings;
}

/**
 * Bring a design into the form it has after a save and load: channels
 * rounded to 0-255, shape parameters filled in.
 *
 * @throws AppError(INVALID_INPUT) if the loader would drop any field
 */
export function normalizeDesign(design: Design): Design {
  const result = designSchema.safeParse(designSettings(design));
  if (!result.success) {
    throw new AppError(ErrorCodes.INVALID_INPUT, 'Invalid design', {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const { logo, ...rest } = result.data;
  return { ...rest, logo: logo ?? null };
}

function parseField<T extends z.ZodTypeAny>(
  raw: Record<string, unknown>,
  field: string,
  schema: T
): z.output<T> | undefined {
  const value = raw[field];
  if (value === undefined || value === null) return undefined;

  const result = schema.safeParse(value);
  if (result.success) return result.data;

  console.warn('[qrSettings] Ignoring invalid design field:', {
    field,
    issues: result.error.issues.map((issue) => issue.message),
  });
  return undefined;
}

/**
 * Build a design from a settings map. Fields that are missing or invalid
 * keep their defaults.
 */
export function designFromSettings(raw: unknown): Design | null {
  if (!isPlainObject(raw)) return null;

  const version = raw.version;
  if (typeof version === 'number' && version > DESIGN_SETTINGS_VERSION) {
    console.warn('[qrSettings] Design settings written by a newer version, loading known fields only:', {
      version,
      supported: DESIGN_SETTINGS_VERSION,
    });
  }

  const design = defaultDesign();

  const foreground = parseField(raw, 'foreground', fillSchema);
  if (foreground) design.foreground = foreground;

  const background = parseField(raw, 'background', fillSchema);
  if (background) design.background = background;

  const eyeShape = parseField(raw, 'eyeShape', eyeShapeSchema);
  if (eyeShape) design.eyeShape = eyeShape;

  const pixelShape = parseField(raw, 'pixelShape', pixelShapeSchema);
  if (pixelShape) design.pixelShape = pixelShape;

  const logo = parseField(raw, 'logo', logoSchema);
  if (logo) design.logo = logo;

  return design;
}
