// Validation utilities using Zod

import { z } from 'zod';
import { parseColorHex } from './color';
import { errorCorrectionFromCode } from '../types/qr';

// Common schemas
export const unitInterval = z.number().min(0, 'Must be >= 0').max(1, 'Must be <= 1');

export const insetSchema = z.number().min(0, 'Inset must be >= 0').lt(0.5, 'Inset must be < 0.5');

export const finiteNumber = z.number().finite();

export const pointSchema = z.object({
  x: finiteNumber,
  y: finiteNumber
});

export const colorSchema = z.string().transform((value, ctx) => {
  const color = parseColorHex(value);
  if (!color) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid color: ${value}` });
    return z.NEVER;
  }
  return color;
});

// Standard alphabet, padded, no whitespace
export const base64Schema = z
  .string()
  .regex(/^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/, 'Invalid base64');

export const errorCorrectionSchema = z.string().transform((value, ctx) => {
  const level = errorCorrectionFromCode(value);
  if (!level) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown error correction code: ${value}` });
    return z.NEVER;
  }
  return level;
});

// Design field schemas
const gradientStopSchema = z.object({
  offset: unitInterval,
  color: colorSchema
});

const gradientStopsSchema = z.array(gradientStopSchema).min(1, 'At least one gradient stop is required');

export const fillSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('solid'),
    color: colorSchema
  }),
  z.object({
    type: z.literal('linear'),
    start: pointSchema,
    end: pointSchema,
    stops: gradientStopsSchema
  }),
  z.object({
    type: z.literal('radial'),
    center: pointSchema,
    radius: z.number().positive('Radius must be > 0').finite(),
    stops: gradientStopsSchema
  })
]);

export const pixelShapeSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('square') }),
  z.object({
    type: z.literal('circle'),
    inset: insetSchema.default(0)
  }),
  z.object({
    type: z.literal('roundedRect'),
    inset: insetSchema.default(0),
    cornerRadius: unitInterval.default(0.5)
  }),
  z.object({
    type: z.literal('horizontal'),
    inset: insetSchema.default(0),
    cornerRadius: unitInterval.default(1)
  }),
  z.object({
    type: z.literal('vertical'),
    inset: insetSchema.default(0),
    cornerRadius: unitInterval.default(1)
  })
]);

export const eyeShapeSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('square') }),
  z.object({
    type: z.literal('roundedRect'),
    cornerRadius: unitInterval.default(0.5)
  }),
  z.object({ type: z.literal('circle') })
]);

export const logoSchema = z
  .object({
    rect: z.object({
      x: unitInterval,
      y: unitInterval,
      width: unitInterval.refine((v) => v > 0, 'Width must be > 0'),
      height: unitInterval.refine((v) => v > 0, 'Height must be > 0')
    }),
    image: z.string().min(1, 'Image reference is required')
  })
  .refine(({ rect }) => rect.x + rect.width <= 1 && rect.y + rect.height <= 1, 'Logo must fit inside the symbol');

// Whole design as written by designSettings(); every field required except the logo
export const designSchema = z.object({
  foreground: fillSchema,
  background: fillSchema,
  eyeShape: eyeShapeSchema,
  pixelShape: pixelShapeSchema,
  logo: logoSchema.optional()
});

export type FillSettings = z.input<typeof fillSchema>;
