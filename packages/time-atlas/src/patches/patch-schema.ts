/**
 * Historical patch file schema
 *
 * Runtime validation for the curated patch document. Structural checks live
 * here; cross-field checks (duplicate ids, unknown areas, interval order,
 * zone validity) run in the registry loader.
 */

import { z } from 'zod';

const MAX_OFFSET_SECONDS = 18 * 3600;

const localDateTimeString = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2})?$/, 'expected local datetime YYYY-MM-DDTHH:MM[:SS]');

const positionSchema = z.array(z.number()).min(2);
const ringSchema = z.array(positionSchema).min(4);

export const polygonalGeometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Polygon'), coordinates: z.array(ringSchema).min(1) }),
  z.object({
    type: z.literal('MultiPolygon'),
    coordinates: z.array(z.array(ringSchema).min(1)).min(1),
  }),
]);

const bboxRegionSchema = z
  .object({
    kind: z.literal('bbox'),
    minLat: z.number().min(-90).max(90),
    maxLat: z.number().min(-90).max(90),
    minLon: z.number().min(-180).max(180),
    maxLon: z.number().min(-180).max(180),
  })
  .refine((region) => region.minLat < region.maxLat && region.minLon < region.maxLon, {
    message: 'bbox minimums must be below maximums',
  });

const areaRegionSchema = z.object({
  kind: z.literal('area'),
  name: z.string().min(1),
});

const polygonRegionSchema = z.object({
  kind: z.literal('polygon'),
  geometry: polygonalGeometrySchema,
});

export const patchRegionSchema = z.union([bboxRegionSchema, areaRegionSchema, polygonRegionSchema]);

const offsetSeconds = z
  .number()
  .int()
  .min(-MAX_OFFSET_SECONDS, 'offset must be within ±18 h')
  .max(MAX_OFFSET_SECONDS, 'offset must be within ±18 h');

export const patchEffectSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('zone'), zoneId: z.string().min(1) }),
  z.object({
    kind: z.literal('fixed_offset'),
    offsetSeconds,
    dstActive: z.boolean(),
    dstRule: z.enum(['none', 'us_last_sunday_april_october']).default('none'),
  }),
  z.object({ kind: z.literal('local_mean_time') }),
]);

export const patchSchema = z.object({
  id: z.string().regex(/^[a-z0-9_]+$/, 'patch id must be snake_case'),
  region: patchRegionSchema,
  validFrom: localDateTimeString,
  validTo: localDateTimeString,
  effect: patchEffectSchema,
  era: z.enum(['historical', 'future']).default('historical'),
  confidence: z.enum(['high', 'medium', 'low']),
  note: z.string().min(1),
  sources: z.array(z.string().min(1)).default([]),
});

export const patchFileSchema = z.object({
  version: z.string().min(1),
  areas: z.record(z.string(), polygonalGeometrySchema).default({}),
  patches: z.array(patchSchema),
});

export type PatchRegion = z.infer<typeof patchRegionSchema>;
export type PatchEffect = z.infer<typeof patchEffectSchema>;
export type PatchDefinition = z.infer<typeof patchSchema>;
