import { z } from 'zod';
import { locationSchema, flatLocationSchema, findDuplicateIds } from '../services/circle/index.js';

/**
 * Request validation schemas for the circle API
 */

export const MAX_LOCATIONS_PER_REQUEST = 500;

export const pointCountSchema = z.number().int().min(3).max(10000);
export const crossingLatitudeSchema = z.enum(['interpolated', 'reference']);

const uniqueIds = <T extends { id: number }>(list: T[]) => findDuplicateIds(list).length === 0;

export const computeCirclesBodySchema = z.object({
  locations: z.array(locationSchema)
    .min(1)
    .max(MAX_LOCATIONS_PER_REQUEST)
    .refine(uniqueIds, { message: 'Location ids must be unique' }),
  pointCount: pointCountSchema.optional(),
  earthRadius: z.number().positive().optional(),
  crossingLatitude: crossingLatitudeSchema.optional(),
});

export const computeFlatCirclesBodySchema = z.object({
  locations: z.array(flatLocationSchema)
    .min(1)
    .max(MAX_LOCATIONS_PER_REQUEST)
    .refine(uniqueIds, { message: 'Location ids must be unique' }),
  pointCount: pointCountSchema.optional(),
  rescaleDivisor: z.number().positive().optional(),
});

export const referenceQuerySchema = z.object({
  crossingLatitude: crossingLatitudeSchema.optional(),
});

export type ComputeCirclesBody = z.infer<typeof computeCirclesBodySchema>;
export type ComputeFlatCirclesBody = z.infer<typeof computeFlatCirclesBodySchema>;
export type ReferenceQuery = z.infer<typeof referenceQuerySchema>;
