/**
 * Location sets loaded from JSON files (see data/locations.json)
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { FlatLocation, Location } from './types.js';
import { CircleError } from './errors.js';

export const locationSchema = z.object({
  id: z.number().int(),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  radius: z.number().positive(),
});

export const flatLocationSchema = z.object({
  id: z.number().int(),
  x: z.number(),
  y: z.number(),
  radius: z.number().positive(),
});

/**
 * Ids must be unique within a set; results and errors are reported by id.
 */
export function findDuplicateIds(locations: { id: number }[]): number[] {
  const seen = new Set<number>();
  const duplicates = new Set<number>();
  for (const { id } of locations) {
    if (seen.has(id)) duplicates.add(id);
    seen.add(id);
  }
  return [...duplicates];
}

export const locationListSchema = z.array(locationSchema).refine(
  list => findDuplicateIds(list).length === 0,
  { message: 'Location ids must be unique' }
);

export const flatLocationListSchema = z.array(flatLocationSchema).refine(
  list => findDuplicateIds(list).length === 0,
  { message: 'Location ids must be unique' }
);

async function readLocationFile<T>(filePath: string, schema: z.ZodType<T>): Promise<T> {
  const raw = await readFile(filePath, 'utf-8');

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    throw new CircleError('InvalidLocations', `${filePath} is not valid JSON`, String(e));
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    throw new CircleError('InvalidLocations', `${filePath} does not contain a valid location list`, result.error.errors);
  }
  return result.data;
}

export function loadLocations(filePath: string): Promise<Location[]> {
  return readLocationFile(filePath, locationListSchema);
}

export function loadFlatLocations(filePath: string): Promise<FlatLocation[]> {
  return readLocationFile(filePath, flatLocationListSchema);
}
