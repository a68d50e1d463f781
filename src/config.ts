import { z } from 'zod';
import { DEFAULT_CIRCLE_PARAMS, DEFAULT_FLAT_CIRCLE_PARAMS } from './services/circle/index.js';
import type { CircleParams, FlatCircleParams } from './services/circle/index.js';

/**
 * Environment configuration. Loaded once at startup (after dotenv) and passed
 * down explicitly; services never read process.env themselves.
 */
const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGIN: z.string().default('*'),
  CIRCLE_POINT_COUNT: z.coerce.number().int().min(3).default(DEFAULT_CIRCLE_PARAMS.pointCount),
  EARTH_RADIUS_M: z.coerce.number().positive().default(DEFAULT_CIRCLE_PARAMS.earthRadius),
  CROSSING_LATITUDE: z.enum(['interpolated', 'reference']).default(DEFAULT_CIRCLE_PARAMS.crossingLatitude),
  FLAT_RESCALE_DIVISOR: z.coerce.number().positive().default(DEFAULT_FLAT_CIRCLE_PARAMS.rescaleDivisor),
  LOCATIONS_FILE: z.string().default('data/locations.json'),
});

export interface AppConfig {
  env: string;
  port: number;
  corsOrigin: string;
  circle: CircleParams;
  flatCircle: FlatCircleParams;
  locationsFile: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    corsOrigin: parsed.CORS_ORIGIN,
    circle: {
      pointCount: parsed.CIRCLE_POINT_COUNT,
      earthRadius: parsed.EARTH_RADIUS_M,
      crossingLatitude: parsed.CROSSING_LATITUDE,
    },
    flatCircle: {
      pointCount: parsed.CIRCLE_POINT_COUNT,
      rescaleDivisor: parsed.FLAT_RESCALE_DIVISOR,
    },
    locationsFile: parsed.LOCATIONS_FILE,
  };
}
