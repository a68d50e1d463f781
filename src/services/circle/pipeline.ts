/**
 * Circle pipeline: sample → detect crossings → segment → assemble
 */

import type {
  CircleComputation,
  CircleFailure,
  CircleParams,
  CircleResult,
  FlatCircleParams,
  FlatLocation,
  Location,
} from './types.js';
import { DEFAULT_CIRCLE_PARAMS, DEFAULT_FLAT_CIRCLE_PARAMS } from './types.js';
import { isCircleError } from './errors.js';
import { sampleBoundary } from './sampler.js';
import { sampleFlatBoundary } from './flat.js';
import { detectCrossings } from './crossing.js';
import { segmentRing } from './segmenter.js';
import { assembleRing, turfAssembler } from './assembler.js';

export function computeCircle(location: Location, params: CircleParams = DEFAULT_CIRCLE_PARAMS): CircleResult {
  const points = sampleBoundary(
    { lat: location.latitude, lon: location.longitude },
    location.radius,
    params
  );
  const crossings = detectCrossings(points, params.crossingLatitude);
  for (const crossing of crossings) {
    if (Math.abs(crossing.point.lat) > 90) {
      console.warn(
        `[Circles] Location ${location.id}: crossing latitude ${crossing.point.lat} is outside [-90, 90] ` +
        `(mode=${params.crossingLatitude})`
      );
    }
  }
  const geometry = segmentRing(points, crossings);
  const polygon = assembleRing(geometry, turfAssembler);

  return { id: location.id, points, crossings, geometry, polygon };
}

export function computeFlatCircle(
  location: FlatLocation,
  params: FlatCircleParams = DEFAULT_FLAT_CIRCLE_PARAMS
): CircleResult {
  const points = sampleFlatBoundary({ x: location.x, y: location.y }, location.radius, params);
  const geometry = segmentRing(points, []);
  const polygon = assembleRing(geometry, turfAssembler);

  return { id: location.id, points, crossings: [], geometry, polygon };
}

/**
 * Run one task per location and collect the settled results. Circle errors
 * are reported per location; anything else is rethrown.
 */
async function runPerLocation<T extends { id: number }>(
  locations: T[],
  compute: (location: T) => CircleResult
): Promise<CircleComputation> {
  const settled = await Promise.allSettled(
    locations.map(async (location) => compute(location))
  );

  const circles: CircleResult[] = [];
  const errors: CircleFailure[] = [];

  settled.forEach((outcome, i) => {
    const id = locations[i].id;
    if (outcome.status === 'fulfilled') {
      circles.push(outcome.value);
      return;
    }
    if (!isCircleError(outcome.reason)) {
      throw outcome.reason;
    }
    console.error(`[Circles] Location ${id} failed (${outcome.reason.kind}): ${outcome.reason.message}`);
    errors.push({ id, kind: outcome.reason.kind, message: outcome.reason.message });
  });

  return { circles, errors };
}

export async function computeCircles(
  locations: Location[],
  params: CircleParams = DEFAULT_CIRCLE_PARAMS
): Promise<CircleComputation> {
  const result = await runPerLocation(locations, location => computeCircle(location, params));

  const crossing = result.circles.filter(c => c.crossings.length > 0).length;
  console.log(
    `[Circles] ${result.circles.length}/${locations.length} circles built ` +
    `(${crossing} crossing the antimeridian, ${params.pointCount} points, mode=${params.crossingLatitude})`
  );
  return result;
}

export async function computeFlatCircles(
  locations: FlatLocation[],
  params: FlatCircleParams = DEFAULT_FLAT_CIRCLE_PARAMS
): Promise<CircleComputation> {
  const result = await runPerLocation(locations, location => computeFlatCircle(location, params));

  console.log(
    `[Circles] ${result.circles.length}/${locations.length} flat circles built ` +
    `(${params.pointCount} points, divisor=${params.rescaleDivisor})`
  );
  return result;
}
