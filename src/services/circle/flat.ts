/**
 * Circles on a flat plane.
 *
 * Plane coordinates are divided by a rescaling divisor so they fit inside
 * the lon/lat range and can reuse the same GeoJSON assembly.
 */

import type { BoundaryPoint, FlatCircleParams } from './types.js';
import { CircleError } from './errors.js';
import { assertPointCount, bearingDegrees } from './sampler.js';

const DEG_TO_RAD = Math.PI / 180;

export function sampleFlatBoundary(
  center: { x: number; y: number },
  radius: number,
  params: FlatCircleParams
): BoundaryPoint[] {
  if (!Number.isFinite(center.x) || !Number.isFinite(center.y)) {
    throw new CircleError('InvalidCenter', `Center must be finite (got ${center.x}, ${center.y})`);
  }
  assertPointCount(params.pointCount);
  if (!Number.isFinite(radius) || radius <= 0) {
    throw new CircleError('InvalidRadius', `Radius must be positive (got ${radius})`);
  }
  if (!Number.isFinite(params.rescaleDivisor) || params.rescaleDivisor <= 0) {
    throw new CircleError('InvalidRescaleDivisor', `Rescale divisor must be positive (got ${params.rescaleDivisor})`);
  }

  const x = center.x / params.rescaleDivisor;
  const y = center.y / params.rescaleDivisor;
  const r = radius / params.rescaleDivisor;

  const points: BoundaryPoint[] = [];
  for (let i = 0; i <= params.pointCount; i++) {
    const angle = bearingDegrees(i, params.pointCount) * DEG_TO_RAD;
    // x runs along latitude, y along longitude
    points.push({
      index: i,
      lat: x + r * Math.sin(angle),
      lon: y + r * Math.cos(angle),
    });
  }

  return points;
}
