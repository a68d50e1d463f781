/**
 * Boundary sampling on a sphere using the great-circle destination formula
 * (https://www.movable-type.co.uk/scripts/latlong.html#dest-point)
 */

import type { BoundaryPoint, CircleParams } from './types.js';
import { CircleError } from './errors.js';
import { normalizeLongitude } from './longitude.js';

const DEG_TO_RAD = Math.PI / 180;
const RAD_TO_DEG = 180 / Math.PI;

export interface Center {
  lat: number;
  lon: number;
}

export function assertCenter(center: Center): void {
  if (!Number.isFinite(center.lat) || center.lat < -90 || center.lat > 90) {
    throw new CircleError('InvalidCenter', `Center latitude must be within [-90, 90] (got ${center.lat})`);
  }
  if (!Number.isFinite(center.lon) || center.lon < -180 || center.lon > 180) {
    throw new CircleError('InvalidCenter', `Center longitude must be within [-180, 180] (got ${center.lon})`);
  }
}

export function assertPointCount(pointCount: number): void {
  if (!Number.isInteger(pointCount) || pointCount < 3) {
    throw new CircleError('InvalidPointCount', `Point count must be an integer >= 3 (got ${pointCount})`);
  }
}

/**
 * Angle at the sphere's center subtended by the radius.
 */
export function angularDistance(radius: number, earthRadius: number): number {
  if (!Number.isFinite(radius) || radius <= 0) {
    throw new CircleError('InvalidRadius', `Radius must be positive (got ${radius})`);
  }
  if (!Number.isFinite(earthRadius) || earthRadius <= 0) {
    throw new CircleError('InvalidRadius', `Earth radius must be positive (got ${earthRadius})`);
  }
  const delta = radius / earthRadius;
  if (delta >= Math.PI) {
    throw new CircleError('InvalidRadius', `Radius ${radius} reaches past the antipode of the center`);
  }
  return delta;
}

/**
 * Bearing in degrees for point i of n, clockwise from north. Point n wraps to 0°.
 */
export function bearingDegrees(i: number, pointCount: number): number {
  return (360 * i / pointCount) % 360;
}

/**
 * Sample pointCount + 1 boundary points, starting due north of the center and
 * moving clockwise. The last point repeats the first to close the ring.
 */
export function sampleBoundary(
  center: Center,
  radius: number,
  params: Pick<CircleParams, 'pointCount' | 'earthRadius'>
): BoundaryPoint[] {
  assertCenter(center);
  assertPointCount(params.pointCount);
  const delta = angularDistance(radius, params.earthRadius);

  const lat1 = center.lat * DEG_TO_RAD;
  const lon1 = center.lon * DEG_TO_RAD;
  const sinLat1 = Math.sin(lat1);
  const cosLat1 = Math.cos(lat1);
  const sinDelta = Math.sin(delta);
  const cosDelta = Math.cos(delta);

  const points: BoundaryPoint[] = [];
  for (let i = 0; i <= params.pointCount; i++) {
    const bearing = bearingDegrees(i, params.pointCount) * DEG_TO_RAD;

    const sinLat2 = sinLat1 * cosDelta + cosLat1 * sinDelta * Math.cos(bearing);
    const lat2 = Math.asin(Math.min(1, Math.max(-1, sinLat2)));
    const lon2 = lon1 + Math.atan2(
      Math.sin(bearing) * sinDelta * cosLat1,
      cosDelta - sinLat1 * Math.sin(lat2)
    );

    points.push({
      index: i,
      lat: lat2 * RAD_TO_DEG,
      lon: normalizeLongitude(lon2 * RAD_TO_DEG),
    });
  }

  return points;
}
