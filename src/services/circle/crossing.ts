/**
 * Antimeridian crossing detection
 *
 * Walks the sampled ring pair by pair. When two consecutive points sit on
 * opposite sides of ±180, a seam point is synthesized on each edge at the
 * latitude where the segment meets the antimeridian.
 */

import type { BoundaryPoint, CrossingEvent, CrossingLatitudeMode } from './types.js';
import { CircleError } from './errors.js';
import { shiftLongitude, wrapsAntimeridian } from './longitude.js';

/** Offset of the synthesized points from the crossing anchor */
const SEAM_INDEX_OFFSET = 0.1;

/**
 * Latitude at which the segment prev → curr meets the antimeridian.
 *
 * The slope is taken in the [0, 360) space where the segment is continuous.
 * 'reference' evaluates the legacy y = m·x·180 + c arithmetic with an
 * unshifted intercept. It is not a geographic latitude in general and is only
 * kept so older output can be reproduced.
 */
export function crossingLatitude(
  prev: BoundaryPoint,
  curr: BoundaryPoint,
  seamLon: number,
  mode: CrossingLatitudeMode
): number {
  const prevShifted = shiftLongitude(prev.lon);
  const lonDelta = shiftLongitude(curr.lon) - prevShifted;
  if (lonDelta === 0) {
    throw new CircleError(
      'DegenerateCrossing',
      `Points ${prev.index} and ${curr.index} share a shifted longitude`,
      { prev, curr }
    );
  }
  const gradient = (curr.lat - prev.lat) / lonDelta;

  if (mode === 'reference') {
    const intercept = curr.lat - gradient * curr.lon;
    return gradient * seamLon * 180 + intercept;
  }
  return prev.lat + gradient * (180 - prevShifted);
}

/**
 * Find every consecutive pair whose longitudes differ by more than 180°.
 */
export function detectCrossings(
  points: BoundaryPoint[],
  mode: CrossingLatitudeMode = 'interpolated'
): CrossingEvent[] {
  const crossings: CrossingEvent[] = [];
  let prev: BoundaryPoint | undefined;

  for (const curr of points) {
    if (prev && wrapsAntimeridian(prev.lon, curr.lon)) {
      // -1: from the +180 edge into the -180 edge
      const modifier = curr.lon < prev.lon ? -1 : 1;
      const seamLon = modifier * 180;
      const lat = crossingLatitude(prev, curr, seamLon, mode);
      const anchor = curr.index - 0.5;

      crossings.push({
        index: anchor,
        direction: modifier === -1 ? 'eastbound' : 'westbound',
        point: { index: anchor + SEAM_INDEX_OFFSET, lat, lon: seamLon },
        mirror: { index: anchor - SEAM_INDEX_OFFSET, lat, lon: -seamLon },
      });
    }
    prev = curr;
  }

  return crossings;
}

/**
 * Merge sampled and synthesized points into one ring ordered by index.
 */
export function augmentRing(points: BoundaryPoint[], crossings: CrossingEvent[]): BoundaryPoint[] {
  const seamPoints = crossings.flatMap(c => [c.mirror, c.point]);
  return [...points, ...seamPoints].sort((a, b) => a.index - b.index);
}
