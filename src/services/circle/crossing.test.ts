import { describe, it, expect } from 'vitest';
import { detectCrossings, crossingLatitude, augmentRing } from './crossing.js';
import { sampleBoundary } from './sampler.js';
import { DEFAULT_CIRCLE_PARAMS } from './types.js';
import type { BoundaryPoint } from './types.js';
import { catchCircleError, centerOf, LONDON, NEBRASKA, DELHI, FIJI, CHUKOTKA } from './testHelpers.js';

const eastboundPair: BoundaryPoint[] = [
  { index: 4, lat: 10, lon: 179 },
  { index: 5, lat: 12, lon: -179 },
];

const westboundPair: BoundaryPoint[] = [
  { index: 8, lat: 12, lon: -179 },
  { index: 9, lat: 10, lon: 179 },
];

describe('crossingLatitude', () => {
  it('interpolates along the segment in shifted space', () => {
    // shifted 179 → 181, slope 1°/°, seam at 180
    expect(crossingLatitude(eastboundPair[0], eastboundPair[1], -180, 'interpolated')).toBe(11);
    expect(crossingLatitude(westboundPair[0], westboundPair[1], 180, 'interpolated')).toBe(11);
  });

  it('reproduces the legacy arithmetic in reference mode', () => {
    // intercept = 12 - 1 × (-179) = 191; 1 × (-180) × 180 + 191
    expect(crossingLatitude(eastboundPair[0], eastboundPair[1], -180, 'reference')).toBe(-32209);
  });

  it('rejects pairs with no longitude change in shifted space', () => {
    const err = catchCircleError(() =>
      crossingLatitude({ index: 0, lat: 0, lon: -180 }, { index: 1, lat: 1, lon: 180 }, 180, 'interpolated')
    );
    expect(err.kind).toBe('DegenerateCrossing');
  });
});

describe('detectCrossings', () => {
  it('returns no events for circles away from the antimeridian', () => {
    for (const location of [LONDON, NEBRASKA, DELHI]) {
      const points = sampleBoundary(centerOf(location), location.radius, DEFAULT_CIRCLE_PARAMS);
      expect(detectCrossings(points)).toEqual([]);
    }
  });

  it('describes an eastbound crossing', () => {
    expect(detectCrossings(eastboundPair)).toEqual([
      {
        index: 4.5,
        direction: 'eastbound',
        point: { index: 4.6, lat: 11, lon: -180 },
        mirror: { index: 4.4, lat: 11, lon: 180 },
      },
    ]);
  });

  it('describes a westbound crossing', () => {
    const [event] = detectCrossings(westboundPair);
    expect(event.direction).toBe('westbound');
    expect(event.point.lon).toBe(180);
    expect(event.mirror.lon).toBe(-180);
    expect(event.index).toBe(8.5);
  });

  it('finds the entry and exit of a circle straddling the antimeridian', () => {
    const points = sampleBoundary(centerOf(CHUKOTKA), CHUKOTKA.radius, DEFAULT_CIRCLE_PARAMS);
    const crossings = detectCrossings(points);

    expect(crossings).toHaveLength(2);
    expect(crossings.map(c => c.index)).toEqual([63.5, 117.5]);
    expect(crossings.map(c => c.direction)).toEqual(['westbound', 'eastbound']);

    expect(crossings[0].point.lon).toBe(180);
    expect(crossings[0].mirror.lon).toBe(-180);
    expect(crossings[0].point.lat).toBeCloseTo(63.03908228659385, 6);
    expect(crossings[1].point.lon).toBe(-180);
    expect(crossings[1].mirror.lon).toBe(180);
    expect(crossings[1].point.lat).toBeCloseTo(71.01371559854267, 6);
  });

  it('keeps interpolated latitudes between the straddling points', () => {
    const points = sampleBoundary(centerOf(FIJI), FIJI.radius, DEFAULT_CIRCLE_PARAMS);
    const crossings = detectCrossings(points);

    expect(crossings.map(c => c.index)).toEqual([22.5, 38.5]);
    for (const c of crossings) {
      const before = points[c.index - 0.5];
      const after = points[c.index + 0.5];
      expect(c.point.lat).toBeGreaterThanOrEqual(Math.min(before.lat, after.lat));
      expect(c.point.lat).toBeLessThanOrEqual(Math.max(before.lat, after.lat));
      expect(c.mirror.lat).toBe(c.point.lat);
    }
  });

  it('uses the legacy latitude formula when asked', () => {
    const points = sampleBoundary(centerOf(CHUKOTKA), CHUKOTKA.radius, DEFAULT_CIRCLE_PARAMS);
    const crossings = detectCrossings(points, 'reference');

    expect(crossings[0].point.lat).toBeCloseTo(-2258.326757393159, 6);
    expect(crossings[1].point.lat).toBeCloseTo(-1591.6104887605034, 6);
  });

  it('fails on a flagged pair with identical shifted longitudes', () => {
    const points: BoundaryPoint[] = [
      { index: 0, lat: 0, lon: -180 },
      { index: 1, lat: 1, lon: 180 },
    ];
    expect(catchCircleError(() => detectCrossings(points)).kind).toBe('DegenerateCrossing');
  });
});

describe('augmentRing', () => {
  it('inserts the mirror before the seam point between the straddling points', () => {
    const ring = augmentRing(eastboundPair, detectCrossings(eastboundPair));
    expect(ring.map(p => p.index)).toEqual([4, 4.4, 4.6, 5]);
    expect(ring.map(p => p.lon)).toEqual([179, 180, -180, -179]);
  });
});
