import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { computeCircle, computeCircles, computeFlatCircle, computeFlatCircles } from './pipeline.js';
import { DEFAULT_CIRCLE_PARAMS, DEFAULT_FLAT_CIRCLE_PARAMS } from './types.js';
import { CircleError } from './errors.js';
import { LONDON, NEBRASKA, DELHI, FIJI, CHUKOTKA, NEAR_POLE } from './testHelpers.js';

describe('computeCircle', () => {
  it('returns a single-batch Polygon for a circle away from the antimeridian', () => {
    const result = computeCircle(LONDON);

    expect(result.id).toBe(1);
    expect(result.points).toHaveLength(121);
    expect(result.crossings).toEqual([]);
    expect(result.geometry.kind).toBe('single');
    expect(result.polygon.geometry.type).toBe('Polygon');
  });

  it('returns a four-batch MultiPolygon for a straddling circle', () => {
    const result = computeCircle(CHUKOTKA);

    expect(result.crossings).toHaveLength(2);
    expect(result.geometry.kind).toBe('multi');
    expect(result.polygon.geometry.type).toBe('MultiPolygon');
  });

  it('threads the point count through every stage', () => {
    const result = computeCircle(LONDON, { ...DEFAULT_CIRCLE_PARAMS, pointCount: 36 });
    expect(result.points).toHaveLength(37);
    if (result.polygon.geometry.type === 'Polygon') {
      expect(result.polygon.geometry.coordinates[0]).toHaveLength(37);
    }
  });

  it('warns when a crossing latitude leaves the geographic range', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    computeCircle(CHUKOTKA, { ...DEFAULT_CIRCLE_PARAMS, crossingLatitude: 'reference' });

    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn.mock.calls[0][0]).toMatch(
      /^\[Circles\] Location 5: crossing latitude -2258\.3\d+ is outside \[-90, 90\] \(mode=reference\)$/
    );
  });

  it('does not warn for interpolated crossings', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    computeCircle(CHUKOTKA);

    expect(warn).not.toHaveBeenCalled();
  });

  it('throws circle errors for the caller to isolate', () => {
    expect(() => computeCircle(NEAR_POLE)).toThrow(CircleError);
  });
});

describe('computeFlatCircle', () => {
  it('assembles a single Polygon', () => {
    const result = computeFlatCircle({ id: 7, x: 25, y: 15, radius: 20 });

    expect(result.id).toBe(7);
    expect(result.geometry.kind).toBe('single');
    expect(result.polygon.geometry.type).toBe('Polygon');
  });
});

describe('computeCircles', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('computes every reference location', async () => {
    const { circles, errors } = await computeCircles([LONDON, NEBRASKA, DELHI, FIJI, CHUKOTKA]);

    expect(errors).toEqual([]);
    expect(circles.map(c => c.id)).toEqual([1, 2, 3, 4, 5]);
    expect(circles.filter(c => c.crossings.length > 0).map(c => c.id)).toEqual([4, 5]);
  });

  it('isolates failures to their own location', async () => {
    const { circles, errors } = await computeCircles([
      LONDON,
      { id: 10, latitude: 0, longitude: 0, radius: 0 },
      NEAR_POLE,
      CHUKOTKA,
    ]);

    expect(circles.map(c => c.id)).toEqual([1, 5]);
    expect(errors.map(e => [e.id, e.kind])).toEqual([
      [10, 'InvalidRadius'],
      [6, 'UnsupportedCrossings'],
    ]);
    expect(console.error).toHaveBeenCalledTimes(2);
  });

  it('reports invalid centers without losing the other locations', async () => {
    const { circles, errors } = await computeCircles([
      LONDON,
      { id: 9, latitude: NaN, longitude: 0, radius: 1000 },
      { id: 11, latitude: 120, longitude: 0, radius: 1000 },
      CHUKOTKA,
    ]);

    expect(circles.map(c => c.id)).toEqual([1, 5]);
    expect(errors.map(e => [e.id, e.kind])).toEqual([
      [9, 'InvalidCenter'],
      [11, 'InvalidCenter'],
    ]);
  });

  it('reports every location when the parameters are invalid', async () => {
    const { circles, errors } = await computeCircles([LONDON, DELHI], { ...DEFAULT_CIRCLE_PARAMS, pointCount: 2 });

    expect(circles).toEqual([]);
    expect(errors.map(e => e.kind)).toEqual(['InvalidPointCount', 'InvalidPointCount']);
  });

  it('logs a summary line', async () => {
    await computeCircles([LONDON, FIJI]);
    expect(console.log).toHaveBeenCalledWith(
      '[Circles] 2/2 circles built (1 crossing the antimeridian, 120 points, mode=interpolated)'
    );
  });
});

describe('computeFlatCircles', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('computes every flat location', async () => {
    const { circles, errors } = await computeFlatCircles([
      { id: 1, x: -50, y: 200, radius: 32 },
      { id: 2, x: -80, y: 165, radius: 40 },
      { id: 3, x: 25, y: 15, radius: 20 },
    ]);

    expect(errors).toEqual([]);
    expect(circles).toHaveLength(3);
    expect(circles.every(c => c.polygon.geometry.type === 'Polygon')).toBe(true);
  });

  it('isolates an invalid divisor per location', async () => {
    const { errors } = await computeFlatCircles(
      [{ id: 1, x: 0, y: 0, radius: 1 }],
      { ...DEFAULT_FLAT_CIRCLE_PARAMS, rescaleDivisor: -1 }
    );
    expect(errors).toEqual([
      { id: 1, kind: 'InvalidRescaleDivisor', message: 'Rescale divisor must be positive (got -1)' },
    ]);
  });
});
