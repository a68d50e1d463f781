/**
 * Ring segmentation into batches that never wrap across the antimeridian
 */

import type { Batch, BoundaryPoint, CrossingEvent, RingGeometry } from './types.js';
import { CircleError } from './errors.js';
import { wrapsAntimeridian } from './longitude.js';

/**
 * Index of the first consecutive pair in the batch that wraps, or -1.
 */
export function findWrappingPair(points: BoundaryPoint[]): number {
  for (let i = 1; i < points.length; i++) {
    if (wrapsAntimeridian(points[i - 1].lon, points[i].lon)) {
      return i - 1;
    }
  }
  return -1;
}

function assertNonWrapping(batches: Batch[]): void {
  batches.forEach((batch, batchIdx) => {
    const pairIdx = findWrappingPair(batch.points);
    if (pairIdx >= 0) {
      const from = batch.points[pairIdx];
      const to = batch.points[pairIdx + 1];
      throw new CircleError(
        'WrappingBatch',
        `Batch ${batchIdx} wraps between points ${from.index} (${from.lon}) and ${to.index} (${to.lon})`,
        { batch: batchIdx, from, to }
      );
    }
  });
}

/**
 * Partition the sampled ring.
 *
 * Without crossings the whole ring is one batch. With an entry and an exit
 * crossing (a1 < a2) it splits into four:
 *   0: points before a1, then a1's mirror
 *   1: a1's seam point, then points up to the midpoint of a1..a2
 *   2: the remaining points before a2, then a2's mirror
 *   3: a2's seam point, then points after a2 through the closing point
 * Batches 0 and 3 lie on the starting side of the seam, 1 and 2 on the other.
 */
export function segmentRing(points: BoundaryPoint[], crossings: CrossingEvent[]): RingGeometry {
  if (crossings.length === 0) {
    const batch: Batch = { points: [...points] };
    assertNonWrapping([batch]);
    return { kind: 'single', batch };
  }

  // Rings around a pole cross once; larger shapes may cross more than twice
  if (crossings.length !== 2) {
    throw new CircleError(
      'UnsupportedCrossings',
      `Expected 0 or 2 antimeridian crossings, found ${crossings.length}`,
      { crossings: crossings.map(c => c.index) }
    );
  }

  const [first, second] = [...crossings].sort((a, b) => a.index - b.index);
  const midpoint = (first.index + second.index) / 2;

  const batches: [Batch, Batch, Batch, Batch] = [
    { points: [...points.filter(p => p.index < first.index), first.mirror] },
    { points: [first.point, ...points.filter(p => p.index > first.index && p.index < midpoint)] },
    { points: [...points.filter(p => p.index >= midpoint && p.index < second.index), second.mirror] },
    { points: [second.point, ...points.filter(p => p.index > second.index)] },
  ];

  assertNonWrapping(batches);
  return { kind: 'multi', batches };
}

/**
 * Every point of the geometry in batch order.
 */
export function flattenRing(geometry: RingGeometry): BoundaryPoint[] {
  if (geometry.kind === 'single') {
    return [...geometry.batch.points];
  }
  return geometry.batches.flatMap(b => b.points);
}
