/**
 * Polygon assembly from segmented rings.
 *
 * The core never builds geometry objects itself; it hands ordered,
 * non-wrapping batches to an assembler. turfAssembler is the GeoJSON
 * implementation used by the pipeline and the API.
 */

import * as turf from '@turf/turf';
import type { BoundaryPoint, RingGeometry } from './types.js';

export interface PolygonAssembler<TLine, TPolygon, TMultiPolygon> {
  /** Line through the points, followed by the vertices of tail when given */
  makeLine(points: BoundaryPoint[], tail?: TLine): TLine;
  /** Polygon bounded by a closed line */
  makePolygon(line: TLine): TPolygon;
  makeMultiPolygon(polygons: TPolygon[]): TMultiPolygon;
}

export function toPosition(point: BoundaryPoint): GeoJSON.Position {
  return [point.lon, point.lat];
}

export const turfAssembler: PolygonAssembler<
  GeoJSON.Feature<GeoJSON.LineString>,
  GeoJSON.Feature<GeoJSON.Polygon>,
  GeoJSON.Feature<GeoJSON.MultiPolygon>
> = {
  makeLine(points, tail) {
    const coords = points.map(toPosition);
    return turf.lineString(tail ? [...coords, ...tail.geometry.coordinates] : coords);
  },
  makePolygon(line) {
    return turf.polygon([line.geometry.coordinates]);
  },
  makeMultiPolygon(polygons) {
    return turf.multiPolygon(polygons.map(p => p.geometry.coordinates));
  },
};

/**
 * Build the polygon for a segmented ring.
 *
 * A single batch is already closed. Four batches become two parts that meet
 * the antimeridian from either side: batches 3 and 0 (the starting side,
 * joined through the shared closing point) and batches 1 and 2. Each part is
 * closed along the seam back to its first point. The innermost line always
 * holds at least two points, so no line is built from a single vertex.
 */
export function assembleRing<TLine, TPolygon, TMultiPolygon>(
  geometry: RingGeometry,
  assembler: PolygonAssembler<TLine, TPolygon, TMultiPolygon>
): TPolygon | TMultiPolygon {
  if (geometry.kind === 'single') {
    return assembler.makePolygon(assembler.makeLine(geometry.batch.points));
  }

  const [pre, inner, innerRest, post] = geometry.batches;

  const startingSide = assembler.makeLine(
    post.points,
    assembler.makeLine([...pre.points.slice(1), post.points[0]])
  );
  const farSide = assembler.makeLine(
    inner.points,
    assembler.makeLine([...innerRest.points, inner.points[0]])
  );

  return assembler.makeMultiPolygon([
    assembler.makePolygon(startingSide),
    assembler.makePolygon(farSide),
  ]);
}
