/**
 * Types and constants for circle generation
 */

export interface Location {
  id: number;
  latitude: number;
  longitude: number;
  radius: number; // meters
}

export interface FlatLocation {
  id: number;
  x: number;
  y: number;
  radius: number;
}

/**
 * How the latitude of a synthesized antimeridian point is derived.
 * - interpolated: the straight line between the two points, evaluated at the seam
 * - reference: the legacy y = m·x·180 + c arithmetic, kept for comparison
 */
export type CrossingLatitudeMode = 'interpolated' | 'reference';

export interface CircleParams {
  pointCount: number;
  earthRadius: number; // meters, same unit as Location.radius
  crossingLatitude: CrossingLatitudeMode;
}

export const DEFAULT_CIRCLE_PARAMS: CircleParams = {
  pointCount: 120,
  earthRadius: 6371009,
  crossingLatitude: 'interpolated',
};

export interface FlatCircleParams {
  pointCount: number;
  rescaleDivisor: number; // shrinks plane coordinates into the lon/lat range
}

export const DEFAULT_FLAT_CIRCLE_PARAMS: FlatCircleParams = {
  pointCount: 120,
  rescaleDivisor: 10000,
};

export interface BoundaryPoint {
  /** Integer for sampled points, fractional for synthesized crossing points */
  index: number;
  lat: number;
  lon: number;
}

export type CrossingDirection = 'eastbound' | 'westbound';

export interface CrossingEvent {
  /** Midway between the two sampled points that straddle the seam */
  index: number;
  direction: CrossingDirection;
  /** Seam point on the side of the later sampled point */
  point: BoundaryPoint;
  /** Same latitude on the opposite edge, on the side of the earlier point */
  mirror: BoundaryPoint;
}

export interface Batch {
  points: BoundaryPoint[];
}

export type RingGeometry =
  | { kind: 'single'; batch: Batch }
  | { kind: 'multi'; batches: [Batch, Batch, Batch, Batch] };

export interface CircleResult {
  id: number;
  points: BoundaryPoint[];
  crossings: CrossingEvent[];
  geometry: RingGeometry;
  polygon: GeoJSON.Feature<GeoJSON.Polygon | GeoJSON.MultiPolygon>;
}

export interface CircleFailure {
  id: number;
  kind: string;
  message: string;
}

export interface CircleComputation {
  circles: CircleResult[];
  errors: CircleFailure[];
}
