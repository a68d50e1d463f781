/**
 * Circle Service
 *
 * Approximates circles on the Earth's surface (and on a flat plane) as
 * polygons with evenly spaced boundary points.
 *
 * Strategy for circles that cross the antimeridian:
 * 1. Sample the ring with the great-circle destination formula
 * 2. Flag consecutive points whose longitudes differ by more than 180°
 * 3. Insert a seam point on each edge (±180) at the crossing latitude
 * 4. Cut the ring into four batches, none of which wraps
 * 5. Assemble a MultiPolygon whose two parts meet exactly at the antimeridian
 */

// Types and constants
export type {
  Location,
  FlatLocation,
  CircleParams,
  FlatCircleParams,
  CrossingLatitudeMode,
  BoundaryPoint,
  CrossingDirection,
  CrossingEvent,
  Batch,
  RingGeometry,
  CircleResult,
  CircleFailure,
  CircleComputation,
} from './types.js';
export { DEFAULT_CIRCLE_PARAMS, DEFAULT_FLAT_CIRCLE_PARAMS } from './types.js';
export { CircleError, isCircleError } from './errors.js';
export type { CircleErrorKind } from './errors.js';

// Public API
export { computeCircle, computeCircles, computeFlatCircle, computeFlatCircles } from './pipeline.js';
export { loadLocations, loadFlatLocations, locationSchema, flatLocationSchema, findDuplicateIds } from './locations.js';

// Low-level utilities (for testing or advanced use)
export { normalizeLongitude, positiveModulo, shiftLongitude, wrapsAntimeridian } from './longitude.js';
export { sampleBoundary, angularDistance, bearingDegrees, assertCenter } from './sampler.js';
export { sampleFlatBoundary } from './flat.js';
export { detectCrossings, crossingLatitude, augmentRing } from './crossing.js';
export { segmentRing, flattenRing, findWrappingPair } from './segmenter.js';
export { assembleRing, turfAssembler, toPosition } from './assembler.js';
export type { PolygonAssembler } from './assembler.js';
