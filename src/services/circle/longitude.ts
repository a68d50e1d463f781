/**
 * Longitude normalization utilities
 */

/**
 * Modulo that never returns a negative result for a positive modulus.
 * JavaScript's % keeps the sign of the dividend (-190 % 360 === -190).
 */
export function positiveModulo(value: number, modulus: number): number {
  return ((value % modulus) + modulus) % modulus;
}

/**
 * Map any longitude into [-180, 180).
 */
export function normalizeLongitude(lon: number): number {
  if (lon >= -180 && lon < 180) return lon;
  return positiveModulo(lon + 180, 360) - 180;
}

/**
 * Map a longitude into [0, 360), which moves the discontinuity from the
 * antimeridian to the prime meridian.
 */
export function shiftLongitude(lon: number): number {
  return positiveModulo(lon + 360, 360);
}

/**
 * True when the shorter path between two longitudes runs through ±180.
 */
export function wrapsAntimeridian(fromLon: number, toLon: number): boolean {
  return Math.abs(toLon - fromLon) > 180;
}
