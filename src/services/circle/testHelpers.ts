import { CircleError } from './errors.js';
import type { Location } from './types.js';

/**
 * Run fn and return the CircleError it throws. Fails the test if it does not.
 */
export function catchCircleError(fn: () => unknown): CircleError {
  try {
    fn();
  } catch (e) {
    if (e instanceof CircleError) return e;
    throw e;
  }
  throw new Error('Expected a CircleError to be thrown');
}

export const LONDON: Location = { id: 1, latitude: 51.5072, longitude: -0.1276, radius: 900000 };
export const NEBRASKA: Location = { id: 2, latitude: 40.4832, longitude: -96.4044, radius: 2400000 };
export const DELHI: Location = { id: 3, latitude: 28.3636, longitude: 77.1348, radius: 5000000 };
export const FIJI: Location = { id: 4, latitude: -18.1, longitude: 178.27, radius: 200000 };
export const CHUKOTKA: Location = { id: 5, latitude: 67.017, longitude: -178.242, radius: 450000 };
export const NEAR_POLE: Location = { id: 6, latitude: 89, longitude: 0, radius: 500000 };

export function centerOf(location: Location) {
  return { lat: location.latitude, lon: location.longitude };
}
