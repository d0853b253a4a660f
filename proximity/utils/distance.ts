/**
 * Great-circle distance on a spherical Earth (haversine).
 * All results are in meters.
 */

import { GeoPoint } from './geoPoint.js';
import type { Coordinates } from '../types/index.js';

/** Mean Earth radius in meters */
export const EARTH_RADIUS_METERS = 6_371_000;

/** Separations below this (about 1e-14 degrees) are reported as exactly 0 */
export const ZERO_DISTANCE_EPSILON_METERS = 1e-9;

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

/**
 * Distance in meters between two points.
 * Plain coordinate objects are validated first and raise InvalidCoordinateError.
 */
export function distance(a: Coordinates, b: Coordinates): number {
  const from = GeoPoint.from(a);
  const to = GeoPoint.from(b);

  const lat1 = toRadians(from.latitude);
  const lat2 = toRadians(to.latitude);
  const deltaLat = toRadians(to.latitude - from.latitude);
  const deltaLon = toRadians(to.longitude - from.longitude);

  const h =
    Math.sin(deltaLat / 2) ** 2 +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(deltaLon / 2) ** 2;

  // Clamp: rounding can push h past 1 near antipodes, outside asin's domain
  const meters = 2 * EARTH_RADIUS_METERS * Math.asin(Math.min(1, Math.sqrt(h)));

  return meters < ZERO_DISTANCE_EPSILON_METERS ? 0 : meters;
}

export default distance;
