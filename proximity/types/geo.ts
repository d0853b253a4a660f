/**
 * Geographic Types
 * Coordinate and location value types shared by the distance module and services
 */

import type { GeoPoint } from '../utils/geoPoint.js';

export type CoordinateField = 'latitude' | 'longitude';

/**
 * Plain coordinate pair, as read from a request body or a CSV row.
 * Degrees, WGS84.
 */
export interface Coordinates {
  latitude: number;
  longitude: number;
  identifier?: string;
}

/**
 * Latitude/longitude rectangle, in degrees
 */
export interface GeoBounds {
  minLatitude: number;
  minLongitude: number;
  maxLatitude: number;
  maxLongitude: number;
}

export interface NumericRange {
  min: number;
  max: number;
}

/**
 * Antenna site. Operator and metadata are carried for filtering and reports only.
 */
export interface Antenna {
  readonly id: string;
  readonly location: GeoPoint;
  readonly operator?: string;
  readonly metadata: Readonly<Record<string, string>>;
}

/**
 * Property parcel
 */
export interface Parcel {
  readonly id: string;
  readonly location: GeoPoint;
  readonly metadata: Readonly<Record<string, string>>;
}
