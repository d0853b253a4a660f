import { InvalidCoordinateError } from './errorHandler.js';
import type { Coordinates, CoordinateField } from '../types/index.js';

const LIMITS: Record<CoordinateField, number> = {
  latitude: 90,
  longitude: 180,
};

/**
 * Throws InvalidCoordinateError unless value is a finite number within ±limit
 */
export function assertValidCoordinate(
  field: CoordinateField,
  value: unknown,
  identifier?: string,
  row?: number
): asserts value is number {
  if (typeof value !== 'number' || !Number.isFinite(value) || Math.abs(value) > LIMITS[field]) {
    throw new InvalidCoordinateError(field, value, identifier, row);
  }
}

/**
 * Immutable WGS84 point. Coordinates are validated on construction, so any
 * GeoPoint in circulation is safe to feed into distance arithmetic.
 */
export class GeoPoint implements Coordinates {
  readonly latitude: number;
  readonly longitude: number;
  readonly identifier?: string;

  constructor(latitude: number, longitude: number, identifier?: string) {
    assertValidCoordinate('latitude', latitude, identifier);
    assertValidCoordinate('longitude', longitude, identifier);

    this.latitude = latitude;
    this.longitude = longitude;
    if (identifier !== undefined) {
      this.identifier = identifier;
    }
    Object.freeze(this);
  }

  /**
   * Build a point from plain coordinates, validating them
   */
  static from(coordinates: Coordinates): GeoPoint {
    if (coordinates instanceof GeoPoint) {
      return coordinates;
    }
    return new GeoPoint(coordinates.latitude, coordinates.longitude, coordinates.identifier);
  }

  /**
   * Same coordinates, different label
   */
  withIdentifier(identifier: string): GeoPoint {
    return new GeoPoint(this.latitude, this.longitude, identifier);
  }

  /**
   * Exact coordinate equality; identifiers are ignored
   */
  equals(other: Coordinates): boolean {
    return this.latitude === other.latitude && this.longitude === other.longitude;
  }

  /**
   * GeoJSON position order: [longitude, latitude]
   */
  toPosition(): [number, number] {
    return [this.longitude, this.latitude];
  }

  toJSON(): Coordinates {
    return this.identifier !== undefined
      ? { latitude: this.latitude, longitude: this.longitude, identifier: this.identifier }
      : { latitude: this.latitude, longitude: this.longitude };
  }
}

export default GeoPoint;
