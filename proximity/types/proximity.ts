/**
 * Proximity Types
 * Results of nearest-antenna evaluation. All distances are in meters.
 */

import type { Antenna, Parcel } from './geo.js';

export interface ProximityResult {
  parcel: Parcel;
  nearestAntenna: Antenna;
  distanceMeters: number;
  withinThreshold: boolean;
}

export interface NearestAntenna {
  antenna: Antenna;
  distanceMeters: number;
}

export interface ProximityOptions {
  /** Restrict candidates to a single operator (name is normalized first) */
  operator?: string;
}
