/**
 * Route Types
 */

import type { Express } from 'express';
import type { Antenna } from './geo.js';
import type GeocodingService from '../services/GeocodingService.js';

/**
 * Shared state handed to every route module
 */
export interface RouteContext {
  /** Antenna dataset loaded at startup; requests may also supply their own */
  antennas: readonly Antenna[];
  defaultThresholdMeters: number;
  geocoder?: GeocodingService;
}

export interface RouteModule {
  id: string;
  handler: (app: Express, context: RouteContext) => void;
}
