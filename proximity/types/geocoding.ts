/**
 * Geocoding Types
 */

import type { AxiosInstance } from 'axios';

export interface GeocoderOptions {
  baseURL?: string;
  userAgent?: string;
  timeoutMs?: number;
  /** Preconfigured client, mainly for tests */
  client?: AxiosInstance;
}

/**
 * Subset of a Nominatim search hit. Nominatim returns coordinates as strings.
 */
export interface NominatimPlace {
  lat: string;
  lon: string;
  display_name?: string;
  place_id?: number;
}
