/**
 * Import/Export Types
 * CSV loading options and report shapes
 */

import type { Antenna, Parcel } from './geo.js';

export type CsvDelimiter = ',' | ';';

export type CsvEncoding = 'utf8' | 'latin1';

export type ReportFormat = 'csv' | 'json' | 'geojson';

/**
 * Raw CSV record keyed by header
 */
export type CsvRecord = Record<string, string>;

export interface ParseCSVOptions {
  delimiter?: CsvDelimiter;
  encoding?: CsvEncoding;
}

/**
 * Explicit column names; unset columns are resolved from known header names
 */
export interface ColumnMapping {
  id?: string;
  latitude?: string;
  longitude?: string;
  operator?: string;
}

export interface LoadOptions extends ParseCSVOptions {
  columns?: ColumnMapping;
  /** Report invalid rows in `rejected` instead of throwing */
  skipInvalid?: boolean;
}

export interface AntennaLoadOptions extends LoadOptions {
  /** Drop antennas whose coordinates repeat an earlier row */
  dedupe?: boolean;
}

export interface RejectedRow {
  row: number;
  identifier: string | null;
  reason: string;
}

export interface LoadResult<T> {
  records: T[];
  rejected: RejectedRow[];
}

export type AntennaLoadResult = LoadResult<Antenna>;

export type ParcelLoadResult = LoadResult<Parcel>;

/**
 * Flat report row, one per parcel
 */
export interface ReportRow {
  parcel_id: string;
  parcel_latitude: number;
  parcel_longitude: number;
  antenna_id: string;
  antenna_operator: string | null;
  distance_meters: number;
  within_threshold: boolean;
}
