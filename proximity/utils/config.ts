import env from './env.js';
import type { CsvDelimiter, CsvEncoding, ProximityConfig } from '../types/index.js';

export const DEFAULT_THRESHOLD_METERS = 1000;
export const DEFAULT_CELL_SIZE_DEGREES = 0.5;
export const DEFAULT_LOW_COVERAGE_PERCENTILE = 10;
export const DEFAULT_PORT = 8060;

function delimiterFromEnv(): CsvDelimiter | undefined {
  const value = env.get('CSV_DELIMITER');
  return value === ',' || value === ';' ? value : undefined;
}

function encodingFromEnv(): CsvEncoding {
  const value = env.get('CSV_ENCODING')?.toLowerCase();
  return value === 'latin1' || value === 'latin-1' || value === 'iso-8859-1' ? 'latin1' : 'utf8';
}

/**
 * Read runtime settings from the environment (.env is loaded by env.ts)
 */
export function getProximityConfig(): ProximityConfig {
  return {
    thresholdMeters: env.getFloat('PROXIMITY_THRESHOLD_METERS', DEFAULT_THRESHOLD_METERS),
    csvDelimiter: delimiterFromEnv(),
    csvEncoding: encodingFromEnv(),
    coverageCellSize: env.getFloat('COVERAGE_CELL_SIZE', DEFAULT_CELL_SIZE_DEGREES),
    coveragePercentile: env.getFloat('COVERAGE_PERCENTILE', DEFAULT_LOW_COVERAGE_PERCENTILE),
    geocoderURL: env.get('GEOCODER_URL') || 'https://nominatim.openstreetmap.org',
    geocoderUserAgent: env.get('GEOCODER_USER_AGENT') || 'antenna_locator',
    geocoderTimeoutMs: env.getNumber('GEOCODER_TIMEOUT_MS', 10000),
    port: env.getNumber('PORT', DEFAULT_PORT),
  };
}

export default getProximityConfig;
