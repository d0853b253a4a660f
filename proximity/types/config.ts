/**
 * Configuration Types
 */

import type { CsvDelimiter, CsvEncoding } from './import-export.js';

export interface ProximityConfig {
  thresholdMeters: number;
  csvDelimiter: CsvDelimiter | undefined;
  csvEncoding: CsvEncoding;
  coverageCellSize: number;
  coveragePercentile: number;
  geocoderURL: string;
  geocoderUserAgent: string;
  geocoderTimeoutMs: number;
  port: number;
}
