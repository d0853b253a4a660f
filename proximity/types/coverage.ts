/**
 * Coverage Analysis Types
 */

import type { GeoBounds, NumericRange } from './geo.js';

export interface CoverageSummary {
  totalAntennas: number;
  uniqueLocations: number;
  latitudeRange: NumericRange;
  longitudeRange: NumericRange;
  operators: string[];
}

export interface CoverageGridOptions {
  bounds?: GeoBounds;
  cellSizeDegrees?: number;
  percentile?: number;
  operator?: string;
}

export interface CoverageCell {
  row: number;
  column: number;
  bounds: GeoBounds;
  antennaCount: number;
  lowCoverage: boolean;
}

export interface CoverageGrid {
  bounds: GeoBounds;
  cellSizeDegrees: number;
  percentile: number;
  /** Antenna count at or below which a cell is low-coverage */
  threshold: number;
  rows: number;
  columns: number;
  outsideBounds: number;
  cells: CoverageCell[];
  lowCoverageCells: CoverageCell[];
}
