import { APIError, NoAntennaDataError } from "../utils/errorHandler.js";
import { filterByOperator, listOperators } from "../utils/operatorUtils.js";
import {
  DEFAULT_CELL_SIZE_DEGREES,
  DEFAULT_LOW_COVERAGE_PERCENTILE,
} from "../utils/config.js";
import { getLogger } from "../utils/logger.js";
import type {
  Antenna,
  CoverageCell,
  CoverageGrid,
  CoverageGridOptions,
  CoverageSummary,
  GeoBounds,
  NumericRange,
} from '../types/index.js';

/** Largest grid findLowCoverageCells will allocate */
export const MAX_GRID_CELLS = 1_000_000;

/**
 * Linear-interpolated percentile (0-100) of a non-empty list
 */
export function percentile(values: readonly number[], p: number): number {
  const sorted = [...values].sort((a, b) => a - b);
  const rank = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
}

function rangeOf(values: readonly number[]): NumericRange {
  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    min = Math.min(min, value);
    max = Math.max(max, value);
  }
  return { min, max };
}

/**
 * Dataset overview and grid-based density analysis of antenna sites
 */
class CoverageService {
  summarize(antennas: readonly Antenna[]): CoverageSummary {
    if (antennas.length === 0) {
      throw new NoAntennaDataError();
    }

    const locations = new Set(antennas.map((a) => `${a.location.latitude},${a.location.longitude}`));

    return {
      totalAntennas: antennas.length,
      uniqueLocations: locations.size,
      latitudeRange: rangeOf(antennas.map((a) => a.location.latitude)),
      longitudeRange: rangeOf(antennas.map((a) => a.location.longitude)),
      operators: listOperators(antennas),
    };
  }

  /**
   * Count antennas per grid cell and flag the sparsest cells.
   * A cell is low-coverage when its count is at or below the given percentile
   * of the non-empty cell counts; empty cells always qualify.
   */
  findLowCoverageCells(antennas: readonly Antenna[], options: CoverageGridOptions = {}): CoverageGrid {
    const cellSize = options.cellSizeDegrees ?? DEFAULT_CELL_SIZE_DEGREES;
    const pct = options.percentile ?? DEFAULT_LOW_COVERAGE_PERCENTILE;

    if (!Number.isFinite(cellSize) || cellSize <= 0) {
      throw new APIError("Cell size must be a positive number of degrees", 400, { cellSize });
    }
    if (!Number.isFinite(pct) || pct < 0 || pct > 100) {
      throw new APIError("Percentile must be between 0 and 100", 400, { percentile: pct });
    }

    let sites = antennas;
    if (options.operator) {
      sites = filterByOperator(antennas, options.operator);
      if (sites.length === 0) {
        throw new NoAntennaDataError(options.operator, listOperators(antennas));
      }
    }
    if (sites.length === 0) {
      throw new NoAntennaDataError();
    }

    const bounds = options.bounds ?? this.extentOf(sites);
    if (bounds.minLatitude > bounds.maxLatitude || bounds.minLongitude > bounds.maxLongitude) {
      throw new APIError("Grid bounds are inverted", 400, { bounds });
    }

    const rows = Math.max(1, Math.ceil((bounds.maxLatitude - bounds.minLatitude) / cellSize));
    const columns = Math.max(1, Math.ceil((bounds.maxLongitude - bounds.minLongitude) / cellSize));
    if (rows * columns > MAX_GRID_CELLS) {
      throw new APIError("Grid too fine for the requested bounds", 400, { rows, columns, maxCells: MAX_GRID_CELLS });
    }
    const counts = new Array<number>(rows * columns).fill(0);
    let outsideBounds = 0;

    for (const { location } of sites) {
      if (
        location.latitude < bounds.minLatitude || location.latitude > bounds.maxLatitude ||
        location.longitude < bounds.minLongitude || location.longitude > bounds.maxLongitude
      ) {
        outsideBounds++;
        continue;
      }
      // Points on the max edge belong to the last row/column
      const row = Math.min(rows - 1, Math.floor((location.latitude - bounds.minLatitude) / cellSize));
      const column = Math.min(columns - 1, Math.floor((location.longitude - bounds.minLongitude) / cellSize));
      counts[row * columns + column]++;
    }

    const occupied = counts.filter((count) => count > 0);
    const threshold = occupied.length > 0 ? percentile(occupied, pct) : 0;

    const cells: CoverageCell[] = counts.map((antennaCount, index) => {
      const row = Math.floor(index / columns);
      const column = index % columns;
      return {
        row,
        column,
        bounds: {
          minLatitude: bounds.minLatitude + row * cellSize,
          minLongitude: bounds.minLongitude + column * cellSize,
          maxLatitude: Math.min(bounds.maxLatitude, bounds.minLatitude + (row + 1) * cellSize),
          maxLongitude: Math.min(bounds.maxLongitude, bounds.minLongitude + (column + 1) * cellSize),
        },
        antennaCount,
        lowCoverage: antennaCount <= threshold,
      };
    });

    const lowCoverageCells = cells.filter((cell) => cell.lowCoverage);

    getLogger().debug(
      { rows, columns, threshold, lowCoverage: lowCoverageCells.length, outsideBounds },
      "Coverage grid computed"
    );

    return {
      bounds,
      cellSizeDegrees: cellSize,
      percentile: pct,
      threshold,
      rows,
      columns,
      outsideBounds,
      cells,
      lowCoverageCells,
    };
  }

  private extentOf(antennas: readonly Antenna[]): GeoBounds {
    const latitude = rangeOf(antennas.map((a) => a.location.latitude));
    const longitude = rangeOf(antennas.map((a) => a.location.longitude));
    return {
      minLatitude: latitude.min,
      minLongitude: longitude.min,
      maxLatitude: latitude.max,
      maxLongitude: longitude.max,
    };
  }
}

export const coverageService = new CoverageService();

export default CoverageService;
