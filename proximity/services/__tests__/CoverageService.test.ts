/**
 * Coverage Service Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import CoverageService, { MAX_GRID_CELLS, percentile } from '../CoverageService.js';
import { GeoPoint } from '../../utils/geoPoint.js';
import { APIError, NoAntennaDataError } from '../../utils/errorHandler.js';
import type { Antenna } from '../../types/index.js';

const antenna = (id: string, latitude: number, longitude: number, operator?: string): Antenna =>
  operator
    ? { id, location: new GeoPoint(latitude, longitude, id), operator, metadata: {} }
    : { id, location: new GeoPoint(latitude, longitude, id), metadata: {} };

const rejectsWith = (fn: () => unknown, statusCode: number, message: string) => {
  assert.throws(fn, (error: unknown) =>
    error instanceof APIError && error.statusCode === statusCode && error.message === message
  );
};

describe('percentile', () => {
  it('should interpolate between ranks', () => {
    assert.ok(Math.abs(percentile([3, 1], 10) - 1.2) < 1e-9);
    assert.equal(percentile([4, 2, 1, 3], 50), 2.5);
  });

  it('should return the only value of a single-element list', () => {
    assert.equal(percentile([5], 50), 5);
  });

  it('should return the extremes at 0 and 100', () => {
    assert.equal(percentile([7, 2, 9], 0), 2);
    assert.equal(percentile([7, 2, 9], 100), 9);
  });
});

describe('CoverageService', () => {
  const service = new CoverageService();

  describe('summarize', () => {
    it('should describe the dataset', () => {
      const summary = service.summarize([
        antenna('A1', 48.8, 2.3, 'ORANGE'),
        antenna('A2', 48.8, 2.3, 'SFR'),
        antenna('A3', 45.7, 4.8, 'free'),
      ]);

      assert.deepEqual(summary, {
        totalAntennas: 3,
        uniqueLocations: 2,
        latitudeRange: { min: 45.7, max: 48.8 },
        longitudeRange: { min: 2.3, max: 4.8 },
        operators: ['FREE MOBILE', 'ORANGE', 'SFR'],
      });
    });

    it('should throw for an empty dataset', () => {
      assert.throws(() => service.summarize([]), NoAntennaDataError);
    });
  });

  describe('findLowCoverageCells', () => {
    const bounds = { minLatitude: 0, minLongitude: 0, maxLatitude: 2, maxLongitude: 2 };
    const antennas = [
      antenna('A1', 0.2, 0.2),
      antenna('A2', 0.5, 0.5),
      antenna('A3', 0.8, 0.8),
      antenna('A4', 0.5, 1.5),
      antenna('A5', 2, 2),
      antenna('A6', 5, 5),
    ];

    it('should count antennas per cell and flag the sparse ones', () => {
      const grid = service.findLowCoverageCells(antennas, { bounds, cellSizeDegrees: 1, percentile: 10 });

      assert.equal(grid.rows, 2);
      assert.equal(grid.columns, 2);
      assert.equal(grid.outsideBounds, 1);
      assert.equal(grid.threshold, 1);
      assert.deepEqual(grid.cells.map((cell) => cell.antennaCount), [3, 1, 0, 1]);
      assert.deepEqual(
        grid.lowCoverageCells.map((cell) => [cell.row, cell.column]),
        [[0, 1], [1, 0], [1, 1]]
      );
    });

    it('should compute cell bounds from the grid origin', () => {
      const grid = service.findLowCoverageCells(antennas, { bounds, cellSizeDegrees: 1, percentile: 10 });

      assert.deepEqual(grid.cells[3].bounds, {
        minLatitude: 1,
        minLongitude: 1,
        maxLatitude: 2,
        maxLongitude: 2,
      });
    });

    it('should use the dataset extent when no bounds are given', () => {
      const grid = service.findLowCoverageCells([antenna('A1', 1, 1), antenna('A2', 1, 1)], { cellSizeDegrees: 0.5 });

      assert.equal(grid.rows, 1);
      assert.equal(grid.columns, 1);
      assert.equal(grid.percentile, 10);
      assert.deepEqual(grid.cells[0].bounds, { minLatitude: 1, minLongitude: 1, maxLatitude: 1, maxLongitude: 1 });
      assert.equal(grid.cells[0].antennaCount, 2);
      assert.equal(grid.cells[0].lowCoverage, true);
    });

    it('should only count antennas of the requested operator', () => {
      const mixed = [
        antenna('A1', 0.5, 0.5, 'SFR'),
        antenna('A2', 0.5, 0.6, 'ORANGE'),
        antenna('A3', 1.5, 1.5, 'SFR'),
      ];

      const grid = service.findLowCoverageCells(mixed, { bounds, cellSizeDegrees: 1, operator: 'sfr france' });

      assert.deepEqual(grid.cells.map((cell) => cell.antennaCount), [1, 0, 0, 1]);
    });

    it('should throw when the operator has no antennas', () => {
      assert.throws(
        () => service.findLowCoverageCells([antenna('A1', 0, 0, 'SFR')], { operator: 'ORANGE' }),
        NoAntennaDataError
      );
    });

    it('should refuse a grid larger than the cell limit before allocating it', () => {
      // 2 degrees / 2^-10 = 2048 rows and columns
      assert.throws(
        () => service.findLowCoverageCells(antennas, { bounds, cellSizeDegrees: 2 ** -10 }),
        (error: unknown) => {
          assert.ok(error instanceof APIError);
          assert.equal(error.statusCode, 400);
          assert.equal(error.message, 'Grid too fine for the requested bounds');
          assert.deepEqual(error.details, { rows: 2048, columns: 2048, maxCells: MAX_GRID_CELLS });
          return true;
        }
      );
    });

    it('should validate its options', () => {
      rejectsWith(() => service.findLowCoverageCells(antennas, { cellSizeDegrees: 0 }), 400, 'Cell size must be a positive number of degrees');
      rejectsWith(() => service.findLowCoverageCells(antennas, { percentile: 101 }), 400, 'Percentile must be between 0 and 100');
      rejectsWith(
        () => service.findLowCoverageCells(antennas, {
          bounds: { minLatitude: 2, minLongitude: 0, maxLatitude: 1, maxLongitude: 1 },
        }),
        400,
        'Grid bounds are inverted'
      );
    });
  });
});
