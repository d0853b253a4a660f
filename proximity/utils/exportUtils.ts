/**
 * Export Utilities
 *
 * Renders proximity results as CSV, JSON or GeoJSON reports.
 */

import type { Feature, FeatureCollection, Point } from 'geojson';
import { APIError } from './errorHandler.js';
import type { ProximityResult, ReportFormat, ReportRow } from '../types/index.js';

export const REPORT_FIELDS: Array<keyof ReportRow> = [
  'parcel_id',
  'parcel_latitude',
  'parcel_longitude',
  'antenna_id',
  'antenna_operator',
  'distance_meters',
  'within_threshold',
];

const roundTo = (value: number, decimals: number): number => {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
};

const exportUtils = {
  toReportRow(result: ProximityResult): ReportRow {
    return {
      parcel_id: result.parcel.id,
      parcel_latitude: result.parcel.location.latitude,
      parcel_longitude: result.parcel.location.longitude,
      antenna_id: result.nearestAntenna.id,
      antenna_operator: result.nearestAntenna.operator ?? null,
      distance_meters: roundTo(result.distanceMeters, 2),
      within_threshold: result.withinThreshold,
    };
  },

  toReportRows(results: readonly ProximityResult[]): ReportRow[] {
    return results.map(exportUtils.toReportRow);
  },

  /**
   * Export rows to CSV
   * @param rows - Report rows
   * @param fields - Columns to include, in order
   * @returns CSV string, every cell quoted
   */
  exportToCSV(rows: readonly ReportRow[], fields: Array<keyof ReportRow> = REPORT_FIELDS): string {
    const header = fields.map(col => `"${col}"`).join(',');

    const lines = rows.map(row => {
      return fields.map(col => {
        const value = row[col];
        if (value === null || value === undefined) {
          return '';
        }
        const escaped = String(value).replace(/"/g, '""');
        return `"${escaped}"`;
      }).join(',');
    });

    return [header, ...lines].join('\n');
  },

  exportToJSON(rows: readonly ReportRow[]): string {
    return JSON.stringify(rows, null, 2);
  },

  /**
   * Parcels as GeoJSON points with the report row as properties
   */
  toFeatureCollection(results: readonly ProximityResult[]): FeatureCollection<Point, ReportRow> {
    const features: Array<Feature<Point, ReportRow>> = results.map(result => ({
      type: 'Feature',
      geometry: {
        type: 'Point',
        coordinates: result.parcel.location.toPosition(),
      },
      properties: exportUtils.toReportRow(result),
    }));

    return { type: 'FeatureCollection', features };
  },

  exportToGeoJSON(results: readonly ProximityResult[]): string {
    return JSON.stringify(exportUtils.toFeatureCollection(results), null, 2);
  },

  renderReport(results: readonly ProximityResult[], format: ReportFormat): string {
    switch (format) {
      case 'csv':
        return exportUtils.exportToCSV(exportUtils.toReportRows(results));
      case 'json':
        return exportUtils.exportToJSON(exportUtils.toReportRows(results));
      case 'geojson':
        return exportUtils.exportToGeoJSON(results);
      default: {
        const unknownFormat: never = format;
        throw new APIError(`Unsupported report format: ${String(unknownFormat)}`, 400);
      }
    }
  },

  isReportFormat(value: string): value is ReportFormat {
    return value === 'csv' || value === 'json' || value === 'geojson';
  },
};

export const { toReportRows, exportToCSV, exportToJSON, exportToGeoJSON, renderReport, isReportFormat } = exportUtils;

export default exportUtils;
