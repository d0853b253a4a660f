/**
 * Import Utilities
 *
 * Loads antenna and parcel records from CSV exports (comma or semicolon
 * separated, UTF-8 or Latin-1) and turns rows into validated value objects.
 */

import { readFile } from 'fs/promises';
import { parse as csvParse } from 'csv-parse/sync';
import { APIError, InvalidCoordinateError } from './errorHandler.js';
import { GeoPoint } from './geoPoint.js';
import { getLogger } from './logger.js';
import type {
  Antenna,
  AntennaLoadOptions,
  AntennaLoadResult,
  ColumnMapping,
  CoordinateField,
  CsvDelimiter,
  CsvEncoding,
  CsvRecord,
  LoadOptions,
  ParcelLoadResult,
  Parcel,
  ParseCSVOptions,
  RejectedRow,
} from '../types/index.js';

export type { CsvRecord, LoadOptions, AntennaLoadOptions, AntennaLoadResult, ParcelLoadResult };

/**
 * Header names recognised when no explicit column is configured, lower-case
 */
export const COLUMN_CANDIDATES: Record<keyof ColumnMapping, string[]> = {
  id: ['id', 'identifier', 'parcel_id', 'antenna_id', 'numéro de support', 'numéro du support'],
  latitude: ['latitude', 'lat'],
  longitude: ['longitude', 'lon', 'lng'],
  operator: ['operator', 'exploitant'],
};

interface ResolvedColumns {
  id: string | undefined;
  latitude: string;
  longitude: string;
  operator: string | undefined;
}

// Plain decimal or exponent notation; rejects hex, binary and "Infinity"
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

// Header line is line 1, so the first data record sits on line 2
const FIRST_DATA_ROW = 2;

function normalizeHeader(header: string): string {
  return header.normalize('NFC').trim().toLowerCase();
}

function isCsvRecord(value: unknown): value is CsvRecord {
  return typeof value === 'object'
    && value !== null
    && !Array.isArray(value)
    && Object.values(value).every(cell => typeof cell === 'string');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const importUtils = {
  /**
   * Decode a file buffer; strings pass through untouched
   */
  decode(input: Buffer | string, encoding: CsvEncoding = 'utf8'): string {
    return typeof input === 'string' ? input : input.toString(encoding);
  },

  /**
   * Pick ';' when the header line holds more semicolons than commas
   */
  detectDelimiter(text: string): CsvDelimiter {
    const newline = text.indexOf('\n');
    const header = newline === -1 ? text : text.slice(0, newline);
    const semicolons = header.split(';').length - 1;
    const commas = header.split(',').length - 1;
    return semicolons > commas ? ';' : ',';
  },

  /**
   * Parse CSV text into header-keyed records
   * @param input - File buffer or text
   * @param options - Delimiter and encoding; the delimiter is detected when omitted
   */
  parseCSV(input: Buffer | string, options: ParseCSVOptions = {}): CsvRecord[] {
    const text = importUtils.decode(input, options.encoding);
    const delimiter = options.delimiter ?? importUtils.detectDelimiter(text);

    let parsed: unknown;
    try {
      parsed = csvParse(text, {
        delimiter,
        columns: true,
        skip_empty_lines: true,
        trim: true,
        bom: true,
      });
    } catch (error) {
      throw new APIError(`CSV parsing error: ${errorMessage(error)}`, 400);
    }

    if (!Array.isArray(parsed) || !parsed.every(isCsvRecord)) {
      throw new APIError('CSV parsing error: expected one record per data line', 400);
    }

    return parsed;
  },

  /**
   * Find the header matching an explicit column name or one of the known candidates
   */
  findColumn(headers: string[], explicit: string | undefined, candidates: string[]): string | undefined {
    if (explicit !== undefined) {
      const wanted = normalizeHeader(explicit);
      const match = headers.find(header => normalizeHeader(header) === wanted);
      if (!match) {
        throw new APIError(`Column "${explicit}" not found in CSV header`, 400, { headers });
      }
      return match;
    }

    for (const candidate of candidates) {
      const match = headers.find(header => normalizeHeader(header) === candidate);
      if (match) {
        return match;
      }
    }
    return undefined;
  },

  resolveColumns(headers: string[], mapping: ColumnMapping = {}): ResolvedColumns {
    const latitude = importUtils.findColumn(headers, mapping.latitude, COLUMN_CANDIDATES.latitude);
    const longitude = importUtils.findColumn(headers, mapping.longitude, COLUMN_CANDIDATES.longitude);

    if (!latitude || !longitude) {
      throw new APIError('CSV must contain latitude and longitude columns', 400, { headers });
    }

    return {
      id: importUtils.findColumn(headers, mapping.id, COLUMN_CANDIDATES.id),
      latitude,
      longitude,
      operator: importUtils.findColumn(headers, mapping.operator, COLUMN_CANDIDATES.operator),
    };
  },

  /**
   * Parse a coordinate cell. Accepts a decimal comma ("48,8566").
   * Returns NaN for empty cells and anything that is not a plain decimal.
   */
  parseCoordinate(raw: string | undefined): number {
    const value = (raw ?? '').trim();
    if (value === '') {
      return NaN;
    }
    const normalized = value.includes(',') && !value.includes('.') ? value.replace(',', '.') : value;
    return DECIMAL_PATTERN.test(normalized) ? Number(normalized) : NaN;
  },

  /**
   * Build a validated point from one record
   * @throws InvalidCoordinateError naming the record and its row
   */
  toGeoPoint(record: CsvRecord, columns: ResolvedColumns, identifier: string, row: number): GeoPoint {
    const fields: Array<[CoordinateField, string]> = [
      ['latitude', columns.latitude],
      ['longitude', columns.longitude],
    ];

    const values: number[] = [];
    for (const [field, column] of fields) {
      const raw = record[column];
      const value = importUtils.parseCoordinate(raw);
      if (!Number.isFinite(value)) {
        throw new InvalidCoordinateError(field, raw ?? '', identifier, row);
      }
      values.push(value);
    }

    const [latitude, longitude] = values;
    try {
      return new GeoPoint(latitude, longitude, identifier);
    } catch (error) {
      if (error instanceof InvalidCoordinateError) {
        throw new InvalidCoordinateError(error.field, error.value, identifier, row);
      }
      throw error;
    }
  },

  /**
   * Columns other than the identity, coordinate and operator columns
   */
  extractMetadata(record: CsvRecord, columns: ResolvedColumns): Record<string, string> {
    const reserved = new Set([columns.id, columns.latitude, columns.longitude, columns.operator]);
    const metadata: Record<string, string> = {};
    for (const [key, value] of Object.entries(record)) {
      if (!reserved.has(key)) {
        metadata[key] = value;
      }
    }
    return metadata;
  },

  /**
   * Walk records, building one value per row. Invalid rows throw unless skipInvalid is set.
   */
  buildRecords<T>(
    records: CsvRecord[],
    options: LoadOptions,
    build: (record: CsvRecord, columns: ResolvedColumns, identifier: string, row: number) => T
  ): { records: T[]; rejected: RejectedRow[] } {
    if (records.length === 0) {
      return { records: [], rejected: [] };
    }

    const columns = importUtils.resolveColumns(Object.keys(records[0]), options.columns);
    const built: T[] = [];
    const rejected: RejectedRow[] = [];

    records.forEach((record, index) => {
      const row = index + FIRST_DATA_ROW;
      const cell = columns.id ? record[columns.id] : undefined;
      const identifier = cell ? cell : `row-${row}`;

      try {
        built.push(build(record, columns, identifier, row));
      } catch (error) {
        if (!options.skipInvalid || !(error instanceof InvalidCoordinateError)) {
          throw error;
        }
        rejected.push({ row, identifier, reason: error.message });
      }
    });

    if (rejected.length > 0) {
      getLogger().debug({ rejected: rejected.length }, 'Skipped rows with invalid coordinates');
    }

    return { records: built, rejected };
  },

  /**
   * Build antennas from parsed records
   */
  buildAntennas(records: CsvRecord[], options: AntennaLoadOptions = {}): AntennaLoadResult {
    const result = importUtils.buildRecords<Antenna>(records, options, (record, columns, identifier, row) => {
      const location = importUtils.toGeoPoint(record, columns, identifier, row);
      const operator = columns.operator ? record[columns.operator] : undefined;
      const metadata = importUtils.extractMetadata(record, columns);
      return operator
        ? { id: identifier, location, operator, metadata }
        : { id: identifier, location, metadata };
    });

    if (!options.dedupe) {
      return result;
    }

    const seen = new Set<string>();
    const unique = result.records.filter(antenna => {
      const key = `${antenna.location.latitude},${antenna.location.longitude}`;
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    });
    return { records: unique, rejected: result.rejected };
  },

  /**
   * Build parcels from parsed records
   */
  buildParcels(records: CsvRecord[], options: LoadOptions = {}): ParcelLoadResult {
    return importUtils.buildRecords<Parcel>(records, options, (record, columns, identifier, row) => ({
      id: identifier,
      location: importUtils.toGeoPoint(record, columns, identifier, row),
      metadata: importUtils.extractMetadata(record, columns),
    }));
  },

  loadAntennas(input: Buffer | string, options: AntennaLoadOptions = {}): AntennaLoadResult {
    return importUtils.buildAntennas(importUtils.parseCSV(input, options), options);
  },

  loadParcels(input: Buffer | string, options: LoadOptions = {}): ParcelLoadResult {
    return importUtils.buildParcels(importUtils.parseCSV(input, options), options);
  },

  /**
   * Inner-join antenna rows with a separate locations export on the support identifier.
   * Antenna columns win on conflicts; the locations identifier column is dropped.
   */
  mergeAntennaLocations(antennaRecords: CsvRecord[], locationRecords: CsvRecord[]): CsvRecord[] {
    if (antennaRecords.length === 0 || locationRecords.length === 0) {
      return [];
    }

    const antennaKey = importUtils.findColumn(Object.keys(antennaRecords[0]), undefined, COLUMN_CANDIDATES.id);
    const locationKey = importUtils.findColumn(Object.keys(locationRecords[0]), undefined, COLUMN_CANDIDATES.id);
    if (!antennaKey || !locationKey) {
      throw new APIError('Both antenna and location files need a support identifier column', 400);
    }

    const locationsById = new Map<string, CsvRecord>();
    for (const location of locationRecords) {
      const key = location[locationKey];
      if (key && !locationsById.has(key)) {
        const { [locationKey]: _dropped, ...rest } = location;
        locationsById.set(key, rest);
      }
    }

    const merged: CsvRecord[] = [];
    for (const antenna of antennaRecords) {
      const location = locationsById.get(antenna[antennaKey]);
      if (location) {
        merged.push({ ...location, ...antenna });
      }
    }
    return merged;
  },

  /**
   * Read an antenna CSV, optionally joined with a separate locations CSV
   */
  async loadAntennaFile(
    path: string,
    options: AntennaLoadOptions & { locationsPath?: string } = {}
  ): Promise<AntennaLoadResult> {
    const logger = getLogger();
    const antennaRecords = importUtils.parseCSV(await readFile(path), options);
    logger.info({ path, rows: antennaRecords.length }, 'Loaded antenna file');

    let records = antennaRecords;
    if (options.locationsPath) {
      const locationRecords = importUtils.parseCSV(await readFile(options.locationsPath), options);
      records = importUtils.mergeAntennaLocations(antennaRecords, locationRecords);
      logger.info(
        { path: options.locationsPath, rows: locationRecords.length, merged: records.length },
        'Merged antenna locations'
      );
    }

    return importUtils.buildAntennas(records, options);
  },

  async loadParcelFile(path: string, options: LoadOptions = {}): Promise<ParcelLoadResult> {
    const records = importUtils.parseCSV(await readFile(path), options);
    getLogger().info({ path, rows: records.length }, 'Loaded parcel file');
    return importUtils.buildParcels(records, options);
  },
};

export const {
  parseCSV,
  loadAntennas,
  loadParcels,
  mergeAntennaLocations,
  loadAntennaFile,
  loadParcelFile,
} = importUtils;

export default importUtils;
