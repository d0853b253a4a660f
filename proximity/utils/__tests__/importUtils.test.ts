/**
 * Import Utilities Tests
 * CSV parsing, column resolution, row validation and antenna/location merging
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import importUtils from '../importUtils.js';
import { APIError, InvalidCoordinateError } from '../errorHandler.js';

describe('importUtils.parseCSV', () => {
  it('should parse comma separated records keyed by header', () => {
    const records = importUtils.parseCSV('id,latitude,longitude\nA, 1.5 ,2\n\nB,3,4\n');
    assert.deepEqual(records, [
      { id: 'A', latitude: '1.5', longitude: '2' },
      { id: 'B', latitude: '3', longitude: '4' },
    ]);
  });

  it('should detect semicolon delimiters from the header', () => {
    assert.equal(importUtils.detectDelimiter('id;latitude;longitude\n1;2,5;3'), ';');
    assert.equal(importUtils.detectDelimiter('id,latitude,longitude'), ',');
  });

  it('should strip a UTF-8 byte order mark', () => {
    const records = importUtils.parseCSV('\uFEFFid,latitude,longitude\nA,1,2\n');
    assert.deepEqual(Object.keys(records[0]), ['id', 'latitude', 'longitude']);
  });

  it('should wrap parser failures in a 400 APIError', () => {
    assert.throws(
      () => importUtils.parseCSV('id,latitude,longitude\n"A,1,2\n'),
      (error: unknown) => {
        assert.ok(error instanceof APIError);
        assert.equal(error.statusCode, 400);
        assert.ok(error.message.startsWith('CSV parsing error: '));
        return true;
      }
    );
  });
});

describe('importUtils.parseCoordinate', () => {
  it('should accept decimal commas and reject blanks', () => {
    assert.equal(importUtils.parseCoordinate('48,8566'), 48.8566);
    assert.equal(importUtils.parseCoordinate(' -1.25 '), -1.25);
    assert.ok(Number.isNaN(importUtils.parseCoordinate('')));
    assert.ok(Number.isNaN(importUtils.parseCoordinate('n/a')));
    assert.ok(Number.isNaN(importUtils.parseCoordinate(undefined)));
  });

  it('should only accept plain decimal notation', () => {
    assert.equal(importUtils.parseCoordinate('+.5'), 0.5);
    assert.equal(importUtils.parseCoordinate('4.5e1'), 45);
    assert.equal(importUtils.parseCoordinate('12.'), 12);
    assert.ok(Number.isNaN(importUtils.parseCoordinate('0x1A')));
    assert.ok(Number.isNaN(importUtils.parseCoordinate('0b1')));
    assert.ok(Number.isNaN(importUtils.parseCoordinate('0o7')));
    assert.ok(Number.isNaN(importUtils.parseCoordinate('Infinity')));
    assert.ok(Number.isNaN(importUtils.parseCoordinate('1,234.5')));
  });

  it('should reject a hex coordinate cell with the row number', () => {
    assert.throws(
      () => importUtils.loadParcels('id,latitude,longitude\nP1,0x1A,2\n'),
      (error: unknown) =>
        error instanceof InvalidCoordinateError &&
        error.message === 'Invalid latitude 0x1A for record "P1" (row 2)'
    );
  });
});

describe('importUtils.loadParcels', () => {
  it('should build parcels with metadata from a semicolon file', () => {
    const { records, rejected } = importUtils.loadParcels('id;latitude;longitude;owner\nP1;48,8566;2,3522;Dupont\n');

    assert.equal(rejected.length, 0);
    assert.equal(records.length, 1);
    assert.equal(records[0].id, 'P1');
    assert.equal(records[0].location.latitude, 48.8566);
    assert.equal(records[0].location.longitude, 2.3522);
    assert.equal(records[0].location.identifier, 'P1');
    assert.deepEqual(records[0].metadata, { owner: 'Dupont' });
  });

  it('should name the record and row of an out-of-range coordinate', () => {
    assert.throws(
      () => importUtils.loadParcels('id,latitude,longitude\nA,10,10\nB,200,10\n'),
      (error: unknown) => {
        assert.ok(error instanceof InvalidCoordinateError);
        assert.equal(error.identifier, 'B');
        assert.equal(error.field, 'latitude');
        assert.equal(error.message, 'Invalid latitude 200 for record "B" (row 3)');
        assert.deepEqual(error.details, { identifier: 'B', field: 'latitude', value: 200, row: 3 });
        return true;
      }
    );
  });

  it('should treat an empty coordinate cell as invalid', () => {
    assert.throws(
      () => importUtils.loadParcels('id,latitude,longitude\nC,,5\n'),
      (error: unknown) => {
        assert.ok(error instanceof InvalidCoordinateError);
        assert.equal(error.field, 'latitude');
        assert.equal(error.value, '');
        return true;
      }
    );
  });

  it('should collect invalid rows when skipInvalid is set', () => {
    const { records, rejected } = importUtils.loadParcels(
      'id,latitude,longitude\nA,10,10\nB,200,10\nC,11,abc\n',
      { skipInvalid: true }
    );

    assert.deepEqual(records.map(p => p.id), ['A']);
    assert.deepEqual(rejected, [
      { row: 3, identifier: 'B', reason: 'Invalid latitude 200 for record "B" (row 3)' },
      { row: 4, identifier: 'C', reason: 'Invalid longitude abc for record "C" (row 4)' },
    ]);
  });

  it('should fall back to row labels when there is no identifier column', () => {
    const { records } = importUtils.loadParcels('lat,lng\n1,2\n3,4\n');
    assert.deepEqual(records.map(p => p.id), ['row-2', 'row-3']);
  });

  it('should honour explicit column names', () => {
    const { records } = importUtils.loadParcels('code,y,x\nZ9,45.5,4.25\n', {
      columns: { id: 'code', latitude: 'y', longitude: 'x' },
    });
    assert.equal(records[0].id, 'Z9');
    assert.equal(records[0].location.latitude, 45.5);
    assert.equal(records[0].location.longitude, 4.25);
  });

  it('should reject files without coordinate columns', () => {
    assert.throws(
      () => importUtils.loadParcels('id,name\n1,x\n'),
      (error: unknown) => error instanceof APIError && error.message === 'CSV must contain latitude and longitude columns'
    );
  });

  it('should reject an explicit column that is missing', () => {
    assert.throws(
      () => importUtils.loadParcels('id,latitude,longitude\n1,2,3\n', { columns: { id: 'parcel' } }),
      (error: unknown) => error instanceof APIError && error.message === 'Column "parcel" not found in CSV header'
    );
  });

  it('should return nothing for a header-only file', () => {
    assert.deepEqual(importUtils.loadParcels('id,latitude,longitude\n'), { records: [], rejected: [] });
  });
});

describe('importUtils.loadAntennas', () => {
  it('should read Latin-1 exports with French headers', () => {
    const buffer = Buffer.from('Numéro de support;Exploitant;Latitude;Longitude\n123;ORANGE;45,1;4,2\n', 'latin1');
    const { records } = importUtils.loadAntennas(buffer, { encoding: 'latin1' });

    assert.equal(records.length, 1);
    assert.equal(records[0].id, '123');
    assert.equal(records[0].operator, 'ORANGE');
    assert.equal(records[0].location.latitude, 45.1);
    assert.equal(records[0].location.longitude, 4.2);
    assert.deepEqual(records[0].metadata, {});
  });

  it('should omit the operator when the column is absent', () => {
    const { records } = importUtils.loadAntennas('id,latitude,longitude\nA1,1,2\n');
    assert.equal('operator' in records[0], false);
  });

  it('should drop repeated coordinates when dedupe is set', () => {
    const csv = 'id,operator,latitude,longitude\nA1,FREE,1,2\nA2,SFR,1,2\nA3,SFR,1,3\n';
    assert.equal(importUtils.loadAntennas(csv).records.length, 3);
    assert.deepEqual(importUtils.loadAntennas(csv, { dedupe: true }).records.map(a => a.id), ['A1', 'A3']);
  });
});

describe('importUtils.mergeAntennaLocations', () => {
  it('should inner-join antenna rows with their support location', () => {
    const antennas = [
      { 'Numéro de support': '1', Exploitant: 'FREE MOBILE' },
      { 'Numéro de support': '2', Exploitant: 'ORANGE' },
      { 'Numéro de support': '1', Exploitant: 'SFR' },
    ];
    const locations = [
      { 'Numéro du support': '1', Latitude: '45', Longitude: '5' },
      { 'Numéro du support': '3', Latitude: '46', Longitude: '6' },
    ];

    const merged = importUtils.mergeAntennaLocations(antennas, locations);

    assert.deepEqual(merged, [
      { Latitude: '45', Longitude: '5', 'Numéro de support': '1', Exploitant: 'FREE MOBILE' },
      { Latitude: '45', Longitude: '5', 'Numéro de support': '1', Exploitant: 'SFR' },
    ]);

    const built = importUtils.buildAntennas(merged);
    assert.deepEqual(built.records.map(a => [a.id, a.operator]), [['1', 'FREE MOBILE'], ['1', 'SFR']]);
  });

  it('should return no rows when either side is empty', () => {
    assert.deepEqual(importUtils.mergeAntennaLocations([], [{ id: '1', latitude: '1', longitude: '1' }]), []);
  });
});

describe('importUtils file loading', () => {
  let dir: string;

  before(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'parcel-proximity-'));
    await writeFile(path.join(dir, 'antennas.csv'), 'Numéro de support;Exploitant\n10;FREE MOBILE\n11;ORANGE\n');
    await writeFile(path.join(dir, 'locations.csv'), 'Numéro du support;Latitude;Longitude\n10;43,3;5,4\n11;44,8;-0,58\n');
    await writeFile(path.join(dir, 'parcels.csv'), 'id,latitude,longitude\nP1,43.29,5.37\n');
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load and merge antenna files from disk', async () => {
    const { records } = await importUtils.loadAntennaFile(path.join(dir, 'antennas.csv'), {
      locationsPath: path.join(dir, 'locations.csv'),
    });

    assert.deepEqual(
      records.map(a => [a.id, a.operator, a.location.latitude, a.location.longitude]),
      [['10', 'FREE MOBILE', 43.3, 5.4], ['11', 'ORANGE', 44.8, -0.58]]
    );
  });

  it('should load parcel files from disk', async () => {
    const { records } = await importUtils.loadParcelFile(path.join(dir, 'parcels.csv'));
    assert.deepEqual(records.map(p => p.id), ['P1']);
  });
});
