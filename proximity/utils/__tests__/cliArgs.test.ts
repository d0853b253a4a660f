/**
 * CLI Argument Parsing Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseCliArgs } from '../cliArgs.js';
import { APIError } from '../errorHandler.js';

const rejectsWith = (argv: string[], message: string) => {
  assert.throws(
    () => parseCliArgs(argv),
    (error: unknown) => error instanceof APIError && error.statusCode === 400 && error.message === message
  );
};

describe('parseCliArgs', () => {
  it('should return help for no arguments or --help', () => {
    assert.deepEqual(parseCliArgs([]), { command: 'help' });
    assert.deepEqual(parseCliArgs(['--help']), { command: 'help' });
  });

  it('should parse a full evaluate command', () => {
    const command = parseCliArgs([
      'evaluate',
      '--antennas', 'antennas.csv',
      '--locations', 'locations.csv',
      '--parcels', 'parcels.csv',
      '--threshold', '750.5',
      '--operator', 'free',
      '--format', 'geojson',
      '--output', 'out.geojson',
      '--delimiter', ';',
      '--encoding', 'latin1',
      '--skip-invalid',
    ]);

    assert.equal(command.command, 'evaluate');
    if (command.command !== 'evaluate') return;
    assert.equal(command.antennas, 'antennas.csv');
    assert.equal(command.locations, 'locations.csv');
    assert.equal(command.parcels, 'parcels.csv');
    assert.equal(command.threshold, 750.5);
    assert.equal(command.operator, 'free');
    assert.equal(command.format, 'geojson');
    assert.equal(command.output, 'out.geojson');
    assert.equal(command.delimiter, ';');
    assert.equal(command.encoding, 'latin1');
    assert.equal(command.skipInvalid, true);
    assert.equal(command.dedupe, false);
  });

  it('should accept --flag=value and default the format to csv', () => {
    const command = parseCliArgs(['evaluate', '--antennas=a.csv', '--parcels=p.csv']);

    assert.equal(command.command, 'evaluate');
    if (command.command !== 'evaluate') return;
    assert.equal(command.antennas, 'a.csv');
    assert.equal(command.format, 'csv');
    assert.equal(command.threshold, undefined);
  });

  it('should parse nearest with coordinates', () => {
    const command = parseCliArgs(['nearest', '--antennas', 'a.csv', '--latitude', '48.85', '--longitude', '-2.5']);

    assert.equal(command.command, 'nearest');
    if (command.command !== 'nearest') return;
    assert.equal(command.latitude, 48.85);
    assert.equal(command.longitude, -2.5);
    assert.equal(command.address, undefined);
  });

  it('should parse coverage and serve options', () => {
    const coverage = parseCliArgs(['coverage', '--antennas', 'a.csv', '--cell-size', '0.25', '--percentile', '20', '--dedupe']);
    assert.equal(coverage.command, 'coverage');
    if (coverage.command === 'coverage') {
      assert.equal(coverage.cellSize, 0.25);
      assert.equal(coverage.percentile, 20);
      assert.equal(coverage.dedupe, true);
    }

    const serve = parseCliArgs(['serve', '--antennas', 'a.csv', '--port', '9000']);
    assert.equal(serve.command, 'serve');
    if (serve.command === 'serve') {
      assert.equal(serve.port, 9000);
    }
  });

  it('should report usage errors', () => {
    rejectsWith(['locate'], 'Unknown command: locate');
    rejectsWith(['spacing'], 'Option --antennas is required');
    rejectsWith(['evaluate', '--antennas', 'a.csv'], 'Option --parcels is required');
    rejectsWith(['evaluate', '--antennas', 'a.csv', '--parcels', 'p.csv', '--format', 'xml'], 'Option --format must be csv, json or geojson, got "xml"');
    rejectsWith(['spacing', '--antennas', 'a.csv', '--threshold', '5'], 'Unknown option for spacing: --threshold');
    rejectsWith(['evaluate', '--antennas', 'a.csv', '--parcels', 'p.csv', '--threshold', 'far'], 'Option --threshold must be a number, got "far"');
    rejectsWith(['spacing', '--antennas'], 'Option --antennas needs a value');
    rejectsWith(['spacing', 'a.csv'], 'Unexpected argument: a.csv');
    rejectsWith(['spacing', '--antennas', 'a.csv', '--delimiter', '|'], 'Option --delimiter must be "," or ";", got "|"');
    rejectsWith(['nearest', '--antennas', 'a.csv', '--latitude', '1'], 'nearest needs --address or both --latitude and --longitude');
  });
});
