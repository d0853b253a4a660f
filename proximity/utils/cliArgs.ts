/**
 * Command-line argument parsing for the parcel-proximity CLI
 */

import { APIError } from './errorHandler.js';
import { isReportFormat } from './exportUtils.js';
import type { CsvDelimiter, CsvEncoding, ReportFormat } from '../types/index.js';

export const USAGE = `Usage: parcel-proximity <command> [options]

Commands:
  evaluate   Nearest antenna and threshold check for every parcel
  nearest    Nearest antenna to one address or coordinate pair
  spacing    Average nearest-neighbour distance between antennas per operator
  coverage   Dataset summary and low-coverage grid cells
  serve      Start the HTTP API

Common options:
  --antennas <csv>       antenna file (required)
  --locations <csv>      separate antenna locations file, joined on support number
  --delimiter <, or ;>   CSV delimiter (detected when omitted)
  --encoding <enc>       utf8 or latin1
  --skip-invalid         skip rows with invalid coordinates instead of failing
  --dedupe               drop antennas sharing coordinates with an earlier row

evaluate:  --parcels <csv> [--threshold <meters>] [--operator <name>]
           [--format csv|json|geojson] [--output <path>]
nearest:   --address <text> | --latitude <deg> --longitude <deg> [--operator <name>]
coverage:  [--cell-size <deg>] [--percentile <0-100>] [--operator <name>]
serve:     [--port <n>]
`;

export interface SourceArgs {
  antennas: string;
  locations?: string;
  delimiter?: CsvDelimiter;
  encoding?: CsvEncoding;
  skipInvalid: boolean;
  dedupe: boolean;
}

export type CliCommand =
  | ({ command: 'evaluate'; parcels: string; threshold?: number; operator?: string; format: ReportFormat; output?: string } & SourceArgs)
  | ({ command: 'nearest'; address?: string; latitude?: number; longitude?: number; operator?: string } & SourceArgs)
  | ({ command: 'spacing' } & SourceArgs)
  | ({ command: 'coverage'; cellSize?: number; percentile?: number; operator?: string } & SourceArgs)
  | ({ command: 'serve'; port?: number } & SourceArgs)
  | { command: 'help' };

const COMMANDS = ['evaluate', 'nearest', 'spacing', 'coverage', 'serve'] as const;
type CommandName = typeof COMMANDS[number];

const BOOLEAN_FLAGS = new Set(['skip-invalid', 'dedupe']);

const ALLOWED_FLAGS: Record<CommandName, string[]> = {
  evaluate: ['parcels', 'threshold', 'operator', 'format', 'output'],
  nearest: ['address', 'latitude', 'longitude', 'operator'],
  spacing: [],
  coverage: ['cell-size', 'percentile', 'operator'],
  serve: ['port'],
};

const COMMON_FLAGS = ['antennas', 'locations', 'delimiter', 'encoding', 'skip-invalid', 'dedupe'];

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some(command => command === value);
}

function usageError(message: string): APIError {
  return new APIError(message, 400);
}

/**
 * Split argv into flags; supports "--flag value" and "--flag=value"
 */
function collectFlags(args: string[], command: CommandName): Map<string, string | true> {
  const allowed = new Set([...COMMON_FLAGS, ...ALLOWED_FLAGS[command]]);
  const flags = new Map<string, string | true>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      throw usageError(`Unexpected argument: ${arg}`);
    }

    const body = arg.slice(2);
    const eq = body.indexOf('=');
    const name = eq === -1 ? body : body.slice(0, eq);
    if (!allowed.has(name)) {
      throw usageError(`Unknown option for ${command}: --${name}`);
    }

    if (BOOLEAN_FLAGS.has(name)) {
      flags.set(name, true);
      continue;
    }

    const value = eq === -1 ? args[++i] : body.slice(eq + 1);
    if (value === undefined || value === '') {
      throw usageError(`Option --${name} needs a value`);
    }
    flags.set(name, value);
  }

  return flags;
}

function stringFlag(flags: Map<string, string | true>, name: string): string | undefined {
  const value = flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

function numberFlag(flags: Map<string, string | true>, name: string): number | undefined {
  const value = stringFlag(flags, name);
  if (value === undefined) {
    return undefined;
  }
  const num = Number(value);
  if (!Number.isFinite(num)) {
    throw usageError(`Option --${name} must be a number, got "${value}"`);
  }
  return num;
}

function sourceArgs(flags: Map<string, string | true>): SourceArgs {
  const antennas = stringFlag(flags, 'antennas');
  if (!antennas) {
    throw usageError('Option --antennas is required');
  }

  const delimiter = stringFlag(flags, 'delimiter');
  if (delimiter !== undefined && delimiter !== ',' && delimiter !== ';') {
    throw usageError(`Option --delimiter must be "," or ";", got "${delimiter}"`);
  }

  const encoding = stringFlag(flags, 'encoding');
  if (encoding !== undefined && encoding !== 'utf8' && encoding !== 'latin1') {
    throw usageError(`Option --encoding must be utf8 or latin1, got "${encoding}"`);
  }

  const source: SourceArgs = {
    antennas,
    skipInvalid: flags.has('skip-invalid'),
    dedupe: flags.has('dedupe'),
  };
  const locations = stringFlag(flags, 'locations');
  if (locations !== undefined) source.locations = locations;
  if (delimiter !== undefined) source.delimiter = delimiter;
  if (encoding !== undefined) source.encoding = encoding;
  return source;
}

/**
 * Parse process.argv.slice(2)
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const [name, ...rest] = argv;
  if (name === undefined || name === 'help' || name === '--help' || name === '-h') {
    return { command: 'help' };
  }
  if (!isCommandName(name)) {
    throw usageError(`Unknown command: ${name}`);
  }

  const flags = collectFlags(rest, name);
  const source = sourceArgs(flags);

  switch (name) {
    case 'evaluate': {
      const parcels = stringFlag(flags, 'parcels');
      if (!parcels) {
        throw usageError('Option --parcels is required');
      }
      const format = stringFlag(flags, 'format') ?? 'csv';
      if (!isReportFormat(format)) {
        throw usageError(`Option --format must be csv, json or geojson, got "${format}"`);
      }
      return {
        command: 'evaluate',
        ...source,
        parcels,
        threshold: numberFlag(flags, 'threshold'),
        operator: stringFlag(flags, 'operator'),
        format,
        output: stringFlag(flags, 'output'),
      };
    }
    case 'nearest': {
      const address = stringFlag(flags, 'address');
      const latitude = numberFlag(flags, 'latitude');
      const longitude = numberFlag(flags, 'longitude');
      if (address === undefined && (latitude === undefined || longitude === undefined)) {
        throw usageError('nearest needs --address or both --latitude and --longitude');
      }
      return { command: 'nearest', ...source, address, latitude, longitude, operator: stringFlag(flags, 'operator') };
    }
    case 'spacing':
      return { command: 'spacing', ...source };
    case 'coverage':
      return {
        command: 'coverage',
        ...source,
        cellSize: numberFlag(flags, 'cell-size'),
        percentile: numberFlag(flags, 'percentile'),
        operator: stringFlag(flags, 'operator'),
      };
    case 'serve':
      return { command: 'serve', ...source, port: numberFlag(flags, 'port') };
  }
}
