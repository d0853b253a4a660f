#!/usr/bin/env node
/**
 * parcel-proximity command-line entry point
 */

import { writeFile } from "fs/promises";
import { parseCliArgs, USAGE } from "./utils/cliArgs.js";
import type { CliCommand, SourceArgs } from "./utils/cliArgs.js";
import { loadAntennaFile, loadParcelFile } from "./utils/importUtils.js";
import { renderReport } from "./utils/exportUtils.js";
import { getProximityConfig } from "./utils/config.js";
import { initializeLogger, serializeError } from "./utils/logger.js";
import { isAPIError } from "./utils/errorHandler.js";
import { GeoPoint } from "./utils/geoPoint.js";
import { proximityService } from "./services/ProximityService.js";
import { operatorStatsService } from "./services/OperatorStatsService.js";
import { coverageService } from "./services/CoverageService.js";
import GeocodingService from "./services/GeocodingService.js";
import { startServer } from "./app.js";
import type { Antenna, ProximityConfig } from "./types/index.js";

const logger = initializeLogger();

async function loadSource(args: SourceArgs, config: ProximityConfig): Promise<Antenna[]> {
  const result = await loadAntennaFile(args.antennas, {
    locationsPath: args.locations,
    delimiter: args.delimiter ?? config.csvDelimiter,
    encoding: args.encoding ?? config.csvEncoding,
    skipInvalid: args.skipInvalid,
    dedupe: args.dedupe,
  });
  for (const rejected of result.rejected) {
    logger.warn(rejected, "Skipped antenna row");
  }
  logger.info({ antennas: result.records.length, rejected: result.rejected.length }, "Antenna dataset ready");
  return result.records;
}

async function writeOutput(content: string, output: string | undefined): Promise<void> {
  if (output) {
    await writeFile(output, content.endsWith("\n") ? content : `${content}\n`, "utf8");
    logger.info({ output }, "Report written");
  } else {
    process.stdout.write(`${content}\n`);
  }
}

async function run(command: CliCommand): Promise<void> {
  if (command.command === "help") {
    process.stdout.write(USAGE);
    return;
  }

  const config = getProximityConfig();
  const antennas = await loadSource(command, config);

  switch (command.command) {
    case "evaluate": {
      const parcels = await loadParcelFile(command.parcels, {
        delimiter: command.delimiter ?? config.csvDelimiter,
        encoding: command.encoding ?? config.csvEncoding,
        skipInvalid: command.skipInvalid,
      });
      for (const rejected of parcels.rejected) {
        logger.warn(rejected, "Skipped parcel row");
      }

      const threshold = command.threshold ?? config.thresholdMeters;
      const results = proximityService.evaluate(parcels.records, antennas, threshold, { operator: command.operator });
      const within = results.filter((result) => result.withinThreshold).length;
      logger.info({ parcels: results.length, within, thresholdMeters: threshold }, "Evaluation complete");

      await writeOutput(renderReport(results, command.format), command.output);
      return;
    }
    case "nearest": {
      const point = command.address !== undefined
        ? await new GeocodingService().geocode(command.address)
        : new GeoPoint(command.latitude ?? NaN, command.longitude ?? NaN);
      const nearest = proximityService.findNearest(point, antennas, { operator: command.operator });
      await writeOutput(JSON.stringify({
        point: point.toJSON(),
        antenna: { id: nearest.antenna.id, operator: nearest.antenna.operator ?? null, ...nearest.antenna.location.toJSON() },
        distanceMeters: Math.round(nearest.distanceMeters * 100) / 100,
      }, null, 2), undefined);
      return;
    }
    case "spacing":
      await writeOutput(JSON.stringify(operatorStatsService.computeSpacing(antennas), null, 2), undefined);
      return;
    case "coverage": {
      const summary = coverageService.summarize(antennas);
      const grid = coverageService.findLowCoverageCells(antennas, {
        cellSizeDegrees: command.cellSize ?? config.coverageCellSize,
        percentile: command.percentile ?? config.coveragePercentile,
        operator: command.operator,
      });
      await writeOutput(JSON.stringify({ summary, grid }, null, 2), undefined);
      return;
    }
    case "serve":
      await startServer({ antennas, port: command.port });
      return;
  }
}

function report(error: unknown): void {
  if (isAPIError(error)) {
    logger.error({ details: error.details }, error.message);
  } else if (error instanceof Error) {
    logger.error({ err: serializeError(error) }, "Unexpected error");
  } else {
    logger.error({ error: String(error) }, "Unexpected error");
  }
  process.exitCode = 1;
}

async function main(): Promise<void> {
  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    report(error);
    process.stderr.write(USAGE);
    return;
  }

  try {
    await run(command);
  } catch (error) {
    report(error);
  }
}

void main();
