import env from "./utils/env.js";
import { initializeLogger, getLogger, ProximityLoggerOptions } from "./utils/logger.js";

import express, { Express } from "express";
import bodyParser from "body-parser";
import { createServer, Server } from "http";
import morgan from "morgan";
import cors from "cors";
import { errorHandler } from "./utils/errorHandler.js";
import { registerRoutes } from "./utils/router.js";
import { getProximityConfig } from "./utils/config.js";
import proximityRoute from "./routes/proximity.route.js";
import antennasRoute from "./routes/antennas.route.js";
import GeocodingService from "./services/GeocodingService.js";
import type { Antenna, RouteContext } from "./types/index.js";

const getAllowedOrigins = (): string[] | true => {
  const origins = env.get("CORS_ALLOWED_ORIGINS");
  if (!origins) {
    return true;
  }
  return origins.split(",").map((origin) => origin.trim());
};

export interface CreateAppOptions {
  antennas: readonly Antenna[];
  /** Defaults to PROXIMITY_THRESHOLD_METERS */
  defaultThresholdMeters?: number;
  /** Pass null to disable address lookups */
  geocoder?: GeocodingService | null;
}

/**
 * Build the HTTP API around a loaded antenna dataset
 */
export function createApp(options: CreateAppOptions): Express {
  const config = getProximityConfig();
  const app = express();

  app.use(cors({ origin: getAllowedOrigins(), methods: ["GET", "POST", "OPTIONS"] }));
  app.use(bodyParser.json({ limit: "20mb" }));
  app.use(
    morgan("combined", {
      stream: { write: (line: string) => getLogger().info(line.trim()) },
    })
  );

  const context: RouteContext = {
    antennas: options.antennas,
    defaultThresholdMeters: options.defaultThresholdMeters ?? config.thresholdMeters,
  };
  if (options.geocoder !== null) {
    context.geocoder = options.geocoder ?? new GeocodingService();
  }

  registerRoutes(app, context, [proximityRoute, antennasRoute]);

  app.use(errorHandler);

  return app;
}

/**
 * Server startup options
 */
export interface StartServerOptions extends CreateAppOptions {
  /** Port number to listen on (default from env or 8060) */
  port?: number;
  /** Pino logger configuration options */
  logger?: ProximityLoggerOptions;
}

/**
 * Start the HTTP server; resolves once it is listening
 */
export async function startServer(options: StartServerOptions): Promise<Server> {
  if (options.logger) {
    initializeLogger(options.logger);
  }
  const logger = getLogger();
  const port = options.port ?? getProximityConfig().port;

  const server = createServer(createApp(options));

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}. Shutting down...`);
    server.close((error) => {
      if (error) {
        logger.error({ err: error }, "Error during shutdown");
        process.exit(1);
      }
      logger.info("Server shut down successfully");
      process.exit(0);
    });
  };
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      server.off("error", reject);
      resolve();
    });
  });

  logger.info({ port, antennas: options.antennas.length }, `Proximity API running on port ${port}`);
  return server;
}
