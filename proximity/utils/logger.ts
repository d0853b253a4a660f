import pino, { Logger, LoggerOptions, DestinationStream, TransportTargetOptions } from "pino";
import env from "./env.js";

// Logger configuration type accepted by the CLI and startServer
export interface ProximityLoggerOptions {
  /** Pino log level: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent' */
  level?: pino.LevelWithSilentOrString;
  /** Custom pino transport configuration */
  transport?: {
    target: string;
    options?: Record<string, unknown>;
  } | {
    targets: TransportTargetOptions[];
  };
  /** Additional pino options */
  options?: Omit<LoggerOptions, 'level' | 'transport'>;
  /** Custom destination stream (if not using transport) */
  destination?: DestinationStream;
  /** Enable pretty printing in development (uses pino-pretty) */
  pretty?: boolean;
}

let logger: Logger | undefined;

/**
 * Initialize the logger with custom options
 * This should be called once at startup (CLI or server)
 */
export function initializeLogger(options?: ProximityLoggerOptions): Logger {
  const nodeEnv = env.get("NODE_ENV") || "development";
  const isPretty = options?.pretty ?? (nodeEnv === "development");

  // Determine log level from options, env, or defaults
  const level = options?.level
    ?? env.get("LOG_LEVEL")
    ?? "info";

  const pinoOptions: LoggerOptions = {
    level,
    ...options?.options,
  };

  if (options?.transport) {
    pinoOptions.transport = options.transport;
    logger = pino(pinoOptions);
  }
  else if (options?.destination) {
    logger = pino(pinoOptions, options.destination);
  }
  // Pretty output goes to stderr so reports written to stdout stay clean
  else if (isPretty) {
    pinoOptions.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
        destination: 2,
      },
    };
    logger = pino(pinoOptions);
  }
  else {
    logger = pino(pinoOptions, pino.destination({ dest: 2, sync: true }));
  }

  return logger;
}

/**
 * Get the logger instance
 * If not initialized, creates a default logger
 */
export function getLogger(): Logger {
  if (!logger) {
    return initializeLogger();
  }
  return logger;
}

/**
 * Serialize an Error object to a plain object with all properties
 */
export function serializeError(err: Error): Record<string, unknown> {
  const serialized: Record<string, unknown> = {
    name: err.name,
    message: err.message,
    stack: err.stack,
  };

  // Copy any additional enumerable and non-enumerable properties
  for (const key of Object.getOwnPropertyNames(err)) {
    if (key !== 'name' && key !== 'message' && key !== 'stack') {
      serialized[key] = Reflect.get(err, key);
    }
  }

  return serialized;
}

export default getLogger;

export type { Logger, LoggerOptions, DestinationStream } from "pino";
