/**
 * parcel-proximity main entry point
 *
 * Exports the distance module, the proximity evaluator and the services and
 * utilities built around them (CSV import, report export, HTTP API).
 */

// Export HTTP application
export { createApp, startServer } from './app.js';
export type { CreateAppOptions, StartServerOptions } from './app.js';

// Export logger utilities
export { initializeLogger, getLogger } from './utils/logger.js';
export type { ProximityLoggerOptions, Logger, LoggerOptions, DestinationStream } from './utils/logger.js';

// Export all utilities
export * from './utils/index.js';

// Export services
export { default as ProximityService, proximityService, evaluate, TIE_EPSILON_METERS } from './services/ProximityService.js';
export { default as OperatorStatsService, operatorStatsService } from './services/OperatorStatsService.js';
export { default as CoverageService, coverageService, percentile, MAX_GRID_CELLS } from './services/CoverageService.js';
export { default as GeocodingService } from './services/GeocodingService.js';

// Export types
export type * from './types/index.js';
