/**
 * Utilities Index
 *
 * Centralized exports for all utility modules
 */

// Environment and configuration
export { default as env } from './env.js';
export {
  getProximityConfig,
  DEFAULT_THRESHOLD_METERS,
  DEFAULT_CELL_SIZE_DEGREES,
  DEFAULT_LOW_COVERAGE_PERCENTILE,
  DEFAULT_PORT,
} from './config.js';

// Errors
export {
  APIError,
  InvalidCoordinateError,
  NoAntennaDataError,
  GeocodingError,
  isAPIError,
  errorHandler,
} from './errorHandler.js';

// Coordinates and distance
export { GeoPoint, assertValidCoordinate } from './geoPoint.js';
export { distance, EARTH_RADIUS_METERS, ZERO_DISTANCE_EPSILON_METERS } from './distance.js';

// Operators
export {
  normalizeOperator,
  listOperators,
  filterByOperator,
  groupByOperator,
  UNKNOWN_OPERATOR,
} from './operatorUtils.js';

// Import / export
export { default as importUtils, COLUMN_CANDIDATES } from './importUtils.js';
export { default as exportUtils, REPORT_FIELDS } from './exportUtils.js';

// CLI argument parsing
export { parseCliArgs, USAGE } from './cliArgs.js';
export type { CliCommand, SourceArgs } from './cliArgs.js';
