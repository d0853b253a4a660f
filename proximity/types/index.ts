/**
 * Centralized Type Exports
 * Single source for all type definitions across the application
 */

// Re-export configuration types
export * from './config.js';

// Re-export coverage analysis types
export * from './coverage.js';

// Re-export geographic value types
export * from './geo.js';

// Re-export geocoding types
export * from './geocoding.js';

// Re-export import-export types
export * from './import-export.js';

// Re-export proximity result types
export * from './proximity.js';

// Re-export operator statistics types
export * from './stats.js';

// Re-export route types
export * from './routes.js';
