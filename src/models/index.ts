/**
 * Loader data models
 *
 * Barrel export for all model types.
 */

// JSON records
export * from './record.js';

// Tagged field values
export * from './value.js';

// Relational schema
export * from './schema.js';

// Load reports
export * from './report.js';
