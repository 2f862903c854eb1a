/**
 * DST-safe calendar bucketing and local time resolution.
 * Pure functions over immutable values; the command-line front end lives in `cli/`.
 */

/**
 * Re-export all domain types, errors and validation schemas.
 */
export * from './domain/index.js';

/**
 * Re-export the timezone provider and civil-calendar helpers.
 */
export * from './zone/index.js';

/**
 * Re-export timestamp and local time parsing.
 */
export * from './parse/index.js';

/**
 * Re-export bucket computation and range enumeration.
 */
export * from './time/index.js';

/**
 * Re-export local time resolution.
 */
export * from './resolve/index.js';
