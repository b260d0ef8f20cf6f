/**
 * Timestamp conversion for presenting database-stored timestamps in a
 * viewer's timezone. Pure TypeScript with no framework dependencies.
 */

/**
 * Re-export the result and error model.
 */
export * from './domain/index.js';

/**
 * Re-export configuration store and resolution.
 */
export * from './config/index.js';

/**
 * Re-export timezone database access.
 */
export * from './timezone/index.js';

/**
 * Re-export timestamp parsing and normalization.
 */
export * from './parsing/index.js';

/**
 * Re-export rendering.
 */
export * from './format/index.js';

/**
 * Re-export the conversion façade.
 */
export * from './converter/index.js';
