/**
 * Timestamp normalization: input classification, built-in and custom string
 * parsers, and the parser chain that ties them together.
 */

export * from './fields.js';
export * from './helpers.js';
export * from './builtin.js';
export * from './registry.js';
export * from './classify.js';
export * from './chain.js';
export * from './normalize.js';
