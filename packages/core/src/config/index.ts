/**
 * Configuration store, defaults and resolution.
 */

export * from './defaults.js';
export * from './store.js';
export * from './validation.js';
export * from './env.js';
