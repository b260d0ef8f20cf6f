/**
 * Timezone database access, identifier validation and zone shifts.
 */

export * from './database.js';
export * from './validator.js';
export * from './convert.js';
