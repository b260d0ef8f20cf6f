/**
 * Rendering of zoned instants to text.
 */

export * from './abbreviation.js';
export * from './strftime.js';
export * from './render.js';
