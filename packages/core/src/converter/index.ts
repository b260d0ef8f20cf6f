/**
 * Conversion façade: configuration resolution, normalization, zone shift and rendering.
 */

export * from './converter.js';
