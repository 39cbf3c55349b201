/**
 * Imperfection stage library
 */

export * from './types.js';
export * from './spectral.js';
export * from './directional.js';
export * from './crossSensitivity.js';
export * from './interference.js';
export * from './drift.js';
export * from './noise.js';
export * from './pipeline.js';
