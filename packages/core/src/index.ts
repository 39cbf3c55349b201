/**
 * @sensim/core
 * Config schemas, units, and vector math for sensim
 */

export * from './errors/index.js';
export * from './schema/index.js';
export * from './config/index.js';
export * from './coords/index.js';
export * from './units/index.js';
export * from './migration/index.js';
