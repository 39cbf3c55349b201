/**
 * @sensim/environment
 * Environment query contract, safe adapter and in-memory environment
 */

export * from './query/index.js';
export * from './spatial/index.js';
export * from './static/index.js';
