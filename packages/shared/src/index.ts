/**
 * @sensim/shared
 * Shared types, constants, and utilities for sensim
 */

export * from './types/index.js';
export * from './constants/index.js';
export * from './utils/index.js';
export * from './random/index.js';
export * from './logger/index.js';
