/**
 * @sensim/engine
 * Imperfection pipeline, ground-truth evaluation, modality sensors and scenario runner
 */

export * from './api/index.js';
export * from './stages/index.js';
export * from './groundTruth/index.js';
export * from './modalities/index.js';
export * from './sensor/index.js';
export * from './compute/index.js';
