/**
 * Modality registry
 */

import type { Modality } from '@sensim/shared';
import { acousticModality } from './acoustic.js';
import { chemicalModality } from './chemical.js';
import { emfModality } from './emf.js';
import { particulateModality } from './particulate.js';
import { thermalModality } from './thermal.js';
import type { ModalityDefinition } from './types.js';

export * from './types.js';
export { readPrimary, readSpectralIdeal, type SpectralFields } from './common.js';
export { emfModality } from './emf.js';
export { acousticModality } from './acoustic.js';
export { particulateModality, deriveParticulateChannels } from './particulate.js';
export { thermalModality } from './thermal.js';
export { chemicalModality } from './chemical.js';

/** Definition lookup by modality */
export const MODALITY_DEFINITIONS: { [M in Modality]: ModalityDefinition<M> } = {
  emf: emfModality,
  acoustic: acousticModality,
  particulate: particulateModality,
  thermal: thermalModality,
  chemical: chemicalModality,
};
