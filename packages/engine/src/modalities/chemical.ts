/**
 * Single-species gas sensor
 *
 * Reads the field named by `target_species`; every species in
 * `cross_sensitivity` leaks into the reading with its factor.
 */

import {
  calibrationDriftStage,
  crossSensitivityStage,
  generalDriftStage,
  noiseInjectionStage,
} from '../stages/index.js';
import { readPrimary } from './common.js';
import type { ModalityDefinition } from './types.js';

export const chemicalModality: ModalityDefinition<'chemical'> = {
  modality: 'chemical',
  quantity: 'concentration_ppb',
  unit: 'ppb',
  range: { min: 0, max: Infinity },
  stages: [crossSensitivityStage, calibrationDriftStage, generalDriftStage, noiseInjectionStage],

  readIdeal(env, position, config) {
    return { value: readPrimary(env, config.target_species, position) };
  },

  conditions(config) {
    return [
      {
        kind: 'state',
        label: 'gas_leak',
        field: 'gas_leak_rate',
        severityScale: config.gas_leak_severity_scale,
        confidence: config.gas_leak_confidence,
      },
      {
        kind: 'threshold',
        label: 'exposure_limit',
        threshold: config.exposure_limit_threshold,
        severityScale: config.exposure_limit_severity_scale,
        confidence: config.exposure_limit_confidence,
      },
    ];
  },
};
