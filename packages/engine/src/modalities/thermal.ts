/**
 * Contact temperature sensor
 */

import { ABSOLUTE_ZERO_C } from '@sensim/shared';
import { calibrationDriftStage, generalDriftStage, noiseInjectionStage } from '../stages/index.js';
import { readPrimary } from './common.js';
import type { ModalityDefinition } from './types.js';

export const thermalModality: ModalityDefinition<'thermal'> = {
  modality: 'thermal',
  quantity: 'temperature_c',
  unit: 'degC',
  range: { min: ABSOLUTE_ZERO_C, max: Infinity },
  stages: [calibrationDriftStage, generalDriftStage, noiseInjectionStage],

  readIdeal(env, position) {
    return { value: readPrimary(env, 'temperature_c', position) };
  },

  conditions(config) {
    return [
      {
        kind: 'state',
        label: 'hotspot',
        field: 'hotspot_intensity',
        severityScale: config.hotspot_severity_scale,
        confidence: config.hotspot_confidence,
      },
      {
        kind: 'threshold',
        label: 'over_temperature',
        threshold: config.over_temperature_threshold,
        severityScale: config.over_temperature_severity_scale,
        confidence: config.over_temperature_confidence,
      },
    ];
  },
};
