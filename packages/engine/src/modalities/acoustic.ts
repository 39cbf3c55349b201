/**
 * Sound level meter, A-weighted
 *
 * Environment fields: spl_dba, sound_intensity_vector, dominant_frequency_hz,
 * arcing_intensity and corona_discharge (both audible).
 */

import { MAX_SPL_DB } from '@sensim/shared';
import {
  axisMisalignmentStage,
  calibrationDriftStage,
  directionalSensitivityStage,
  frequencyAnalysisStage,
  frequencyResponseStage,
  generalDriftStage,
  noiseInjectionStage,
} from '../stages/index.js';
import { readSpectralIdeal } from './common.js';
import type { ModalityDefinition } from './types.js';

export const acousticModality: ModalityDefinition<'acoustic'> = {
  modality: 'acoustic',
  quantity: 'spl_dba',
  unit: 'dBA',
  range: { min: 0, max: MAX_SPL_DB },
  stages: [
    frequencyAnalysisStage,
    frequencyResponseStage,
    axisMisalignmentStage,
    directionalSensitivityStage,
    calibrationDriftStage,
    generalDriftStage,
    noiseInjectionStage,
  ],

  readIdeal(env, position, config) {
    return readSpectralIdeal(
      env,
      position,
      {
        scalar: 'spl_dba',
        vector: 'sound_intensity_vector',
        frequency: 'dominant_frequency_hz',
        magnitudeFromVector: false,
      },
      config.base_frequency
    );
  },

  conditions(config) {
    return [
      {
        kind: 'state',
        label: 'arcing',
        field: 'arcing_intensity',
        severityScale: config.arcing_severity_scale,
        confidence: config.arcing_confidence,
      },
      {
        kind: 'state',
        label: 'corona_discharge',
        field: 'corona_discharge',
        severityScale: config.corona_severity_scale,
        confidence: config.corona_confidence,
      },
      {
        kind: 'threshold',
        label: 'overload',
        threshold: config.overload_threshold,
        severityScale: config.overload_severity_scale,
        confidence: config.overload_confidence,
      },
    ];
  },
};
