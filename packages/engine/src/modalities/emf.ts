/**
 * AC electromagnetic field sensor
 *
 * Environment fields:
 *   ac_field_strength     V/m scalar (falls back to |ac_field_vector|)
 *   ac_field_vector       field direction
 *   dominant_frequency_hz defaults to base_frequency
 *   corona_discharge      state label "corona_discharge"
 *   arcing_intensity      state label "arcing"
 */

import {
  axisMisalignmentStage,
  calibrationDriftStage,
  directionalSensitivityStage,
  frequencyAnalysisStage,
  frequencyResponseStage,
  generalDriftStage,
  interferenceCouplingStage,
  noiseInjectionStage,
} from '../stages/index.js';
import { readSpectralIdeal } from './common.js';
import type { ModalityDefinition } from './types.js';

export const emfModality: ModalityDefinition<'emf'> = {
  modality: 'emf',
  quantity: 'ac_field_strength',
  unit: 'V/m',
  range: { min: 0, max: Infinity },
  stages: [
    frequencyAnalysisStage,
    frequencyResponseStage,
    axisMisalignmentStage,
    directionalSensitivityStage,
    interferenceCouplingStage,
    calibrationDriftStage,
    generalDriftStage,
    noiseInjectionStage,
  ],

  readIdeal(env, position, config) {
    return readSpectralIdeal(
      env,
      position,
      {
        scalar: 'ac_field_strength',
        vector: 'ac_field_vector',
        frequency: 'dominant_frequency_hz',
        magnitudeFromVector: true,
      },
      config.base_frequency
    );
  },

  conditions(config) {
    return [
      {
        kind: 'state',
        label: 'corona_discharge',
        field: 'corona_discharge',
        severityScale: config.corona_severity_scale,
        confidence: config.corona_confidence,
      },
      {
        kind: 'state',
        label: 'arcing',
        field: 'arcing_intensity',
        severityScale: config.arcing_severity_scale,
        confidence: config.arcing_confidence,
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
