/**
 * Calibration and baseline drift
 *
 * Both are pure functions of elapsed operating hours; nothing accumulates
 * between calls.
 */

import type { SensorConfig } from '@sensim/core';
import type { DriftState } from '../api/index.js';
import type { ImperfectionStage } from './types.js';

export type CalibrationDriftConfig = Pick<
  SensorConfig,
  | 'calibration_gain_error_factor'
  | 'calibration_gain_drift_percent_per_hour'
  | 'calibration_offset'
  | 'calibration_offset_drift_per_hour'
  | 'calibration_nonlinearity_factor'
>;

export type GeneralDriftConfig = Pick<SensorConfig, 'drift_parameters'>;

/**
 * Gain and offset after `elapsedHours` of operation
 */
export function computeDriftState(config: CalibrationDriftConfig, elapsedHours: number): DriftState {
  return {
    gain:
      config.calibration_gain_error_factor *
      (1 + (config.calibration_gain_drift_percent_per_hour / 100) * elapsedHours),
    offset: config.calibration_offset + config.calibration_offset_drift_per_hour * elapsedHours,
    elapsedHours,
  };
}

/** reading' = reading * gain + offset + nonlinearity * reading^2 */
export const calibrationDriftStage: ImperfectionStage<CalibrationDriftConfig> = {
  id: 'calibration_drift',

  apply(state, config, { elapsedHours }) {
    const { gain, offset } = computeDriftState(config, elapsedHours);
    const v = state.value;
    return { ...state, value: v * gain + offset + config.calibration_nonlinearity_factor * v * v };
  },
};

/** reading' = reading + rate * t */
export const generalDriftStage: ImperfectionStage<GeneralDriftConfig> = {
  id: 'general_drift',

  apply(state, config, { elapsedHours }) {
    return { ...state, value: state.value + config.drift_parameters.baseline_drift_per_hour * elapsedHours };
  },
};
