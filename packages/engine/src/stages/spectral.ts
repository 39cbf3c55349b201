/**
 * Spectral stages: harmonic analysis, frequency response and axis misalignment
 */

import { degToRad, temperatureCorrection, type FrequencyGainTable, type SpectralConfig } from '@sensim/core';
import {
  HARMONIC_COMPONENTS,
  HARMONIC_ORDERS,
  SPECTRUM_COMPONENTS,
  type Spectrum,
  type SpectrumComponent,
} from '@sensim/shared';
import type { ReadingState } from '../api/index.js';
import type { ImperfectionStage } from './types.js';

// ============================================================================
// Spectrum Helpers
// ============================================================================

/**
 * Map every present spectrum entry, preserving absent slots
 */
export function mapSpectrum(
  spectrum: Spectrum,
  fn: (magnitude: number, component: SpectrumComponent) => number
): Spectrum {
  const result: Spectrum = {};
  for (const component of SPECTRUM_COMPONENTS) {
    const magnitude = spectrum[component];
    if (magnitude !== undefined) {
      result[component] = fn(magnitude, component);
    }
  }
  return result;
}

/** Copy of a state with the spectrum dropped */
export function withoutSpectrum(state: ReadingState): ReadingState {
  return { value: state.value, vector: state.vector, dominantFrequencyHz: state.dominantFrequencyHz };
}

/**
 * Scalar gain for a frequency from a `frequency -> gain` table.
 * The nearest entry within `toleranceHz` wins; equal distances resolve to the
 * lower frequency. No entry in tolerance yields `defaultGain`.
 */
export function lookupFrequencyGain(
  table: FrequencyGainTable,
  frequencyHz: number,
  toleranceHz: number,
  defaultGain: number
): number {
  let best: { frequency: number; gain: number; distance: number } | undefined;

  for (const [key, gain] of Object.entries(table)) {
    const frequency = Number(key);
    const distance = Math.abs(frequency - frequencyHz);
    if (distance > toleranceHz) continue;
    if (
      best === undefined ||
      distance < best.distance ||
      (distance === best.distance && frequency < best.frequency)
    ) {
      best = { frequency, gain, distance };
    }
  }

  return best?.gain ?? defaultGain;
}

// ============================================================================
// Frequency Analysis
// ============================================================================

export type FrequencyAnalysisConfig = Pick<
  SpectralConfig,
  | 'enable_spectrum_output'
  | 'harmonic_3_ratio'
  | 'harmonic_5_ratio'
  | 'harmonic_7_ratio'
  | 'harmonic_9_ratio'
  | 'frequency_noise'
  | 'frequency_noise_stddev'
  | 'corona_hf_noise_factor'
>;

/**
 * Builds the harmonic spectrum from the primary magnitude.
 * With spectrum output disabled the spectrum is omitted, not zeroed.
 */
export const frequencyAnalysisStage: ImperfectionStage<FrequencyAnalysisConfig> = {
  id: 'frequency_analysis',

  apply(state, config, { env, position, random }) {
    if (!config.enable_spectrum_output) {
      return withoutSpectrum(state);
    }

    const fundamental = state.value;
    const spectrum: Spectrum = { fundamental };

    for (const order of HARMONIC_ORDERS) {
      let magnitude = fundamental * config[`harmonic_${order}_ratio` as const];
      if (config.frequency_noise) {
        // Higher orders jitter more
        magnitude *= 1 + random.gaussian(0, config.frequency_noise_stddev) * Math.sqrt(order);
      }
      spectrum[HARMONIC_COMPONENTS[order]] = Math.max(0, magnitude);
    }

    const corona = env.getNumber('corona_discharge', position);
    if (corona !== undefined && corona > 0) {
      spectrum.high_frequency_noise = fundamental * config.corona_hf_noise_factor;
    }

    // Filled by interference coupling; present even when nothing couples
    spectrum.emi_noise_floor = 0;

    return { ...state, spectrum };
  },
};

// ============================================================================
// Frequency Response
// ============================================================================

export type FrequencyResponseConfig = Pick<
  SpectralConfig,
  | 'ambient_temperature_field'
  | 'frequency_response_curve'
  | 'frequency_response_temp_coeff_per_10c'
  | 'frequency_response_ref_temp_c'
  | 'frequency_response_gain'
  | 'frequency_tolerance_hz'
  | 'default_frequency_gain'
>;

/**
 * With a spectrum, applies the temperature-corrected response curve and takes
 * the primary value from the corrected fundamental. A scalar reading gets the
 * frequency gain table instead.
 */
export const frequencyResponseStage: ImperfectionStage<FrequencyResponseConfig> = {
  id: 'frequency_response',

  apply(state, config, { env, position }) {
    if (!state.spectrum) {
      const gain = lookupFrequencyGain(
        config.frequency_response_gain,
        state.dominantFrequencyHz,
        config.frequency_tolerance_hz,
        config.default_frequency_gain
      );
      return { ...state, value: state.value * gain };
    }

    const temperature =
      env.getNumber(config.ambient_temperature_field, position) ?? config.frequency_response_ref_temp_c;
    const correction = temperatureCorrection(
      config.frequency_response_temp_coeff_per_10c,
      temperature,
      config.frequency_response_ref_temp_c
    );
    const curve = config.frequency_response_curve;
    const spectrum = mapSpectrum(state.spectrum, (magnitude, component) =>
      magnitude * Math.max(0, (curve[component] ?? 1) * correction)
    );

    return { ...state, value: spectrum.fundamental ?? state.value, spectrum };
  },
};

// ============================================================================
// Axis Misalignment
// ============================================================================

export type AxisMisalignmentConfig = Pick<
  SpectralConfig,
  'axis_misalignment_effect_on_spectrum' | 'axis_misalignment_degrees'
>;

/** Scales every spectrum entry by cos(misalignment angle) */
export const axisMisalignmentStage: ImperfectionStage<AxisMisalignmentConfig> = {
  id: 'axis_misalignment',

  apply(state, config) {
    if (!config.axis_misalignment_effect_on_spectrum || !state.spectrum) {
      return state;
    }
    const factor = Math.cos(degToRad(config.axis_misalignment_degrees));
    return { ...state, spectrum: mapSpectrum(state.spectrum, (magnitude) => magnitude * factor) };
  },
};
