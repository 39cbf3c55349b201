/**
 * Interference coupling from nearby emitters
 *
 * Each source couples with
 *   strength * exp(-|f_source - f_base| / coupling_factor) / (d^2 + 1)
 * and the sum feeds both the primary value and the emi_noise_floor slot.
 */

import { distanceSquared3D, type EmfConfig, type Position3D } from '@sensim/core';
import type { InterferenceSource } from '@sensim/environment';
import { NumericDegeneracy, type ImperfectionStage } from './types.js';

export type InterferenceConfig = Pick<
  EmfConfig,
  | 'base_frequency'
  | 'emi_sources_config'
  | 'emi_frequency_coupling_factor'
  | 'emi_spectrum_impact_factor'
  | 'emi_field_strength_impact_factor'
  | 'emi_field_strength_random_stddev'
>;

/**
 * Summed coupled strength of `sources` at `position`
 */
export function totalInterference(
  sources: readonly InterferenceSource[],
  position: Position3D,
  baseFrequencyHz: number,
  couplingFactor: number
): number {
  let total = 0;
  for (const source of sources) {
    const coupling = Math.exp(-Math.abs(source.frequency - baseFrequencyHz) / couplingFactor);
    total += (source.strength * coupling) / (distanceSquared3D(source.position, position) + 1);
  }
  return total;
}

export const interferenceCouplingStage: ImperfectionStage<InterferenceConfig> = {
  id: 'interference_coupling',

  apply(state, config, { env, position, random }) {
    const sources = env.getNearbySources(position, config.emi_sources_config.radius_m);
    if (sources.length > 0 && config.emi_frequency_coupling_factor <= 0) {
      throw new NumericDegeneracy('interference_coupling', 'frequency coupling factor is zero');
    }

    const total = totalInterference(sources, position, config.base_frequency, config.emi_frequency_coupling_factor);
    if (!Number.isFinite(total)) {
      throw new NumericDegeneracy('interference_coupling', `total interference is ${total}`);
    }

    let value = state.value;
    if (total > 0) {
      value += total * config.emi_field_strength_impact_factor * random.gaussian(1, config.emi_field_strength_random_stddev);
    }

    return {
      ...state,
      value,
      spectrum: state.spectrum && { ...state.spectrum, emi_noise_floor: total * config.emi_spectrum_impact_factor },
    };
  },
};
