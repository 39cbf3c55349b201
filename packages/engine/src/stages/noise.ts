/**
 * Noise injection - last stage, perturbs the final primary value
 */

import type { SensorConfig } from '@sensim/core';
import type { ImperfectionStage } from './types.js';

export type NoiseConfig = Pick<SensorConfig, 'noise_characteristics'>;

export const noiseInjectionStage: ImperfectionStage<NoiseConfig> = {
  id: 'noise_injection',

  apply(state, config, { random }) {
    const noise = config.noise_characteristics;
    if (noise.type === 'none') {
      return state;
    }
    return { ...state, value: state.value + random.gaussian(noise.mean, noise.stddev) };
  },
};
