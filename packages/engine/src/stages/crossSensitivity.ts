/**
 * Cross sensitivity - response of a gas sensor to species it does not target
 */

import type { ChemicalConfig } from '@sensim/core';
import type { ImperfectionStage } from './types.js';

export type CrossSensitivityConfig = Pick<ChemicalConfig, 'cross_sensitivity'>;

/** Adds `factor * concentration` for every interfering species; absent species add 0 */
export const crossSensitivityStage: ImperfectionStage<CrossSensitivityConfig> = {
  id: 'cross_sensitivity',

  apply(state, config, { env, position }) {
    let value = state.value;
    for (const [species, factor] of Object.entries(config.cross_sensitivity)) {
      value += factor * (env.getNumber(species, position) ?? 0);
    }
    return { ...state, value };
  },
};
