/**
 * Directional sensitivity - projects the field onto the sensor axis
 */

import { dot, normalize, vectorFromTuple, type SpectralConfig, type Vector3 } from '@sensim/core';
import { clamp, type RandomStream } from '@sensim/shared';
import { mapSpectrum } from './spectral.js';
import { NumericDegeneracy, type ImperfectionStage } from './types.js';

export type DirectionalSensitivityConfig = Pick<
  SpectralConfig,
  | 'orientation'
  | 'orientation_uncertainty'
  | 'orientation_uncertainty_stddev'
  | 'apply_directional_sensitivity_to_scalar'
  | 'assumed_dominant_field_direction'
>;

/**
 * Alignment of two unit vectors, perturbed by mounting uncertainty and
 * clamped to [0, 1]. A reversed field contributes nothing.
 */
export function alignmentFactor(
  axis: Vector3,
  direction: Vector3,
  uncertaintyStddev: number,
  random: RandomStream
): number {
  let alignment = dot(axis, direction);
  if (uncertaintyStddev > 0) {
    alignment += random.gaussian(0, uncertaintyStddev);
  }
  return clamp(alignment, 0, 1);
}

/**
 * Scales the reading by its alignment with the sensor axis.
 * Scalar-only readings are left alone unless an assumed direction is enabled.
 */
export const directionalSensitivityStage: ImperfectionStage<DirectionalSensitivityConfig> = {
  id: 'directional_sensitivity',

  apply(state, config, { random }) {
    const field =
      state.vector ??
      (config.apply_directional_sensitivity_to_scalar
        ? vectorFromTuple(config.assumed_dominant_field_direction)
        : undefined);
    if (field === undefined) {
      return state;
    }

    const axis = normalize(vectorFromTuple(config.orientation));
    if (axis === null) {
      throw new NumericDegeneracy('directional_sensitivity', 'sensor orientation has zero length');
    }
    const direction = normalize(field);
    if (direction === null) {
      throw new NumericDegeneracy('directional_sensitivity', 'field direction has zero length');
    }

    const factor = alignmentFactor(
      axis,
      direction,
      config.orientation_uncertainty ? config.orientation_uncertainty_stddev : 0,
      random
    );

    return {
      ...state,
      value: state.value * factor,
      spectrum: state.spectrum && mapSpectrum(state.spectrum, (magnitude) => magnitude * factor),
    };
  },
};
