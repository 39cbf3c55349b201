/**
 * Ideal-reading helpers shared by modalities
 */

import { vectorLength, type Position3D } from '@sensim/core';
import type { SafeEnvironment } from '@sensim/environment';
import type { IdealReading } from '../api/index.js';

/**
 * Primary scalar field, or 0 with a warning when the environment has none
 */
export function readPrimary(env: SafeEnvironment, field: string, position: Position3D): number {
  return env.getNumber(field, position) ?? missingPrimary(env, field);
}

function missingPrimary(env: SafeEnvironment, field: string): number {
  env.warn({
    code: 'ENV_FIELD_MISSING',
    message: `Primary field "${field}" unavailable; ideal reading is 0`,
    severity: 'warning',
    context: { field },
  });
  return 0;
}

export interface SpectralFields {
  scalar: string;
  vector: string;
  frequency: string;
  /** Fall back to the vector magnitude when the scalar field is absent */
  magnitudeFromVector: boolean;
}

/**
 * Ideal reading for a directional, spectral quantity
 */
export function readSpectralIdeal(
  env: SafeEnvironment,
  position: Position3D,
  fields: SpectralFields,
  baseFrequencyHz: number
): IdealReading {
  const vector = env.getVector(fields.vector, position);
  const scalar = env.getNumber(fields.scalar, position);
  const value =
    scalar ??
    (fields.magnitudeFromVector && vector !== undefined ? vectorLength(vector) : missingPrimary(env, fields.scalar));

  const frequency = env.getNumber(fields.frequency, position);
  return {
    value,
    vector,
    dominantFrequencyHz: frequency !== undefined && frequency > 0 ? frequency : baseFrequencyHz,
  };
}
