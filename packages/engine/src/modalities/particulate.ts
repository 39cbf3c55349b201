/**
 * Optical particle counter
 *
 * Primary quantity pm2_5; channels pm1_0 and pm10_0 follow the primary's
 * corruption and are ordered so pm1_0 <= pm2_5 <= pm10_0.
 */

import { EPSILON } from '@sensim/shared';
import { calibrationDriftStage, generalDriftStage, noiseInjectionStage } from '../stages/index.js';
import type { IdealReading } from '../api/index.js';
import { readPrimary } from './common.js';
import type { ModalityDefinition } from './types.js';

const CHANNELS = ['pm1_0', 'pm10_0'] as const;

/**
 * Carry the primary's corruption over to the secondary channels.
 * A ratio is used when the ideal primary is non-zero, an additive delta
 * otherwise.
 */
export function deriveParticulateChannels(
  ideal: IdealReading,
  observedValue: number
): Record<string, number> | undefined {
  if (!ideal.channels) return undefined;

  const useRatio = Math.abs(ideal.value) > EPSILON;
  const corrupt = (channel: number) =>
    Math.max(0, useRatio ? channel * (observedValue / ideal.value) : channel + (observedValue - ideal.value));

  const channels: Record<string, number> = {};
  const pm1 = ideal.channels.pm1_0;
  const pm10 = ideal.channels.pm10_0;
  if (pm1 !== undefined) channels.pm1_0 = Math.min(corrupt(pm1), observedValue);
  if (pm10 !== undefined) channels.pm10_0 = Math.max(corrupt(pm10), observedValue);
  return channels;
}

export const particulateModality: ModalityDefinition<'particulate'> = {
  modality: 'particulate',
  quantity: 'pm2_5',
  unit: 'ug/m3',
  range: { min: 0, max: Infinity },
  stages: [calibrationDriftStage, generalDriftStage, noiseInjectionStage],

  readIdeal(env, position) {
    const value = readPrimary(env, 'pm2_5', position);
    const channels: Record<string, number> = {};
    for (const channel of CHANNELS) {
      const reading = env.getNumber(channel, position);
      if (reading !== undefined) channels[channel] = reading;
    }
    return Object.keys(channels).length > 0 ? { value, channels } : { value };
  },

  conditions(config) {
    return [
      {
        kind: 'state',
        label: 'smoke',
        field: 'smoke_density',
        severityScale: config.smoke_severity_scale,
        confidence: config.smoke_confidence,
      },
      {
        kind: 'threshold',
        label: 'pm_exceedance',
        threshold: config.pm_exceedance_threshold,
        severityScale: config.pm_exceedance_severity_scale,
        confidence: config.pm_exceedance_confidence,
      },
    ];
  },

  finalizeChannels: deriveParticulateChannels,
};
