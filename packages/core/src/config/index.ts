/**
 * Sensor config resolution
 *
 * Overrides are migrated, validated against the modality schema, filled with
 * defaults and frozen once, at sensor construction.
 */

import type { Modality } from '@sensim/shared';
import { ConfigError } from '../errors/index.js';
import { migrateLegacyConfig } from '../migration/index.js';
import {
  SENSOR_CONFIG_SCHEMAS,
  ScenarioConfigSchema,
  SensorDefinitionSchema,
  type ScenarioConfig,
  type SensorConfigByModality,
  type SensorDefinition,
} from '../schema/index.js';

/** Immutable, fully-defaulted config for one modality */
export type ResolvedSensorConfig<M extends Modality> = Readonly<SensorConfigByModality[M]>;

/**
 * Recursively freeze an object graph
 */
export function deepFreeze<T extends object>(value: T): Readonly<T> {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Resolve sensor config overrides for a modality
 * @throws ConfigError on a wrong type, an out-of-domain value or a missing required key
 */
export function resolveSensorConfig<M extends Modality>(
  modality: M,
  overrides: unknown = {},
  context: string = modality
): ResolvedSensorConfig<M> {
  const result = SENSOR_CONFIG_SCHEMAS[modality].safeParse(migrateLegacyConfig(overrides));
  if (!result.success) {
    throw ConfigError.fromZodError(context, result.error);
  }
  return deepFreeze(result.data);
}

/**
 * Parse a sensor definition, throwing ConfigError on error
 */
export function parseSensorDefinition(data: unknown): SensorDefinition {
  const result = SensorDefinitionSchema.safeParse(data);
  if (!result.success) {
    throw ConfigError.fromZodError('sensor definition', result.error);
  }
  return result.data;
}

/**
 * Parse a scenario, throwing ConfigError on error
 */
export function parseScenarioConfig(data: unknown): ScenarioConfig {
  const result = ScenarioConfigSchema.safeParse(data);
  if (!result.success) {
    throw ConfigError.fromZodError('scenario', result.error);
  }
  return result.data;
}
