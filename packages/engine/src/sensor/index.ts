/**
 * Modality sensors
 *
 * A sensor couples a modality definition with a resolved config, an id and a
 * position. Config is resolved and frozen once, here; stages and condition
 * evaluation only ever read it.
 */

import {
  parseSensorDefinition,
  resolveSensorConfig,
  normalizeConfig,
  type Position3D,
  type ResolvedSensorConfig,
} from '@sensim/core';
import { SafeEnvironment, type EnvironmentQuery } from '@sensim/environment';
import { hashString, logger as defaultLogger, type Logger, type Modality } from '@sensim/shared';
import type { AnomalyLabel, DriftState, IdealReading, ObservedReading, ReadingState, Sample, SampleContext } from '../api/index.js';
import { evaluateGroundTruth, type GroundTruthCondition } from '../groundTruth/index.js';
import { MODALITY_DEFINITIONS, type ModalityDefinition } from '../modalities/index.js';
import { ImperfectionPipeline, computeDriftState, type StageId } from '../stages/index.js';

// ============================================================================
// Types
// ============================================================================

export interface SensorOptions {
  id: string;
  position: Position3D;
  /** Config overrides; defaults fill the rest */
  config?: unknown;
  enabled?: boolean;
  logger?: Logger;
}

/** Descriptive metadata for dataset manifests */
export interface SensorMetadata<M extends Modality = Modality> {
  id: string;
  modality: M;
  quantity: string;
  unit: string;
  position: Position3D;
  enabled: boolean;
  stages: StageId[];
  config: ResolvedSensorConfig<M>;
  /** FNV-1a of the key-sorted config */
  configHash: number;
}

/** Either a raw environment or a per-sample safe adapter */
export type EnvironmentInput = EnvironmentQuery | SafeEnvironment;

// ============================================================================
// Sensor
// ============================================================================

export class ModalitySensor<M extends Modality> {
  readonly id: string;
  readonly modality: M;
  readonly config: ResolvedSensorConfig<M>;

  private readonly definition: ModalityDefinition<M>;
  private readonly pipeline: ImperfectionPipeline<ResolvedSensorConfig<M>>;
  private readonly conditions: readonly GroundTruthCondition[];
  private readonly log: Logger;
  private position: Position3D;
  private enabled: boolean;

  /**
   * @throws ConfigError when the overrides do not validate
   */
  constructor(definition: ModalityDefinition<M>, options: SensorOptions) {
    this.definition = definition;
    this.id = options.id;
    this.modality = definition.modality;
    this.config = resolveSensorConfig(definition.modality, options.config ?? {}, `sensor "${options.id}"`);
    this.position = { ...options.position };
    this.enabled = options.enabled ?? true;
    this.log = (options.logger ?? defaultLogger).child({ component: 'sensor', sensorId: options.id });
    this.pipeline = new ImperfectionPipeline(definition.stages, definition.range, this.log);
    this.conditions = Object.freeze(definition.conditions(this.config));
  }

  // --------------------------------------------------------------------------
  // State
  // --------------------------------------------------------------------------

  getPosition(): Position3D {
    return { ...this.position };
  }

  moveTo(position: Position3D): void {
    this.position = { ...position };
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /** Total operating hours after `elapsedHours` of the current run */
  operatingHours(elapsedHours: number): number {
    return this.config.initial_operating_hours + elapsedHours;
  }

  /** Calibration gain and offset after `elapsedHours` of the current run */
  getDriftState(elapsedHours: number): DriftState {
    return computeDriftState(this.config, this.operatingHours(elapsedHours));
  }

  getMetadata(): SensorMetadata<M> {
    return {
      id: this.id,
      modality: this.modality,
      quantity: this.definition.quantity,
      unit: this.definition.unit,
      position: this.getPosition(),
      enabled: this.enabled,
      stages: this.pipeline.stageIds,
      config: this.config,
      configHash: hashString(normalizeConfig(this.config)),
    };
  }

  // --------------------------------------------------------------------------
  // Sampling
  // --------------------------------------------------------------------------

  /**
   * True quantity at the sensor position. A missing primary field reads 0
   * and records a warning.
   */
  readIdeal(env: EnvironmentInput): IdealReading {
    return this.definition.readIdeal(this.safe(env), this.position, this.config);
  }

  /**
   * Run the modality's stages over an ideal reading
   */
  applyImperfections(ideal: IdealReading, env: EnvironmentInput, context: SampleContext): ObservedReading {
    const initial: ReadingState = {
      value: ideal.value,
      vector: ideal.vector,
      dominantFrequencyHz: ideal.dominantFrequencyHz ?? 0,
    };
    const state = this.pipeline.run(initial, this.config, {
      env: this.safe(env),
      position: this.position,
      elapsedHours: this.operatingHours(context.elapsedHours),
      random: context.random,
    });

    const observed: ObservedReading = {
      quantity: this.definition.quantity,
      unit: this.definition.unit,
      value: state.value,
    };
    if (state.spectrum) observed.spectrum = state.spectrum;
    const channels = this.definition.finalizeChannels
      ? this.definition.finalizeChannels(ideal, state.value)
      : ideal.channels;
    if (channels) observed.channels = channels;
    return observed;
  }

  /**
   * Anomaly labels for the current environment state. Threshold conditions
   * need the observed reading; without it only state conditions are checked.
   */
  getGroundTruth(env: EnvironmentInput, observed?: ObservedReading): AnomalyLabel[] {
    return evaluateGroundTruth(this.conditions, this.safe(env), this.position, observed?.value);
  }

  /**
   * Read, corrupt and label one sample. The environment is wrapped once so
   * every warning raised along the way lands on the sample.
   */
  sample(env: EnvironmentInput, context: SampleContext): Sample {
    const safe = this.safe(env);
    const ideal = this.readIdeal(safe);
    const observed = this.applyImperfections(ideal, safe, context);
    const groundTruth = this.getGroundTruth(safe, observed);

    return {
      sensorId: this.id,
      timestampUsec: context.timestampUsec,
      position: this.getPosition(),
      modality: this.modality,
      observed,
      groundTruth,
      warnings: [...safe.collectedWarnings],
    };
  }

  private safe(env: EnvironmentInput): SafeEnvironment {
    return env instanceof SafeEnvironment ? env : new SafeEnvironment(env, this.log);
  }
}

// ============================================================================
// Factory
// ============================================================================

/** A sensor of any modality */
export type AnySensor = { [M in Modality]: ModalitySensor<M> }[Modality];

type SensorFactories = { [M in Modality]: (options: SensorOptions) => ModalitySensor<M> };

const SENSOR_FACTORIES: SensorFactories = {
  emf: (options) => new ModalitySensor(MODALITY_DEFINITIONS.emf, options),
  acoustic: (options) => new ModalitySensor(MODALITY_DEFINITIONS.acoustic, options),
  particulate: (options) => new ModalitySensor(MODALITY_DEFINITIONS.particulate, options),
  thermal: (options) => new ModalitySensor(MODALITY_DEFINITIONS.thermal, options),
  chemical: (options) => new ModalitySensor(MODALITY_DEFINITIONS.chemical, options),
};

/**
 * Create a sensor from a definition `{ id, modality, position, enabled?, config? }`
 * @throws ConfigError for an unknown modality or invalid config
 */
export function createSensor(definition: unknown, logger?: Logger): AnySensor {
  const parsed = parseSensorDefinition(definition);
  return SENSOR_FACTORIES[parsed.modality]({
    id: parsed.id,
    position: parsed.position,
    config: parsed.config,
    enabled: parsed.enabled,
    logger,
  });
}
