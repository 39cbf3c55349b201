/**
 * Scenario runner - drives sensors over timesteps
 *
 * Each timestep asks the provider for the environment state, then samples
 * every enabled sensor as an independent task. Sensors never share a random
 * stream: each sample draws from one seeded by (seed, sensor id, timestamp),
 * so output is identical for any concurrency.
 */

import { parseScenarioConfig, usecToHours, type ScenarioConfig } from '@sensim/core';
import type { EnvironmentQuery } from '@sensim/environment';
import {
  USEC_PER_SECOND,
  chunk,
  createRandomStream,
  deriveSeed,
  logger as defaultLogger,
  type Logger,
  type RunTimings,
  type SampleWarning,
} from '@sensim/shared';
import type { Sample } from '../api/index.js';
import { createSensor, type AnySensor } from '../sensor/index.js';

// ============================================================================
// Types
// ============================================================================

/** Environment state for a timestep */
export type EnvironmentProvider = (
  timestampUsec: number,
  step: number
) => EnvironmentQuery | Promise<EnvironmentQuery>;

/** Called with each timestep's samples, in sensor id order */
export type StepCallback = (samples: Sample[], step: number) => void | Promise<void>;

export interface ScenarioResult {
  samples: Sample[];
  timings: RunTimings;
  /** Every sample warning, tagged with its sensor and timestamp */
  warnings: SampleWarning[];
}

function compareIds(a: AnySensor, b: AnySensor): number {
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

// ============================================================================
// Runner
// ============================================================================

export class ScenarioRunner {
  readonly config: ScenarioConfig;
  private readonly sensors: AnySensor[];
  private readonly log: Logger;

  /**
   * @throws ConfigError when the scenario or any sensor definition is invalid
   */
  constructor(config: unknown, logger: Logger = defaultLogger) {
    this.config = parseScenarioConfig(config);
    this.log = logger.child({ component: 'runner' });
    this.sensors = this.config.sensors.map((definition) => createSensor(definition, logger));
  }

  get sensorIds(): string[] {
    return this.sensors.map((sensor) => sensor.id);
  }

  getSensor(id: string): AnySensor | undefined {
    return this.sensors.find((sensor) => sensor.id === id);
  }

  /** Timestamp of a step (microseconds) */
  timestampAt(step: number): number {
    return this.config.startTimeUsec + Math.round(step * this.config.stepSeconds * USEC_PER_SECOND);
  }

  /**
   * Sample every enabled sensor once against `env`
   */
  async runStep(env: EnvironmentQuery, step: number): Promise<Sample[]> {
    const timestampUsec = this.timestampAt(step);
    const elapsedHours = usecToHours(timestampUsec - this.config.startTimeUsec);
    const active = this.sensors.filter((sensor) => sensor.isEnabled()).sort(compareIds);

    const samples: Sample[] = [];
    for (const batch of chunk(active, this.config.concurrency)) {
      const results = await Promise.all(
        batch.map(async (sensor) =>
          sensor.sample(env, {
            timestampUsec,
            elapsedHours,
            random: createRandomStream(deriveSeed(this.config.seed, sensor.id, timestampUsec)),
          })
        )
      );
      samples.push(...results);
    }
    return samples;
  }

  /**
   * Run all configured timesteps
   */
  async run(provider: EnvironmentProvider, onStep?: StepCallback): Promise<ScenarioResult> {
    const start = performance.now();
    const { steps, seed, concurrency } = this.config;
    this.log.info('Scenario started', { steps, sensors: this.sensors.length, seed, concurrency });

    const samples: Sample[] = [];
    for (let step = 0; step < steps; step++) {
      const env = await provider(this.timestampAt(step), step);
      const stepSamples = await this.runStep(env, step);
      this.log.debug('Step complete', { step, samples: stepSamples.length });
      if (onStep) await onStep(stepSamples, step);
      samples.push(...stepSamples);
    }

    const warnings = samples.flatMap((sample) =>
      sample.warnings.map((warning) => ({
        ...warning,
        context: { ...warning.context, sensorId: sample.sensorId, timestampUsec: sample.timestampUsec },
      }))
    );
    const timings: RunTimings = {
      totalMs: performance.now() - start,
      stepCount: steps,
      sampleCount: samples.length,
    };

    this.log.info('Scenario finished', { ...timings, warnings: warnings.length });
    return { samples, timings, warnings };
  }
}
