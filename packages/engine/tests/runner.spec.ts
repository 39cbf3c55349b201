import { describe, it, expect } from 'vitest';
import { ConfigError } from '@sensim/core';
import { StaticEnvironment } from '@sensim/environment';
import { silentLogger } from '@sensim/shared';
import { toSampleRecord, type Sample } from '../src/api/index.js';
import { ScenarioRunner } from '../src/compute/index.js';

const sensors = [
  { id: 'emf-c', modality: 'emf', position: { x: 2, y: 0 } },
  { id: 'emf-a', modality: 'emf', position: { x: 0, y: 0 } },
  { id: 'thermal-b', modality: 'thermal', position: { x: 1, y: 0 } },
];

function environment(): StaticEnvironment {
  return new StaticEnvironment({
    fields: { ac_field_strength: (p) => 100 + p.x, temperature_c: 40, corona_discharge: 0.2 },
    sources: [{ position: { x: 5, y: 5, z: 0 }, frequency: 60, strength: 20 }],
  });
}

describe('ScenarioRunner', () => {
  it('rejects duplicate sensor ids', () => {
    expect(
      () =>
        new ScenarioRunner(
          { sensors: [sensors[0], { ...sensors[1], id: 'emf-c' }] },
          silentLogger
        )
    ).toThrow(ConfigError);
  });

  it('spaces timestamps by the step length', async () => {
    const runner = new ScenarioRunner({ startTimeUsec: 1000, stepSeconds: 0.5, steps: 3, sensors }, silentLogger);
    const seen: number[] = [];
    await runner.run((timestampUsec) => {
      seen.push(timestampUsec);
      return environment();
    });
    expect(seen).toEqual([1000, 501000, 1001000]);
  });

  it('emits samples in sensor id order within each step', async () => {
    const runner = new ScenarioRunner({ steps: 2, sensors }, silentLogger);
    const { samples, timings } = await runner.run(() => environment());
    expect(samples.map((s) => s.sensorId)).toEqual(['emf-a', 'emf-c', 'thermal-b', 'emf-a', 'emf-c', 'thermal-b']);
    expect(timings.stepCount).toBe(2);
    expect(timings.sampleCount).toBe(6);
  });

  it('produces identical samples for any concurrency', async () => {
    const serial = await new ScenarioRunner({ seed: 'test-seed', steps: 3, concurrency: 1, sensors }, silentLogger).run(
      () => environment()
    );
    const parallel = await new ScenarioRunner({ seed: 'test-seed', steps: 3, concurrency: 8, sensors }, silentLogger).run(
      async () => environment()
    );
    expect(parallel.samples).toEqual(serial.samples);
  });

  it('changes noise with the seed', async () => {
    const a = await new ScenarioRunner({ seed: 'seed-a', sensors }, silentLogger).run(() => environment());
    const b = await new ScenarioRunner({ seed: 'seed-b', sensors }, silentLogger).run(() => environment());
    expect(a.samples.map((s) => s.observed.value)).not.toEqual(b.samples.map((s) => s.observed.value));
  });

  it('skips disabled sensors', async () => {
    const runner = new ScenarioRunner({ sensors: [...sensors, { ...sensors[1], id: 'emf-off', enabled: false }] }, silentLogger);
    const { samples } = await runner.run(() => environment());
    expect(samples.map((s) => s.sensorId)).not.toContain('emf-off');

    runner.getSensor('emf-off')?.enable();
    const second = await runner.run(() => environment());
    expect(second.samples.map((s) => s.sensorId)).toContain('emf-off');
  });

  it('applies drift from elapsed scenario time', async () => {
    const runner = new ScenarioRunner(
      {
        stepSeconds: 3600,
        steps: 3,
        sensors: [
          {
            id: 'thermal-1',
            modality: 'thermal',
            position: { x: 0, y: 0 },
            config: {
              calibration_gain_drift_percent_per_hour: 0,
              calibration_offset_drift_per_hour: 1,
              noise_characteristics: { type: 'none' },
            },
          },
        ],
      },
      silentLogger
    );
    const { samples } = await runner.run(() => new StaticEnvironment({ fields: { temperature_c: 20 } }));
    expect(samples.map((s) => s.observed.value)).toEqual([20, 21, 22]);
  });

  it('reports each step to the callback', async () => {
    const runner = new ScenarioRunner({ steps: 2, sensors }, silentLogger);
    const steps: number[] = [];
    await runner.run(
      () => environment(),
      (stepSamples, step) => {
        steps.push(step);
        expect(stepSamples).toHaveLength(3);
      }
    );
    expect(steps).toEqual([0, 1]);
  });

  it('tags warnings with their sensor and timestamp', async () => {
    const runner = new ScenarioRunner(
      { startTimeUsec: 5, sensors: [{ id: 'thermal-1', modality: 'thermal', position: { x: 0, y: 0 } }] },
      silentLogger
    );
    const { warnings } = await runner.run(() => new StaticEnvironment());
    expect(warnings).toContainEqual({
      code: 'ENV_FIELD_MISSING',
      message: 'Primary field "temperature_c" unavailable; ideal reading is 0',
      severity: 'warning',
      context: { field: 'temperature_c', sensorId: 'thermal-1', timestampUsec: 5 },
    });
  });
});

describe('toSampleRecord', () => {
  it('maps a sample to the snake_case record', () => {
    const sample: Sample = {
      sensorId: 'emf-01',
      timestampUsec: 42,
      position: { x: 1, y: 2, z: 3 },
      modality: 'emf',
      observed: {
        quantity: 'ac_field_strength',
        unit: 'V/m',
        value: 12.5,
        spectrum: { fundamental: 12.5, emi_noise_floor: 0 },
      },
      groundTruth: [{ type: 'corona_discharge', severity: 80, confidence: 0.9 }],
      warnings: [],
    };
    expect(toSampleRecord(sample)).toEqual({
      sensor_id: 'emf-01',
      timestamp_usec: 42,
      position: { x: 1, y: 2, z: 3 },
      modality: 'emf',
      observed_reading: {
        quantity: 'ac_field_strength',
        unit: 'V/m',
        value: 12.5,
        spectrum: { fundamental: 12.5, emi_noise_floor: 0 },
      },
      ground_truth: [{ anomaly_type: 'corona_discharge', severity: 80, confidence: 0.9 }],
    });
  });
});
