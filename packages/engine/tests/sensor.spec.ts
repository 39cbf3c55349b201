import { describe, it, expect } from 'vitest';
import { ConfigError } from '@sensim/core';
import { StaticEnvironment, type EnvironmentQuery } from '@sensim/environment';
import { ZERO_NOISE_STREAM, createRandomStream, silentLogger, type Modality } from '@sensim/shared';
import type { SampleContext } from '../src/api/index.js';
import { deriveParticulateChannels } from '../src/modalities/index.js';
import { createSensor } from '../src/sensor/index.js';

const origin = { x: 0, y: 0, z: 0 };
const quiet: SampleContext = { timestampUsec: 0, elapsedHours: 0, random: ZERO_NOISE_STREAM };

function sensor(modality: Modality, config: Record<string, unknown> = {}, id = `${modality}-01`) {
  return createSensor({ id, modality, position: origin, config }, silentLogger);
}

// ============================================================================
// Construction
// ============================================================================

describe('createSensor', () => {
  it('rejects an unknown modality', () => {
    expect(() => createSensor({ id: 'x', modality: 'seismic', position: origin })).toThrow(ConfigError);
  });

  it('rejects invalid config values', () => {
    expect(() => sensor('emf', { noise_characteristics: { stddev: -1 } })).toThrow(ConfigError);
    expect(() => sensor('emf', { corona_confidence: 1.5 })).toThrow(ConfigError);
  });

  it('requires a target species for chemical sensors', () => {
    expect(() => sensor('chemical')).toThrow(ConfigError);
  });

  it('freezes the resolved config', () => {
    const emf = sensor('emf');
    expect(Object.isFrozen(emf.config)).toBe(true);
    expect(emf.config).toHaveProperty('base_frequency', 60);
  });

  it('describes itself for dataset manifests', () => {
    const metadata = sensor('particulate').getMetadata();
    expect(metadata.modality).toBe('particulate');
    expect(metadata.quantity).toBe('pm2_5');
    expect(metadata.stages).toEqual(['calibration_drift', 'general_drift', 'noise_injection']);
    expect(metadata.configHash).toBe(sensor('particulate', {}, 'other').getMetadata().configHash);
    expect(metadata.configHash).not.toBe(sensor('particulate', { calibration_offset: 1 }).getMetadata().configHash);
  });
});

// ============================================================================
// EMF
// ============================================================================

describe('emf sensor', () => {
  it('produces the third harmonic from its configured ratio', () => {
    const emf = sensor('emf', {
      harmonic_3_ratio: 0.15,
      frequency_noise: false,
      frequency_response_curve: { '3rd': 1.0 },
      noise_characteristics: { type: 'none' },
    });
    const sample = emf.sample(new StaticEnvironment({ fields: { ac_field_strength: 10 } }), quiet);
    expect(sample.observed.spectrum?.['3rd']).toBe(1.5);
  });

  it('reads the magnitude from the field vector when no scalar is given', () => {
    const ideal = sensor('emf').readIdeal(new StaticEnvironment({ fields: { ac_field_vector: { x: 0, y: 3, z: 4 } } }));
    expect(ideal.value).toBe(5);
    expect(ideal.vector).toEqual({ x: 0, y: 3, z: 4 });
    expect(ideal.dominantFrequencyHz).toBe(60);
  });

  it('reads 0 with a warning when the primary field is missing', () => {
    const sample = sensor('emf').sample(new StaticEnvironment(), quiet);
    expect(sample.observed.value).toBeGreaterThanOrEqual(0);
    expect(sample.warnings).toContainEqual({
      code: 'ENV_FIELD_MISSING',
      message: 'Primary field "ac_field_strength" unavailable; ideal reading is 0',
      severity: 'warning',
      context: { field: 'ac_field_strength' },
    });
  });

  it('records a missing primary field once', () => {
    const sample = sensor('emf').sample(new StaticEnvironment(), quiet);
    const primary = sample.warnings.filter((w) => w.context?.field === 'ac_field_strength');
    expect(primary.map((w) => w.severity)).toEqual(['info', 'warning']);
  });

  it('samples through an environment that reports null for unset fields', () => {
    const env: EnvironmentQuery = {
      getFieldValue: (field) => (field === 'ac_field_strength' ? 10 : null),
      getNearbySources: () => [],
    };
    const sample = sensor('emf', { noise_characteristics: { type: 'none' } }).sample(env, quiet);
    expect(sample.observed.value).toBeGreaterThan(0);
    expect(sample.groundTruth).toEqual([]);
  });

  it('keeps spectrum magnitudes non-negative with an explicit noise floor', () => {
    const emf = sensor('emf', { frequency_noise_stddev: 3, orientation_uncertainty_stddev: 2 });
    const env = new StaticEnvironment({
      fields: { ac_field_strength: 10, ac_field_vector: { x: 1, y: 0, z: 1 }, corona_discharge: 1 },
    });
    for (let seed = 0; seed < 25; seed++) {
      const { observed } = emf.sample(env, { ...quiet, random: createRandomStream(seed) });
      expect(observed.spectrum).toHaveProperty('emi_noise_floor');
      for (const magnitude of Object.values(observed.spectrum ?? {})) {
        expect(magnitude).toBeGreaterThanOrEqual(0);
      }
    }
  });

  it('omits the spectrum when output is disabled', () => {
    const emf = sensor('emf', { enable_spectrum_output: false, axis_misalignment_effect_on_spectrum: true });
    const sample = emf.sample(new StaticEnvironment({ fields: { ac_field_strength: 10 } }), quiet);
    expect(sample.observed).not.toHaveProperty('spectrum');
  });

  it('zeroes a reversed field instead of going negative', () => {
    const emf = sensor('emf', {
      orientation: [0, 0, 1],
      orientation_uncertainty: false,
      calibration_offset_drift_per_hour: 0,
      noise_characteristics: { type: 'none' },
    });
    const sample = emf.sample(
      new StaticEnvironment({ fields: { ac_field_strength: 25, ac_field_vector: { x: 0, y: 0, z: -1 } } }),
      quiet
    );
    expect(sample.observed.value).toBe(0);
    expect(sample.observed.spectrum?.fundamental).toBe(0);
  });

  it('samples reproducibly under a fixed seed', () => {
    const emf = sensor('emf');
    const env = new StaticEnvironment({
      fields: { ac_field_strength: 10 },
      sources: [{ position: { x: 1, y: 0, z: 0 }, frequency: 60, strength: 5 }],
    });
    const a = emf.sample(env, { ...quiet, random: createRandomStream('test-seed') });
    const b = emf.sample(env, { ...quiet, random: createRandomStream('test-seed') });
    expect(a).toEqual(b);
  });
});

// ============================================================================
// Acoustic
// ============================================================================

describe('acoustic sensor', () => {
  it('clamps to the physical SPL range', () => {
    const acoustic = sensor('acoustic', { noise_characteristics: { type: 'none' } });
    const sample = acoustic.sample(new StaticEnvironment({ fields: { spl_dba: 250 } }), quiet);
    expect(sample.observed.value).toBe(194);
    expect(sample.observed.unit).toBe('dBA');
  });

  it('does not couple to interference sources', () => {
    expect(sensor('acoustic').getMetadata().stages).not.toContain('interference_coupling');
  });
});

// ============================================================================
// Particulate
// ============================================================================

describe('particulate sensor', () => {
  it('carries the primary corruption over to the channels', () => {
    const particulate = sensor('particulate', {
      calibration_gain_error_factor: 1.5,
      noise_characteristics: { type: 'none' },
    });
    const sample = particulate.sample(
      new StaticEnvironment({ fields: { pm2_5: 30, pm1_0: 12, pm10_0: 40 } }),
      quiet
    );
    expect(sample.observed.value).toBe(45);
    expect(sample.observed.channels).toEqual({ pm1_0: 18, pm10_0: 60 });
    expect(sample.groundTruth).toEqual([{ type: 'pm_exceedance', severity: 1, confidence: 0.9 }]);
  });

  it('orders channels around the primary', () => {
    const particulate = sensor('particulate', { noise_characteristics: { type: 'none' } });
    const sample = particulate.sample(
      new StaticEnvironment({ fields: { pm2_5: 20, pm1_0: 25, pm10_0: 10 } }),
      quiet
    );
    expect(sample.observed.channels).toEqual({ pm1_0: 20, pm10_0: 20 });
  });

  it('uses an additive delta when the ideal primary is zero', () => {
    expect(deriveParticulateChannels({ value: 0, channels: { pm1_0: 0, pm10_0: 2 } }, 3)).toEqual({
      pm1_0: 3,
      pm10_0: 5,
    });
  });

  it('labels smoke from the environment', () => {
    const particulate = sensor('particulate', { noise_characteristics: { type: 'none' } });
    const labels = particulate.getGroundTruth(new StaticEnvironment({ fields: { smoke_density: 0.25 } }));
    expect(labels).toEqual([{ type: 'smoke', severity: 25, confidence: 0.8 }]);
  });
});

// ============================================================================
// Thermal
// ============================================================================

describe('thermal sensor', () => {
  it('labels hotspots and over-temperature together', () => {
    const thermal = sensor('thermal', { noise_characteristics: { type: 'none' } });
    const sample = thermal.sample(new StaticEnvironment({ fields: { temperature_c: 95, hotspot_intensity: 0.5 } }), quiet);
    expect(sample.observed.value).toBe(95);
    expect(sample.groundTruth).toEqual([
      { type: 'hotspot', severity: 5, confidence: 0.85 },
      { type: 'over_temperature', severity: 1, confidence: 0.9 },
    ]);
  });

  it('never reads below absolute zero', () => {
    const thermal = sensor('thermal', { noise_characteristics: { type: 'none' } });
    expect(thermal.sample(new StaticEnvironment({ fields: { temperature_c: -300 } }), quiet).observed.value).toBe(
      -273.15
    );
  });

  it('drifts from its initial operating hours', () => {
    const thermal = sensor('thermal', {
      initial_operating_hours: 100,
      calibration_gain_drift_percent_per_hour: 1,
    });
    expect(thermal.getDriftState(0)).toEqual({ gain: 2, offset: 0, elapsedHours: 100 });
  });
});

// ============================================================================
// Chemical
// ============================================================================

describe('chemical sensor', () => {
  it('adds cross-sensitive species to the target', () => {
    const chemical = sensor('chemical', {
      target_species: 'co',
      cross_sensitivity: { h2: 0.5 },
      noise_characteristics: { type: 'none' },
    });
    const sample = chemical.sample(new StaticEnvironment({ fields: { co: 40, h2: 10 } }), quiet);
    expect(sample.observed).toEqual({ quantity: 'concentration_ppb', unit: 'ppb', value: 45 });
  });

  it('labels a gas leak and an exposure limit', () => {
    const chemical = sensor('chemical', { target_species: 'co', noise_characteristics: { type: 'none' } });
    const sample = chemical.sample(new StaticEnvironment({ fields: { co: 60, gas_leak_rate: 2 } }), quiet);
    expect(sample.groundTruth).toEqual([
      { type: 'gas_leak', severity: 2, confidence: 0.8 },
      { type: 'exposure_limit', severity: 1, confidence: 0.9 },
    ]);
  });
});

// ============================================================================
// Lifecycle
// ============================================================================

describe('sensor lifecycle', () => {
  it('queries the environment at its current position', () => {
    const thermal = sensor('thermal', { noise_characteristics: { type: 'none' } });
    const env = new StaticEnvironment({ fields: { temperature_c: (p) => 20 + p.x } });
    thermal.moveTo({ x: 5, y: 0, z: 0 });
    const sample = thermal.sample(env, quiet);
    expect(sample.observed.value).toBe(25);
    expect(sample.position).toEqual({ x: 5, y: 0, z: 0 });
  });

  it('toggles enabled state', () => {
    const thermal = sensor('thermal');
    thermal.disable();
    expect(thermal.isEnabled()).toBe(false);
    thermal.enable();
    expect(thermal.isEnabled()).toBe(true);
  });
});
