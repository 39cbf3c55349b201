/**
 * Sensor configuration schemas
 * Runtime validation with Zod + TypeScript types
 *
 * Config keys are snake_case; they are the external configuration surface
 * shared with scenario files. Unknown keys are stripped.
 */

import { z } from 'zod';
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_LINE_FREQUENCY_HZ,
  DEFAULT_SEED,
  MODALITIES,
  REFERENCE_TEMPERATURE_C,
  SPECTRUM_COMPONENTS,
  type Modality,
  type Spectrum,
} from '@sensim/shared';

// ============================================================================
// Base Schemas
// ============================================================================

/** `[x, y, z]` tuple used for orientation and direction keys */
export const Vector3TupleSchema = z.tuple([z.number().finite(), z.number().finite(), z.number().finite()]);

/** Sensor position in meters */
export const Position3DSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  z: z.number().finite().default(0),
});

/** Spectrum slot name */
export const SpectrumComponentSchema = z.enum(SPECTRUM_COMPONENTS);

const severityScale = (value: number) => z.number().finite().min(0).default(value);
const confidence = (value: number) => z.number().min(0).max(1).default(value);

// ============================================================================
// Shared Fragments
// ============================================================================

/** Additive noise on the final primary value */
export function noiseCharacteristicsSchema(defaultStddev: number) {
  return z
    .object({
      type: z.enum(['gaussian', 'none']).default('gaussian'),
      mean: z.number().finite().default(0),
      stddev: z.number().finite().min(0).default(defaultStddev),
    })
    .default({});
}

/** Linear baseline drift, independent of calibration drift */
export const DriftParametersSchema = z
  .object({
    baseline_drift_per_hour: z.number().finite().default(0),
  })
  .default({});

interface CommonDefaults {
  noiseStddev: number;
  gainDriftPercentPerHour: number;
  offsetDriftPerHour: number;
  nonlinearityFactor: number;
}

/** Keys every modality accepts */
function commonShape(defaults: CommonDefaults) {
  return {
    orientation: Vector3TupleSchema.default([0, 0, 1]),
    noise_characteristics: noiseCharacteristicsSchema(defaults.noiseStddev),
    drift_parameters: DriftParametersSchema,
    initial_operating_hours: z.number().finite().min(0).default(0),
    ambient_temperature_field: z.string().min(1).default('ambient_temperature'),

    // Calibration: gain = error_factor * (1 + drift%/100 * t), offset = base + rate * t
    calibration_gain_error_factor: z.number().finite().min(0).default(1.0),
    calibration_gain_drift_percent_per_hour: z.number().finite().default(defaults.gainDriftPercentPerHour),
    calibration_offset: z.number().finite().default(0),
    calibration_offset_drift_per_hour: z.number().finite().default(defaults.offsetDriftPerHour),
    calibration_nonlinearity_factor: z.number().finite().default(defaults.nonlinearityFactor),
  };
}

/** Default per-component response of the instrument front end */
export const DEFAULT_FREQUENCY_RESPONSE_CURVE: Spectrum = {
  fundamental: 1.0,
  '3rd': 0.95,
  '5th': 0.85,
  '7th': 0.7,
  '9th': 0.5,
  high_frequency_noise: 0.3,
};

/** Spectrum component -> response multiplier */
export const FrequencyResponseCurveSchema = z.record(SpectrumComponentSchema, z.number().finite().min(0));

/** Frequency (Hz, as a string key) -> scalar gain */
export const FrequencyGainTableSchema = z
  .record(z.string(), z.number().finite().min(0))
  .superRefine((table, ctx) => {
    for (const key of Object.keys(table)) {
      const frequency = Number(key);
      if (!Number.isFinite(frequency) || frequency <= 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Frequency key must be a positive number, got "${key}"`,
        });
      }
    }
  });

interface SpectralDefaults {
  frequencyRangeHz: [number, number];
  baseFrequency: number;
}

/** Keys for modalities that produce a harmonic spectrum */
function spectralShape(defaults: SpectralDefaults) {
  return {
    frequency_range_hz: z
      .tuple([z.number().finite().positive(), z.number().finite().positive()])
      .default(defaults.frequencyRangeHz),
    base_frequency: z.number().finite().positive().default(defaults.baseFrequency),
    enable_spectrum_output: z.boolean().default(true),

    harmonic_3_ratio: z.number().finite().min(0).default(0.1),
    harmonic_5_ratio: z.number().finite().min(0).default(0.1),
    harmonic_7_ratio: z.number().finite().min(0).default(0.1),
    harmonic_9_ratio: z.number().finite().min(0).default(0.1),
    frequency_noise: z.boolean().default(true),
    frequency_noise_stddev: z.number().finite().min(0).default(0.02),
    corona_hf_noise_factor: z.number().finite().min(0).default(0.15),

    frequency_response_curve: FrequencyResponseCurveSchema.default(DEFAULT_FREQUENCY_RESPONSE_CURVE),
    frequency_response_temp_coeff_per_10c: z.number().finite().default(0.001),
    frequency_response_ref_temp_c: z.number().finite().default(REFERENCE_TEMPERATURE_C),
    frequency_response_gain: FrequencyGainTableSchema.default({}),
    frequency_tolerance_hz: z.number().finite().min(0).default(1.0),
    default_frequency_gain: z.number().finite().min(0).default(1.0),

    axis_misalignment_effect_on_spectrum: z.boolean().default(false),
    axis_misalignment_degrees: z.number().finite().min(0).max(90).default(1.0),

    orientation_uncertainty: z.boolean().default(true),
    orientation_uncertainty_stddev: z.number().finite().min(0).default(0.05),
    apply_directional_sensitivity_to_scalar: z.boolean().default(false),
    assumed_dominant_field_direction: Vector3TupleSchema.default([0, 0, 1]),
  };
}

/** Keys for modalities coupled to nearby interference sources */
const interferenceShape = {
  emi_sources_config: z
    .object({
      radius_m: z.number().finite().positive().default(50.0),
    })
    .default({}),
  emi_frequency_coupling_factor: z.number().finite().min(0).default(1000.0),
  emi_spectrum_impact_factor: z.number().finite().min(0).default(0.1),
  emi_field_strength_impact_factor: z.number().finite().min(0).default(1.0),
  emi_field_strength_random_stddev: z.number().finite().min(0).default(0.2),
};

function refineFrequencyRange(
  config: { frequency_range_hz: [number, number]; base_frequency: number },
  ctx: z.RefinementCtx
): void {
  const [low, high] = config.frequency_range_hz;
  if (low > high) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['frequency_range_hz'],
      message: `Frequency range is inverted: [${low}, ${high}]`,
    });
  } else if (config.base_frequency < low || config.base_frequency > high) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['base_frequency'],
      message: `Base frequency ${config.base_frequency} Hz is outside [${low}, ${high}]`,
    });
  }
}

// ============================================================================
// Modality Schemas
// ============================================================================

/** AC electromagnetic field sensor */
export const EmfConfigSchema = z
  .object({
    ...commonShape({
      noiseStddev: 0.5,
      gainDriftPercentPerHour: 0.0001,
      offsetDriftPerHour: 0.01,
      nonlinearityFactor: 0.0001,
    }),
    ...spectralShape({ frequencyRangeHz: [50.0, 60.0], baseFrequency: DEFAULT_LINE_FREQUENCY_HZ }),
    ...interferenceShape,

    corona_severity_scale: severityScale(100.0),
    corona_confidence: confidence(0.9),
    arcing_severity_scale: severityScale(50.0),
    arcing_confidence: confidence(0.85),
    overload_threshold: z.number().finite().default(500.0),
    overload_confidence: confidence(0.95),
    overload_severity_scale: severityScale(1.0),
  })
  .superRefine(refineFrequencyRange);

/** Sound level meter (A-weighted) */
export const AcousticConfigSchema = z
  .object({
    ...commonShape({
      noiseStddev: 0.5,
      gainDriftPercentPerHour: 0.0001,
      offsetDriftPerHour: 0.001,
      nonlinearityFactor: 0,
    }),
    ...spectralShape({ frequencyRangeHz: [20.0, 20000.0], baseFrequency: 1000.0 }),

    arcing_severity_scale: severityScale(50.0),
    arcing_confidence: confidence(0.7),
    corona_severity_scale: severityScale(100.0),
    corona_confidence: confidence(0.6),
    overload_threshold: z.number().finite().default(120.0),
    overload_confidence: confidence(0.95),
    overload_severity_scale: severityScale(1.0),
  })
  .superRefine(refineFrequencyRange);

/** Optical particle counter */
export const ParticulateConfigSchema = z.object({
  ...commonShape({
    noiseStddev: 1.0,
    gainDriftPercentPerHour: 0.0001,
    offsetDriftPerHour: 0,
    nonlinearityFactor: 0,
  }),

  smoke_severity_scale: severityScale(100.0),
  smoke_confidence: confidence(0.8),
  pm_exceedance_threshold: z.number().finite().min(0).default(35.4),
  pm_exceedance_confidence: confidence(0.9),
  pm_exceedance_severity_scale: severityScale(1.0),
});

/** Contact or spot temperature sensor */
export const ThermalConfigSchema = z.object({
  ...commonShape({
    noiseStddev: 0.1,
    gainDriftPercentPerHour: 0.0001,
    offsetDriftPerHour: 0,
    nonlinearityFactor: 0,
  }),

  hotspot_severity_scale: severityScale(10.0),
  hotspot_confidence: confidence(0.85),
  over_temperature_threshold: z.number().finite().default(90.0),
  over_temperature_confidence: confidence(0.9),
  over_temperature_severity_scale: severityScale(1.0),
});

/** Single-species gas sensor with cross-sensitivity to other species */
export const ChemicalConfigSchema = z.object({
  ...commonShape({
    noiseStddev: 0.5,
    gainDriftPercentPerHour: 0.0001,
    offsetDriftPerHour: 0,
    nonlinearityFactor: 0,
  }),

  // Required: no safe default for which gas the sensor measures
  target_species: z.string().min(1),
  cross_sensitivity: z.record(z.string().min(1), z.number().finite()).default({}),

  gas_leak_severity_scale: severityScale(1.0),
  gas_leak_confidence: confidence(0.8),
  exposure_limit_threshold: z.number().finite().min(0).default(50.0),
  exposure_limit_confidence: confidence(0.9),
  exposure_limit_severity_scale: severityScale(1.0),
});

// ============================================================================
// Scenario Schemas
// ============================================================================

/** Modality tag */
export const ModalitySchema = z.enum(MODALITIES);

/** One sensor to instantiate */
export const SensorDefinitionSchema = z.object({
  id: z.string().min(1),
  modality: ModalitySchema,
  position: Position3DSchema,
  enabled: z.boolean().default(true),
  config: z.record(z.unknown()).default({}),
});

/** Scenario driver settings */
export const ScenarioConfigSchema = z
  .object({
    seed: z.union([z.string().min(1), z.number().int()]).default(DEFAULT_SEED),
    startTimeUsec: z.number().int().min(0).default(0),
    stepSeconds: z.number().finite().positive().default(1),
    steps: z.number().int().positive().default(1),
    concurrency: z.number().int().positive().default(DEFAULT_CONCURRENCY),
    sensors: z.array(SensorDefinitionSchema).default([]),
  })
  .superRefine((scenario, ctx) => {
    const seen = new Set<string>();
    scenario.sensors.forEach((sensor, index) => {
      if (seen.has(sensor.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sensors', index, 'id'],
          message: `Duplicate sensor id "${sensor.id}"`,
        });
      }
      seen.add(sensor.id);
    });
  });

// ============================================================================
// TypeScript Type Exports
// ============================================================================

export type Vector3Tuple = z.infer<typeof Vector3TupleSchema>;
export type NoiseCharacteristics = z.infer<ReturnType<typeof noiseCharacteristicsSchema>>;
export type DriftParameters = z.infer<typeof DriftParametersSchema>;
export type FrequencyResponseCurve = z.infer<typeof FrequencyResponseCurveSchema>;
export type FrequencyGainTable = z.infer<typeof FrequencyGainTableSchema>;
export type EmfConfig = z.infer<typeof EmfConfigSchema>;
export type AcousticConfig = z.infer<typeof AcousticConfigSchema>;
export type ParticulateConfig = z.infer<typeof ParticulateConfigSchema>;
export type ThermalConfig = z.infer<typeof ThermalConfigSchema>;
export type ChemicalConfig = z.infer<typeof ChemicalConfigSchema>;
export type SensorDefinition = z.infer<typeof SensorDefinitionSchema>;
export type SensorDefinitionInput = z.input<typeof SensorDefinitionSchema>;
export type ScenarioConfig = z.infer<typeof ScenarioConfigSchema>;
export type ScenarioConfigInput = z.input<typeof ScenarioConfigSchema>;

/** Resolved config type for each modality */
export interface SensorConfigByModality {
  emf: EmfConfig;
  acoustic: AcousticConfig;
  particulate: ParticulateConfig;
  thermal: ThermalConfig;
  chemical: ChemicalConfig;
}

/** Any resolved sensor config */
export type SensorConfig = SensorConfigByModality[Modality];

/** Spectral modalities share these keys */
export type SpectralConfig = EmfConfig | AcousticConfig;

/** Schema lookup by modality */
export const SENSOR_CONFIG_SCHEMAS: {
  [M in Modality]: z.ZodType<SensorConfigByModality[M], z.ZodTypeDef, unknown>;
} = {
  emf: EmfConfigSchema,
  acoustic: AcousticConfigSchema,
  particulate: ParticulateConfigSchema,
  thermal: ThermalConfigSchema,
  chemical: ChemicalConfigSchema,
};

