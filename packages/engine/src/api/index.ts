/**
 * Sensor API - readings, labels and samples shared by every modality
 */

import type { Position3D, Vector3 } from '@sensim/core';
import type { Modality, RandomStream, SampleWarning, Spectrum } from '@sensim/shared';

// ============================================================================
// Readings
// ============================================================================

/** True physical quantity at the sensor position */
export interface IdealReading {
  /** Primary scalar magnitude */
  value: number;
  /** Field vector, when the environment provides one */
  vector?: Vector3;
  /** Dominant frequency of the field (Hz) */
  dominantFrequencyHz?: number;
  /** Secondary channels (e.g. pm1_0, pm10_0) */
  channels?: Record<string, number>;
}

/** State threaded through the imperfection stages */
export interface ReadingState {
  value: number;
  vector?: Vector3;
  dominantFrequencyHz: number;
  spectrum?: Spectrum;
}

/** Reading as reported by the instrument */
export interface ObservedReading {
  quantity: string;
  unit: string;
  value: number;
  spectrum?: Spectrum;
  channels?: Record<string, number>;
}

/** Calibration error at a given operating age */
export interface DriftState {
  gain: number;
  offset: number;
  elapsedHours: number;
}

/** Ground-truth anomaly annotation */
export interface AnomalyLabel {
  type: string;
  /** >= 0 */
  severity: number;
  /** In [0, 1] */
  confidence: number;
}

// ============================================================================
// Sampling
// ============================================================================

/** Per-sample inputs supplied by the caller */
export interface SampleContext {
  timestampUsec: number;
  /** Hours since the run started; the sensor adds its initial operating hours */
  elapsedHours: number;
  /** Stream owned by this sample */
  random: RandomStream;
}

/** One labeled sample */
export interface Sample {
  sensorId: string;
  timestampUsec: number;
  position: Position3D;
  modality: Modality;
  observed: ObservedReading;
  groundTruth: AnomalyLabel[];
  warnings: SampleWarning[];
}

/** Sample output record (snake_case external format) */
export interface SampleRecord {
  sensor_id: string;
  timestamp_usec: number;
  position: Position3D;
  modality: Modality;
  observed_reading: ObservedReading;
  ground_truth: Array<{ anomaly_type: string; severity: number; confidence: number }>;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Convert a sample to its output record
 */
export function toSampleRecord(sample: Sample): SampleRecord {
  const observed: ObservedReading = {
    quantity: sample.observed.quantity,
    unit: sample.observed.unit,
    value: sample.observed.value,
  };
  if (sample.observed.spectrum) observed.spectrum = { ...sample.observed.spectrum };
  if (sample.observed.channels) observed.channels = { ...sample.observed.channels };

  return {
    sensor_id: sample.sensorId,
    timestamp_usec: sample.timestampUsec,
    position: { ...sample.position },
    modality: sample.modality,
    observed_reading: observed,
    ground_truth: sample.groundTruth.map((label) => ({
      anomaly_type: label.type,
      severity: label.severity,
      confidence: label.confidence,
    })),
  };
}
