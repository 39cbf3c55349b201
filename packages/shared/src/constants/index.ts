/**
 * Physical and application constants
 */

import type { HarmonicComponent, HarmonicOrder, SpectrumComponent } from '../types/index.js';

// ============================================================================
// Physical Constants
// ============================================================================

/** Absolute zero (°C) */
export const ABSOLUTE_ZERO_C = -273.15;

/** Reference temperature for instrument response curves (°C) */
export const REFERENCE_TEMPERATURE_C = 25.0;

/** Upper bound of physically meaningful sound pressure level (dB) */
export const MAX_SPL_DB = 194;

/** Nominal power line frequency (Hz) */
export const DEFAULT_LINE_FREQUENCY_HZ = 60.0;

// ============================================================================
// Calculation Constants
// ============================================================================

/** Small epsilon for floating point comparisons */
export const EPSILON = 1e-10;

/** Vectors shorter than this are treated as zero-length */
export const MIN_VECTOR_LENGTH = 1e-9;

/** Seconds per hour */
export const SECONDS_PER_HOUR = 3600;

/** Microseconds per second */
export const USEC_PER_SECOND = 1_000_000;

// ============================================================================
// Spectrum Layout
// ============================================================================

/** Harmonic orders modelled by frequency analysis */
export const HARMONIC_ORDERS = [3, 5, 7, 9] as const satisfies readonly HarmonicOrder[];

/** Spectrum slot name for each harmonic order */
export const HARMONIC_COMPONENTS: Record<HarmonicOrder, HarmonicComponent> = {
  3: '3rd',
  5: '5th',
  7: '7th',
  9: '9th',
};

/** Every spectrum slot in display order */
export const SPECTRUM_COMPONENTS = [
  'fundamental',
  '3rd',
  '5th',
  '7th',
  '9th',
  'high_frequency_noise',
  'emi_noise_floor',
] as const satisfies readonly SpectrumComponent[];

// ============================================================================
// Scenario Defaults
// ============================================================================

/** Default number of sensors processed concurrently per timestep */
export const DEFAULT_CONCURRENCY = 8;

/** Default scenario seed */
export const DEFAULT_SEED = 'sensim';
