/**
 * Shared type definitions
 */

// ============================================================================
// Modalities
// ============================================================================

/** Sensing modalities supported by the engine */
export type Modality = 'emf' | 'acoustic' | 'particulate' | 'thermal' | 'chemical';

/** All modalities, in registry order */
export const MODALITIES = ['emf', 'acoustic', 'particulate', 'thermal', 'chemical'] as const satisfies readonly Modality[];

// ============================================================================
// Spectrum Types
// ============================================================================

/** Odd harmonic orders tracked in a spectrum */
export type HarmonicOrder = 3 | 5 | 7 | 9;

/** Named harmonic spectrum slots */
export type HarmonicComponent = '3rd' | '5th' | '7th' | '9th';

/** Named spectrum slots */
export type SpectrumComponent =
  | 'fundamental'
  | HarmonicComponent
  | 'high_frequency_noise'
  | 'emi_noise_floor';

/** Spectrum: component name -> non-negative magnitude */
export type Spectrum = Partial<Record<SpectrumComponent, number>>;

// ============================================================================
// Unit Types (Branded for type safety)
// ============================================================================

/** Elapsed operating time in hours */
export type Hours = number & { readonly __brand: 'Hours' };

// ============================================================================
// Result Types
// ============================================================================

/** Warning severity levels */
export type WarningSeverity = 'info' | 'warning' | 'error';

/** Warning codes raised while producing a sample */
export type WarningCode =
  | 'ENV_FIELD_MISSING'
  | 'ENV_SOURCES_UNAVAILABLE'
  | 'ENV_VALUE_INVALID'
  | 'NUMERIC_DEGENERACY'
  | 'SOURCE_SKIPPED';

/** Warning attached to a sample; never fatal */
export interface SampleWarning {
  code: WarningCode;
  message: string;
  severity: WarningSeverity;
  context?: Record<string, unknown>;
}

/** Timing information for performance diagnostics */
export interface RunTimings {
  totalMs: number;
  stepCount: number;
  sampleCount: number;
}

// ============================================================================
// Helper creators
// ============================================================================

/** Create a branded Hours value */
export function hours(value: number): Hours {
  return value as Hours;
}
