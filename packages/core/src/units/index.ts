/**
 * Physical units and conversions for instrument models
 */

import {
  REFERENCE_TEMPERATURE_C,
  SECONDS_PER_HOUR,
  USEC_PER_SECOND,
  hours,
  type Hours,
} from '@sensim/shared';

// ============================================================================
// Time
// ============================================================================

/** Microseconds per hour */
export const USEC_PER_HOUR = SECONDS_PER_HOUR * USEC_PER_SECOND;

/**
 * Convert a microsecond duration to hours
 */
export function usecToHours(durationUsec: number): Hours {
  return hours(durationUsec / USEC_PER_HOUR);
}

// ============================================================================
// Temperature
// ============================================================================

/**
 * Temperature correction of a response multiplier
 * Multiplier scales by `coeffPer10C` for every 10 °C away from the reference.
 * @param coeffPer10C - Fractional change per 10 °C
 * @param temperatureC - Current temperature in Celsius
 * @param referenceC - Temperature at which the base curve was measured
 */
export function temperatureCorrection(
  coeffPer10C: number,
  temperatureC: number,
  referenceC: number = REFERENCE_TEMPERATURE_C
): number {
  return 1 + (coeffPer10C * (temperatureC - referenceC)) / 10;
}
