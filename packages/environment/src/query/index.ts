/**
 * Environment query contract
 *
 * The environment is an external, read-only spatial field. Sensors consume it
 * through `SafeEnvironment`, which turns misses into absent values plus
 * sample warnings so that no query can abort a sample.
 */

import type { Position3D, Vector3 } from '@sensim/core';
import { isValidNumber, silentLogger, type Logger, type SampleWarning } from '@sensim/shared';

// ============================================================================
// Types
// ============================================================================

/** A field value: scalar magnitude or vector */
export type FieldValue = number | Vector3;

/** A nearby emitter that couples into the sensing band */
export interface InterferenceSource {
  position: Position3D;
  /** Hz */
  frequency: number;
  strength: number;
}

/** Read-only environment state at the current timestep */
export interface EnvironmentQuery {
  /** Current value of a named field, or null/undefined if it has no value here */
  getFieldValue(fieldName: string, position: Position3D): FieldValue | null | undefined;
  /** Interference sources within `radius` meters */
  getNearbySources(position: Position3D, radius: number): InterferenceSource[];
}

/** Why a query could not be answered */
export type QueryMissReason = 'unknown_field' | 'out_of_range' | 'unavailable';

/**
 * A field or position the environment cannot resolve
 */
export class EnvironmentQueryMiss extends Error {
  constructor(
    public readonly reason: QueryMissReason,
    public readonly fieldName: string | undefined,
    public readonly position: Position3D
  ) {
    super(
      `Environment query miss (${reason})${fieldName ? ` for "${fieldName}"` : ''} at ` +
        `(${position.x}, ${position.y}, ${position.z})`
    );
    this.name = 'EnvironmentQueryMiss';
  }
}

/** Check whether a field value is a vector */
export function isVectorValue(value: FieldValue): value is Vector3 {
  return typeof value === 'object' && value !== null;
}

// ============================================================================
// Safe Adapter
// ============================================================================

/**
 * Wraps an EnvironmentQuery for one sample. Misses and malformed values
 * become `undefined` (or an empty source list) and are recorded as warnings.
 * Errors other than EnvironmentQueryMiss propagate.
 */
export class SafeEnvironment {
  private readonly warnings: SampleWarning[] = [];

  constructor(
    private readonly env: EnvironmentQuery,
    private readonly log: Logger = silentLogger
  ) {}

  /** Warnings recorded so far */
  get collectedWarnings(): readonly SampleWarning[] {
    return this.warnings;
  }

  /** Record a warning raised outside the adapter (stages, evaluator) */
  warn(warning: SampleWarning): void {
    this.warnings.push(warning);
    this.log.debug(warning.message, { code: warning.code, ...warning.context });
  }

  /** Raw field value, or undefined on a miss */
  getField(fieldName: string, position: Position3D): FieldValue | undefined {
    try {
      return this.env.getFieldValue(fieldName, position) ?? undefined;
    } catch (error) {
      if (error instanceof EnvironmentQueryMiss) {
        this.warn({
          code: 'ENV_FIELD_MISSING',
          message: error.message,
          severity: 'info',
          context: { field: fieldName, reason: error.reason },
        });
        return undefined;
      }
      throw error;
    }
  }

  /** Finite scalar field value, or undefined */
  getNumber(fieldName: string, position: Position3D): number | undefined {
    const value = this.getField(fieldName, position);
    if (value === undefined) return undefined;
    if (isVectorValue(value) || !isValidNumber(value)) {
      this.warn({
        code: 'ENV_VALUE_INVALID',
        message: `Field "${fieldName}" is not a finite scalar`,
        severity: 'warning',
        context: { field: fieldName },
      });
      return undefined;
    }
    return value;
  }

  /** Finite vector field value, or undefined */
  getVector(fieldName: string, position: Position3D): Vector3 | undefined {
    const value = this.getField(fieldName, position);
    if (value === undefined) return undefined;
    if (!isVectorValue(value) || ![value.x, value.y, value.z].every(isValidNumber)) {
      this.warn({
        code: 'ENV_VALUE_INVALID',
        message: `Field "${fieldName}" is not a finite vector`,
        severity: 'warning',
        context: { field: fieldName },
      });
      return undefined;
    }
    return value;
  }

  /** Well-formed interference sources, or an empty list on a miss */
  getNearbySources(position: Position3D, radius: number): InterferenceSource[] {
    let sources: InterferenceSource[];
    try {
      sources = this.env.getNearbySources(position, radius);
    } catch (error) {
      if (error instanceof EnvironmentQueryMiss) {
        this.warn({
          code: 'ENV_SOURCES_UNAVAILABLE',
          message: error.message,
          severity: 'info',
          context: { radius, reason: error.reason },
        });
        return [];
      }
      throw error;
    }

    return sources.filter((source, index) => {
      const valid =
        [source.position.x, source.position.y, source.position.z, source.frequency, source.strength].every(
          isValidNumber
        ) &&
        source.frequency > 0 &&
        source.strength >= 0;
      if (!valid) {
        this.warn({
          code: 'SOURCE_SKIPPED',
          message: `Interference source #${index} has invalid position, frequency or strength`,
          severity: 'warning',
          context: { index },
        });
      }
      return valid;
    });
  }
}
