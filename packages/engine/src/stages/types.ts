/**
 * Imperfection stage contract
 */

import type { Position3D } from '@sensim/core';
import type { SafeEnvironment } from '@sensim/environment';
import type { RandomStream } from '@sensim/shared';
import type { ReadingState } from '../api/index.js';

// ============================================================================
// Stage Identity
// ============================================================================

/** Stage ids in canonical execution order */
export const STAGE_ORDER = [
  'frequency_analysis',
  'frequency_response',
  'axis_misalignment',
  'directional_sensitivity',
  'cross_sensitivity',
  'interference_coupling',
  'calibration_drift',
  'general_drift',
  'noise_injection',
] as const;

export type StageId = (typeof STAGE_ORDER)[number];

/** Position of a stage in the canonical order */
export function stageRank(id: StageId): number {
  return STAGE_ORDER.indexOf(id);
}

// ============================================================================
// Stage Contract
// ============================================================================

/** Inputs a stage may read besides the reading and config */
export interface StageContext {
  env: SafeEnvironment;
  position: Position3D;
  elapsedHours: number;
  /** Stream owned by this stage for this sample */
  random: RandomStream;
}

/**
 * One imperfection effect.
 * `apply` returns a new state and never mutates its input.
 */
export interface ImperfectionStage<C> {
  readonly id: StageId;
  apply(state: ReadingState, config: C, context: StageContext): ReadingState;
}

// ============================================================================
// Errors
// ============================================================================

/**
 * A stage produced an undefined or non-finite result (zero-length vector,
 * zero denominator, overflow). The pipeline recovers by skipping the stage.
 */
export class NumericDegeneracy extends Error {
  constructor(
    public readonly stage: StageId,
    message: string
  ) {
    super(`${stage}: ${message}`);
    this.name = 'NumericDegeneracy';
  }
}
