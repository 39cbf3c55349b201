/**
 * Ground-truth evaluation
 *
 * Labels come from the environment state (state conditions) or from the
 * observed primary value (threshold conditions). Evaluation reads fresh from
 * the environment on every call and never throws on a query miss.
 */

import type { Position3D } from '@sensim/core';
import type { SafeEnvironment } from '@sensim/environment';
import type { AnomalyLabel } from '../api/index.js';

// ============================================================================
// Conditions
// ============================================================================

/** Label present while an environment field is positive */
export interface StateCondition {
  kind: 'state';
  label: string;
  field: string;
  /** severity = raw field value * severityScale */
  severityScale: number;
  confidence: number;
}

/** Label present while the observed value exceeds a threshold */
export interface ThresholdCondition {
  kind: 'threshold';
  label: string;
  threshold: number;
  /** Constant severity */
  severityScale: number;
  confidence: number;
}

export type GroundTruthCondition = StateCondition | ThresholdCondition;

// ============================================================================
// Evaluation
// ============================================================================

function evaluateState(
  condition: StateCondition,
  env: SafeEnvironment,
  position: Position3D
): AnomalyLabel | undefined {
  const raw = env.getNumber(condition.field, position);
  if (raw === undefined || raw === 0) return undefined;
  if (raw < 0) {
    env.warn({
      code: 'ENV_VALUE_INVALID',
      message: `Condition field "${condition.field}" is negative (${raw}); treated as absent`,
      severity: 'warning',
      context: { field: condition.field, label: condition.label },
    });
    return undefined;
  }
  return { type: condition.label, severity: raw * condition.severityScale, confidence: condition.confidence };
}

/**
 * Evaluate every condition independently. Threshold conditions are skipped
 * when no observed value is supplied. Labels keep condition order; there is
 * no merging or suppression.
 */
export function evaluateGroundTruth(
  conditions: readonly GroundTruthCondition[],
  env: SafeEnvironment,
  position: Position3D,
  observedValue?: number
): AnomalyLabel[] {
  const labels: AnomalyLabel[] = [];

  for (const condition of conditions) {
    if (condition.kind === 'state') {
      const label = evaluateState(condition, env, position);
      if (label) labels.push(label);
    } else if (observedValue !== undefined && observedValue > condition.threshold) {
      labels.push({ type: condition.label, severity: condition.severityScale, confidence: condition.confidence });
    }
  }

  return labels;
}
