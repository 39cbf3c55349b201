/**
 * Imperfection pipeline runner
 *
 * Threads a reading through a modality's stages in canonical order. After
 * every stage the primary value is clamped to the modality's physical range
 * and spectrum entries are floored at 0. A stage that raises
 * NumericDegeneracy is skipped: the pre-stage state is kept and a sample
 * warning is recorded.
 */

import { ConfigError } from '@sensim/core';
import { clamp, silentLogger, type Logger } from '@sensim/shared';
import type { ReadingState } from '../api/index.js';
import { mapSpectrum } from './spectral.js';
import {
  NumericDegeneracy,
  STAGE_ORDER,
  stageRank,
  type ImperfectionStage,
  type StageContext,
  type StageId,
} from './types.js';

/** Physically meaningful range of a primary value */
export interface ValueRange {
  min: number;
  max: number;
}

/**
 * Check that stage ids follow the canonical order without repeats
 * @throws ConfigError on an out-of-order or duplicated stage
 */
export function validateStageOrder(ids: readonly StageId[]): void {
  for (let i = 1; i < ids.length; i++) {
    const previous = ids[i - 1];
    const current = ids[i];
    if (previous !== undefined && current !== undefined && stageRank(current) <= stageRank(previous)) {
      throw new ConfigError('pipeline', [
        {
          path: String(i),
          message: `Stage "${current}" cannot follow "${previous}"; order is ${STAGE_ORDER.join(' > ')}`,
        },
      ]);
    }
  }
}

function assertFinite(stage: StageId, state: ReadingState): void {
  if (!Number.isFinite(state.value)) {
    throw new NumericDegeneracy(stage, `primary value became ${state.value}`);
  }
  if (state.spectrum) {
    for (const [component, magnitude] of Object.entries(state.spectrum)) {
      if (magnitude !== undefined && !Number.isFinite(magnitude)) {
        throw new NumericDegeneracy(stage, `spectrum entry "${component}" became ${magnitude}`);
      }
    }
  }
}

export class ImperfectionPipeline<C> {
  private readonly log: Logger;

  constructor(
    readonly stages: readonly ImperfectionStage<C>[],
    readonly range: ValueRange,
    logger: Logger = silentLogger
  ) {
    validateStageOrder(stages.map((stage) => stage.id));
    this.log = logger.child({ component: 'pipeline' });
  }

  get stageIds(): StageId[] {
    return this.stages.map((stage) => stage.id);
  }

  /**
   * Run every stage over `initial`
   */
  run(initial: ReadingState, config: C, context: StageContext): ReadingState {
    let state = this.sanitize(initial);

    for (const stage of this.stages) {
      try {
        const next = stage.apply(state, config, { ...context, random: context.random.fork(stage.id) });
        assertFinite(stage.id, next);
        state = this.sanitize(next);
      } catch (error) {
        if (!(error instanceof NumericDegeneracy)) throw error;
        this.log.warn('Stage skipped after numeric degeneracy', { stage: stage.id, reason: error.message });
        context.env.warn({
          code: 'NUMERIC_DEGENERACY',
          message: error.message,
          severity: 'warning',
          context: { stage: stage.id },
        });
      }
    }

    return state;
  }

  private sanitize(state: ReadingState): ReadingState {
    return {
      ...state,
      value: clamp(state.value, this.range.min, this.range.max),
      spectrum: state.spectrum && mapSpectrum(state.spectrum, (magnitude) => Math.max(0, magnitude)),
    };
  }
}
