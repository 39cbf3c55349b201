/**
 * Modality definition contract
 */

import type { Position3D, ResolvedSensorConfig } from '@sensim/core';
import type { SafeEnvironment } from '@sensim/environment';
import type { Modality } from '@sensim/shared';
import type { IdealReading } from '../api/index.js';
import type { GroundTruthCondition } from '../groundTruth/index.js';
import type { ImperfectionStage, ValueRange } from '../stages/index.js';

/**
 * Everything that distinguishes one modality from another. A sensor is a
 * definition plus a resolved config, identity and position.
 */
export interface ModalityDefinition<M extends Modality> {
  modality: M;
  /** Name of the primary observed quantity */
  quantity: string;
  unit: string;
  range: ValueRange;
  /** Subset of the stage library, in canonical order */
  stages: readonly ImperfectionStage<ResolvedSensorConfig<M>>[];
  readIdeal(env: SafeEnvironment, position: Position3D, config: ResolvedSensorConfig<M>): IdealReading;
  conditions(config: ResolvedSensorConfig<M>): GroundTruthCondition[];
  /** Derive observed secondary channels from the corrupted primary value */
  finalizeChannels?(ideal: IdealReading, observedValue: number): Record<string, number> | undefined;
}
