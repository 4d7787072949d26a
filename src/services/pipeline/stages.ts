/**
 * Tagged stage results
 *
 * Each stage resolves to a StageOutcome instead of throwing; the
 * orchestrator switches on `kind` to pick the next status transition.
 *
 * @module services/pipeline/stages
 */

import { classifyStageError, type PipelineStage } from './errors.js';

export type StageOutcome<T> =
  | { kind: 'success'; stage: PipelineStage; artifact: T }
  | { kind: 'transient'; stage: PipelineStage; error: Error }
  | { kind: 'terminal'; stage: PipelineStage; error: Error };

export type StageFailure = Exclude<StageOutcome<never>, { kind: 'success' }>;

/**
 * Run a stage body and convert whatever it throws into a failure outcome
 */
export async function runStage<T>(stage: PipelineStage, body: () => Promise<T>): Promise<StageOutcome<T>> {
  try {
    return { kind: 'success', stage, artifact: await body() };
  } catch (error) {
    const classified = classifyStageError(stage, error);
    return classified.category === 'TRANSIENT_STAGE_ERROR'
      ? { kind: 'transient', stage, error: classified }
      : { kind: 'terminal', stage, error: classified };
  }
}
