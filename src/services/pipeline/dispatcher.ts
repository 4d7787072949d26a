/**
 * Pipeline dispatcher
 *
 * Runs many documents through the orchestrator with a fixed number of
 * workers. One document's failure is reported in its own result and never
 * affects the others.
 *
 * @module services/pipeline/dispatcher
 */

import type { DocumentStatusModel } from '../status/status-model.js';
import { PipelineError, errorMessage } from './errors.js';
import type { PipelineOrchestrator, RunOptions, RunOutcome } from './orchestrator.js';

export interface DispatchResult {
  documentId: string;
  /** 'rejected' when the run could not start (claim refused, unknown document) */
  outcome: RunOutcome | 'rejected';
  error: string | null;
  durationMs: number;
}

export interface BatchResult {
  processed: number;
  requeued: number;
  failed: number;
  rejected: number;
  totalDurationMs: number;
  results: DispatchResult[];
}

export class PipelineDispatcher {
  private readonly concurrency: number;

  constructor(
    private readonly orchestrator: PipelineOrchestrator,
    private readonly statusModel: DocumentStatusModel,
    concurrency?: number
  ) {
    this.concurrency = Math.max(1, concurrency ?? orchestrator.config.concurrency);
  }

  /**
   * Run each document id once. Results keep the input order.
   */
  async runMany(documentIds: readonly string[], options: RunOptions = {}): Promise<BatchResult> {
    const startTime = Date.now();
    const results: DispatchResult[] = new Array<DispatchResult>(documentIds.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < documentIds.length) {
        const index = next++;
        results[index] = await this.runOne(documentIds[index], options);
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, documentIds.length) }, () => worker());
    await Promise.all(workers);

    const count = (outcome: DispatchResult['outcome']): number =>
      results.filter((r) => r.outcome === outcome).length;

    const batch: BatchResult = {
      processed: count('done'),
      requeued: count('requeued'),
      failed: count('failed'),
      rejected: count('rejected'),
      totalDurationMs: Date.now() - startTime,
      results,
    };
    console.error(
      `[Dispatcher] ${documentIds.length} documents: ${batch.processed} done, ${batch.requeued} requeued, ` +
        `${batch.failed} failed, ${batch.rejected} rejected in ${batch.totalDurationMs}ms`
    );
    return batch;
  }

  /**
   * Run every document that is currently ready
   */
  async runPending(options: RunOptions = {}): Promise<BatchResult> {
    const ready = this.statusModel.listDocuments({ textExtractionStatus: 'ready' });
    return this.runMany(
      ready.map((doc) => doc.id),
      options
    );
  }

  private async runOne(documentId: string, options: RunOptions): Promise<DispatchResult> {
    const startTime = Date.now();
    try {
      const result = await this.orchestrator.runPipeline(documentId, options);
      return { documentId, outcome: result.outcome, error: result.error, durationMs: result.durationMs };
    } catch (error) {
      const message = errorMessage(error);
      if (!(error instanceof PipelineError)) {
        console.error(`[Dispatcher] [ERROR] Unexpected failure for ${documentId}: ${message}`);
      }
      return { documentId, outcome: 'rejected', error: message, durationMs: Date.now() - startTime };
    }
  }
}
