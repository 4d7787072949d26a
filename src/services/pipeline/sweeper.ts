/**
 * Stale job sweeper
 *
 * Reclaims runs that died without settling (worker crash, killed process):
 * an open job whose document is still in_progress and that nobody has
 * touched for longer than the threshold is failed with a system message.
 * Jobs waiting in a ready document are left alone.
 *
 * @module services/pipeline/sweeper
 */

import type { DocumentStatusModel } from '../status/status-model.js';
import { errorMessage } from './errors.js';

export interface ReclaimedJob {
  documentId: string;
  jobId: string;
  ageMs: number;
}

export interface SweepResult {
  reclaimed: ReclaimedJob[];
  /** Jobs that could not be reclaimed, e.g. because their run settled meanwhile */
  skipped: Array<{ jobId: string; reason: string }>;
}

export function reclaimStaleJobs(
  statusModel: DocumentStatusModel,
  staleJobMs: number,
  now: Date = new Date()
): SweepResult {
  const result: SweepResult = { reclaimed: [], skipped: [] };

  for (const stale of statusModel.findStaleJobs(staleJobMs, now)) {
    const { job } = stale;
    if (stale.textExtractionStatus !== 'in_progress') continue;

    const message = `Run abandoned: job ${job.id} untouched for ${Math.round(stale.ageMs / 1000)}s, reclaimed by sweeper`;
    try {
      statusModel.failDocument(job.document_id, message);
      result.reclaimed.push({ documentId: job.document_id, jobId: job.id, ageMs: stale.ageMs });
      console.error(`[Sweeper] [WARN] Reclaimed ${job.document_id}: ${message}`);
    } catch (error) {
      result.skipped.push({ jobId: job.id, reason: errorMessage(error) });
      console.error(`[Sweeper] Could not reclaim job ${job.id}: ${errorMessage(error)}`);
    }
  }

  if (result.reclaimed.length > 0) {
    console.error(`[Sweeper] [INFO] Reclaimed ${result.reclaimed.length} stale job(s)`);
  }
  return result;
}
