/**
 * Aggregate counts for DatabaseService
 */

import Database from 'better-sqlite3';
import { parseProcessingStatus, parseTextStatus } from './converters.js';
import type { DatabaseCounts } from './types.js';

interface StatusCountRow {
  text_extraction_status: string;
  processing_status: string;
  n: number;
}

export function getCounts(db: Database.Database): DatabaseCounts {
  const documentsByText: DatabaseCounts['documentsByText'] = {
    not_ready: 0,
    ready: 0,
    in_progress: 0,
    completed: 0,
    failed: 0,
  };
  const documentsByProcessing: DatabaseCounts['documentsByProcessing'] = {
    pending_extraction: 0,
    ocr_running: 0,
    llm_running: 0,
    done: 0,
    failed: 0,
  };

  const rows = db
    .prepare(
      `SELECT text_extraction_status, processing_status, COUNT(*) AS n
       FROM documents GROUP BY text_extraction_status, processing_status`
    )
    .all() as StatusCountRow[];

  let documents = 0;
  for (const row of rows) {
    documents += row.n;
    documentsByText[parseTextStatus(row.text_extraction_status, 'stats')] += row.n;
    documentsByProcessing[parseProcessingStatus(row.processing_status, 'stats')] += row.n;
  }

  const jobs = db
    .prepare('SELECT COUNT(*) AS total, SUM(completed_at IS NULL) AS open FROM extraction_jobs')
    .get() as { total: number; open: number | null };

  return {
    documents,
    documentsByText,
    documentsByProcessing,
    jobs: jobs.total,
    openJobs: jobs.open ?? 0,
  };
}
