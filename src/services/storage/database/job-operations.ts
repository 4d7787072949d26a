/**
 * Extraction job ledger operations for DatabaseService
 *
 * Jobs are append-only: rows are never deleted, and a terminal job is never
 * updated again. Every update is guarded by `status = 'pending_extraction'`.
 */

import Database from 'better-sqlite3';
import type { ExtractionJob } from '../../../models/document.js';
import { parseTextStatus, rowToJob } from './converters.js';
import { runWithConstraintCheck } from './helpers.js';
import type { JobRow, OpenJobRecord } from './types.js';

/**
 * Insert a pending job. Fails with CONSTRAINT_VIOLATION when the document
 * already has one (idx_extraction_jobs_active).
 */
export function insertJob(db: Database.Database, id: string, documentId: string, now: string): ExtractionJob {
  const stmt = db.prepare(`
    INSERT INTO extraction_jobs (id, document_id, status, error_message, attempt_count,
      created_at, updated_at, completed_at)
    VALUES (?, ?, 'pending_extraction', NULL, 0, ?, ?, NULL)
  `);
  runWithConstraintCheck(stmt, [id, documentId, now, now], `inserting job for document ${documentId}`);

  return {
    id,
    document_id: documentId,
    status: 'pending_extraction',
    error_message: null,
    attempt_count: 0,
    created_at: now,
    updated_at: now,
    completed_at: null,
  };
}

export function getJob(db: Database.Database, id: string): ExtractionJob | null {
  const row = db.prepare('SELECT * FROM extraction_jobs WHERE id = ?').get(id) as JobRow | undefined;
  return row ? rowToJob(row) : null;
}

/**
 * The document's non-terminal job, if any
 */
export function getActiveJob(db: Database.Database, documentId: string): ExtractionJob | null {
  const row = db
    .prepare(`SELECT * FROM extraction_jobs WHERE document_id = ? AND status = 'pending_extraction'`)
    .get(documentId) as JobRow | undefined;
  return row ? rowToJob(row) : null;
}

/**
 * All jobs for a document, oldest first. rowid breaks created_at ties.
 */
export function listJobs(db: Database.Database, documentId: string): ExtractionJob[] {
  const rows = db
    .prepare('SELECT * FROM extraction_jobs WHERE document_id = ? ORDER BY created_at ASC, rowid ASC')
    .all(documentId) as JobRow[];
  return rows.map(rowToJob);
}

export function getLatestJob(db: Database.Database, documentId: string): ExtractionJob | null {
  const row = db
    .prepare(
      'SELECT * FROM extraction_jobs WHERE document_id = ? ORDER BY created_at DESC, rowid DESC LIMIT 1'
    )
    .get(documentId) as JobRow | undefined;
  return row ? rowToJob(row) : null;
}

/**
 * @returns false when the job is missing or already terminal
 */
export function completeJob(db: Database.Database, id: string, now: string): boolean {
  const stmt = db.prepare(`
    UPDATE extraction_jobs SET status = 'done', completed_at = ?, updated_at = ?
    WHERE id = ? AND status = 'pending_extraction'
  `);
  return runWithConstraintCheck(stmt, [now, now, id], `completing job ${id}`).changes === 1;
}

/**
 * @returns false when the job is missing or already terminal
 */
export function failJob(db: Database.Database, id: string, message: string, now: string): boolean {
  const stmt = db.prepare(`
    UPDATE extraction_jobs SET status = 'failed', error_message = ?, completed_at = ?, updated_at = ?
    WHERE id = ? AND status = 'pending_extraction'
  `);
  return runWithConstraintCheck(stmt, [message, now, now, id], `failing job ${id}`).changes === 1;
}

/**
 * Count a retryable failure against the job and keep it pending
 */
export function recordAttempt(db: Database.Database, id: string, message: string, now: string): boolean {
  const stmt = db.prepare(`
    UPDATE extraction_jobs SET attempt_count = attempt_count + 1, error_message = ?, updated_at = ?
    WHERE id = ? AND status = 'pending_extraction'
  `);
  return runWithConstraintCheck(stmt, [message, now, id], `recording attempt on job ${id}`).changes === 1;
}

/**
 * Mark the job as picked up by a run
 */
export function touchJob(db: Database.Database, id: string, now: string): boolean {
  const stmt = db.prepare(
    `UPDATE extraction_jobs SET updated_at = ? WHERE id = ? AND status = 'pending_extraction'`
  );
  return stmt.run(now, id).changes === 1;
}

/**
 * Jobs with no completed_at whose last update is before `cutoff`
 */
export function findOpenJobsBefore(db: Database.Database, cutoff: string): OpenJobRecord[] {
  const rows = db
    .prepare(
      `
      SELECT j.*, d.text_extraction_status AS doc_text_status
      FROM extraction_jobs j JOIN documents d ON d.id = j.document_id
      WHERE j.completed_at IS NULL AND j.updated_at < ?
      ORDER BY j.updated_at ASC, j.rowid ASC
    `
    )
    .all(cutoff) as Array<JobRow & { doc_text_status: string }>;

  return rows.map((row) => {
    const job = rowToJob(row);
    return { job, textExtractionStatus: parseTextStatus(row.doc_text_status, row.document_id) };
  });
}
