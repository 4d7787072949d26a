/**
 * Document operations for DatabaseService
 *
 * Status columns change only through compareAndSetStatus, which succeeds
 * when the row still holds the expected values.
 */

import Database from 'better-sqlite3';
import type { Document, RegisterDocumentInput } from '../../../models/document.js';
import { rowToDocument } from './converters.js';
import { runWithConstraintCheck } from './helpers.js';
import type {
  DocumentRow,
  ListDocumentsOptions,
  StatusExpectation,
  StatusUpdate,
} from './types.js';

/**
 * Insert a document at not_ready / pending_extraction
 */
export function insertDocument(
  db: Database.Database,
  input: RegisterDocumentInput & { id: string },
  now: string
): Document {
  const stmt = db.prepare(`
    INSERT INTO documents (id, filename, storage_locator, mime_type, file_size, file_hash,
      document_type, text_extraction_status, processing_status, status_reason, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, 'not_ready', 'pending_extraction', NULL, ?, ?)
  `);

  runWithConstraintCheck(
    stmt,
    [
      input.id,
      input.filename,
      input.storage_locator,
      input.mime_type,
      input.file_size,
      input.file_hash,
      input.document_type,
      now,
      now,
    ],
    `inserting document ${input.id}`
  );

  return {
    id: input.id,
    filename: input.filename,
    storage_locator: input.storage_locator,
    mime_type: input.mime_type,
    file_size: input.file_size,
    file_hash: input.file_hash,
    document_type: input.document_type,
    text_extraction_status: 'not_ready',
    processing_status: 'pending_extraction',
    status_reason: null,
    created_at: now,
    updated_at: now,
  };
}

export function getDocument(db: Database.Database, id: string): Document | null {
  const row = db.prepare('SELECT * FROM documents WHERE id = ?').get(id) as DocumentRow | undefined;
  return row ? rowToDocument(row) : null;
}

/**
 * Most recent document with the given content hash
 */
export function getDocumentByHash(db: Database.Database, fileHash: string): Document | null {
  const row = db
    .prepare('SELECT * FROM documents WHERE file_hash = ? ORDER BY created_at DESC, id DESC LIMIT 1')
    .get(fileHash) as DocumentRow | undefined;
  return row ? rowToDocument(row) : null;
}

/**
 * List documents, oldest first
 */
export function listDocuments(db: Database.Database, options: ListDocumentsOptions = {}): Document[] {
  const conditions: string[] = [];
  const params: (string | number)[] = [];

  if (options.textExtractionStatus) {
    conditions.push('text_extraction_status = ?');
    params.push(options.textExtractionStatus);
  }
  if (options.processingStatus) {
    conditions.push('processing_status = ?');
    params.push(options.processingStatus);
  }
  if (options.documentType) {
    conditions.push('document_type = ?');
    params.push(options.documentType);
  }

  let query = 'SELECT * FROM documents';
  if (conditions.length > 0) {
    query += ' WHERE ' + conditions.join(' AND ');
  }
  query += ' ORDER BY created_at ASC, id ASC LIMIT ? OFFSET ?';
  params.push(options.limit ?? -1, options.offset ?? 0);

  const rows = db.prepare(query).all(...params) as DocumentRow[];
  return rows.map(rowToDocument);
}

/**
 * Atomically move a document's status columns from `expected` to `next`.
 *
 * @returns false when the row is missing or no longer matches `expected`
 */
export function compareAndSetStatus(
  db: Database.Database,
  id: string,
  expected: StatusExpectation,
  next: StatusUpdate,
  now: string
): boolean {
  const sets: string[] = ['updated_at = ?'];
  const setParams: (string | null)[] = [now];
  if (next.text !== undefined) {
    sets.push('text_extraction_status = ?');
    setParams.push(next.text);
  }
  if (next.processing !== undefined) {
    sets.push('processing_status = ?');
    setParams.push(next.processing);
  }
  if (next.reason !== undefined) {
    sets.push('status_reason = ?');
    setParams.push(next.reason);
  }

  const where: string[] = ['id = ?'];
  const whereParams: string[] = [id];
  if (expected.text !== undefined) {
    where.push('text_extraction_status = ?');
    whereParams.push(expected.text);
  }
  if (expected.processing !== undefined) {
    where.push('processing_status = ?');
    whereParams.push(expected.processing);
  }

  const stmt = db.prepare(`UPDATE documents SET ${sets.join(', ')} WHERE ${where.join(' AND ')}`);
  const result = runWithConstraintCheck(
    stmt,
    [...setParams, ...whereParams],
    `updating status of document ${id}`
  );
  return result.changes === 1;
}
