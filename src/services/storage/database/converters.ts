/**
 * Row conversion functions for DatabaseService
 *
 * Status columns are validated against the known value sets so a corrupt
 * row fails loudly instead of leaking an unknown state into the FSMs.
 */

import {
  JOB_STATUSES,
  PROCESSING_STATUSES,
  TEXT_EXTRACTION_STATUSES,
  type Document,
  type ExtractionJob,
  type ProcessingStatus,
  type TextExtractionStatus,
} from '../../../models/document.js';
import { DatabaseError, DatabaseErrorCode, type DocumentRow, type JobRow } from './types.js';

function validateEnum<T extends string>(
  value: string,
  validValues: readonly T[],
  fieldName: string,
  id: string
): T {
  const match = validValues.find((v) => v === value);
  if (match === undefined) {
    throw new DatabaseError(
      `Invalid ${fieldName} "${value}" in record ${id}. Valid values: ${validValues.join(', ')}`,
      DatabaseErrorCode.SCHEMA_MISMATCH
    );
  }
  return match;
}

export function parseTextStatus(value: string, id: string): TextExtractionStatus {
  return validateEnum(value, TEXT_EXTRACTION_STATUSES, 'text_extraction_status', id);
}

export function parseProcessingStatus(value: string, id: string): ProcessingStatus {
  return validateEnum(value, PROCESSING_STATUSES, 'processing_status', id);
}

export function rowToDocument(row: DocumentRow): Document {
  return {
    id: row.id,
    filename: row.filename,
    storage_locator: row.storage_locator,
    mime_type: row.mime_type,
    file_size: row.file_size,
    file_hash: row.file_hash,
    document_type: row.document_type,
    text_extraction_status: parseTextStatus(row.text_extraction_status, row.id),
    processing_status: parseProcessingStatus(row.processing_status, row.id),
    status_reason: row.status_reason,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

export function rowToJob(row: JobRow): ExtractionJob {
  return {
    id: row.id,
    document_id: row.document_id,
    status: validateEnum(row.status, JOB_STATUSES, 'job status', row.id),
    error_message: row.error_message,
    attempt_count: row.attempt_count,
    created_at: row.created_at,
    updated_at: row.updated_at,
    completed_at: row.completed_at,
  };
}
