/**
 * Type definitions for DatabaseService
 *
 * Row types mirror the columns of the documents and extraction_jobs tables.
 */

import type {
  Document,
  ExtractionJob,
  ProcessingStatus,
  TextExtractionStatus,
} from '../../../models/document.js';

/**
 * Document list options
 */
export interface ListDocumentsOptions {
  textExtractionStatus?: TextExtractionStatus;
  processingStatus?: ProcessingStatus;
  documentType?: string;
  limit?: number;
  offset?: number;
}

/**
 * Expected current values for a compare-and-set status update. An omitted
 * axis is not checked.
 */
export interface StatusExpectation {
  text?: TextExtractionStatus;
  processing?: ProcessingStatus;
}

/**
 * New values for a status update. An omitted axis is left unchanged;
 * `reason` replaces status_reason (null clears it).
 */
export interface StatusUpdate {
  text?: TextExtractionStatus;
  processing?: ProcessingStatus;
  reason?: string | null;
}

/**
 * Open job joined with its document's text status
 */
export interface OpenJobRecord {
  job: ExtractionJob;
  textExtractionStatus: TextExtractionStatus;
}

export interface DatabaseCounts {
  documents: number;
  documentsByText: Record<TextExtractionStatus, number>;
  documentsByProcessing: Record<ProcessingStatus, number>;
  jobs: number;
  openJobs: number;
}

/**
 * Error codes for database operations
 */
export enum DatabaseErrorCode {
  DATABASE_NOT_FOUND = 'DATABASE_NOT_FOUND',
  DATABASE_ALREADY_EXISTS = 'DATABASE_ALREADY_EXISTS',
  DATABASE_LOCKED = 'DATABASE_LOCKED',
  DOCUMENT_NOT_FOUND = 'DOCUMENT_NOT_FOUND',
  JOB_NOT_FOUND = 'JOB_NOT_FOUND',
  FOREIGN_KEY_VIOLATION = 'FOREIGN_KEY_VIOLATION',
  CONSTRAINT_VIOLATION = 'CONSTRAINT_VIOLATION',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  INVALID_NAME = 'INVALID_NAME',
}

/**
 * Custom error class for database operations
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: DatabaseErrorCode,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'DatabaseError';
  }
}

/**
 * Database row type for documents
 */
export interface DocumentRow {
  id: string;
  filename: string;
  storage_locator: string;
  mime_type: string;
  file_size: number;
  file_hash: string;
  document_type: string;
  text_extraction_status: string;
  processing_status: string;
  status_reason: string | null;
  created_at: string;
  updated_at: string;
}

/**
 * Database row type for extraction_jobs
 */
export interface JobRow {
  id: string;
  document_id: string;
  status: string;
  error_message: string | null;
  attempt_count: number;
  created_at: string;
  updated_at: string;
  completed_at: string | null;
}

export type { Document, ExtractionJob };
