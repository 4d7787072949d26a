/**
 * Document and extraction job interfaces
 *
 * A document carries two independent status axes: whether it can be
 * processed at all (text_extraction_status) and which pipeline stage it is
 * in (processing_status). Every pipeline attempt is an ExtractionJob.
 */

import type { ExtractedFields } from './extraction.js';
import type { NormalizedDocument } from './layout.js';

export const TEXT_EXTRACTION_STATUSES = [
  'not_ready',
  'ready',
  'in_progress',
  'completed',
  'failed',
] as const;

/**
 * Whether the document is fit to be processed
 */
export type TextExtractionStatus = (typeof TEXT_EXTRACTION_STATUSES)[number];

export const PROCESSING_STATUSES = [
  'pending_extraction',
  'ocr_running',
  'llm_running',
  'done',
  'failed',
] as const;

/**
 * Which pipeline stage the document is in
 */
export type ProcessingStatus = (typeof PROCESSING_STATUSES)[number];

export const JOB_STATUSES = ['pending_extraction', 'done', 'failed'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = ['done', 'failed'];

/**
 * Blob storage stages, one artifact per document and stage
 */
export type StorageStage = 'raw' | 'ocr' | 'llm' | 'annotated';

export interface Document {
  /** UUID v4 identifier */
  id: string;

  /** Original filename */
  filename: string;

  /** Blob key of the raw upload */
  storage_locator: string;

  /** MIME type detected or declared at upload */
  mime_type: string;

  /** File size in bytes */
  file_size: number;

  /** SHA-256 hash of file content (format: 'sha256:...') */
  file_hash: string;

  /** Document type key from config/document-types.json */
  document_type: string;

  text_extraction_status: TextExtractionStatus;

  processing_status: ProcessingStatus;

  /** Reason for the last failed transition, if any */
  status_reason: string | null;

  /** ISO 8601 timestamp when the document was registered */
  created_at: string;

  /** ISO 8601 timestamp of the last status change */
  updated_at: string;
}

/**
 * One end-to-end pipeline attempt for a document
 */
export interface ExtractionJob {
  /** UUID v4 identifier */
  id: string;

  document_id: string;

  status: JobStatus;

  /** Required when status is 'failed'; last transient error otherwise */
  error_message: string | null;

  /** Number of runs that ended in a retryable failure */
  attempt_count: number;

  created_at: string;

  updated_at: string;

  /** Set if and only if status is terminal */
  completed_at: string | null;
}

/**
 * Input for registering a newly uploaded document
 */
export interface RegisterDocumentInput {
  id?: string;
  filename: string;
  storage_locator: string;
  mime_type: string;
  file_size: number;
  file_hash: string;
  document_type: string;
}

/**
 * Status view returned to orchestration callers
 */
export interface DocumentStatusView {
  documentId: string;
  textExtractionStatus: TextExtractionStatus;
  processingStatus: ProcessingStatus;
  latestJob: ExtractionJob | null;
  statusReason: string | null;
  /** Last good normalized OCR structure, kept even when the job failed */
  normalized: NormalizedDocument | null;
  /** Field-extraction result of the last successful run */
  extracted: ExtractedFields | null;
}

export function isTerminalJobStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.includes(status);
}
