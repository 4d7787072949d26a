/**
 * Pipeline error taxonomy
 *
 * Every failure that reaches the orchestrator is one of these classes. The
 * `category` field lets callers (and the CLI) branch without instanceof.
 *
 * @module services/pipeline/errors
 */

import { OCRError, isRetryableOcrError } from '../ocr/errors.js';
import { CircuitBreakerOpenError, isServerError } from '../llm/circuit-breaker.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

export type PipelineErrorCategory =
  | 'VALIDATION_ERROR'
  | 'TRANSIENT_STAGE_ERROR'
  | 'TERMINAL_STAGE_ERROR'
  | 'INVARIANT_VIOLATION'
  | 'DOCUMENT_NOT_FOUND';

export type PipelineStage = 'ocr' | 'normalize' | 'llm' | 'store';

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly category: PipelineErrorCategory,
    public readonly details: Record<string, unknown> = {},
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'PipelineError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Bad input document: unreadable blob, disallowed MIME, unknown document type.
 * The document stays not_ready and no job is created.
 */
export class ValidationError extends PipelineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * OCR or LLM capability temporarily unavailable; eligible for retry
 */
export class TransientStageError extends PipelineError {
  constructor(
    message: string,
    public readonly stage: PipelineStage,
    cause?: unknown
  ) {
    super(message, 'TRANSIENT_STAGE_ERROR', { stage }, cause);
    this.name = 'TransientStageError';
  }
}

/**
 * Malformed or unrecoverable stage result. Fails the active job.
 */
export class TerminalStageError extends PipelineError {
  constructor(
    message: string,
    public readonly stage: PipelineStage,
    cause?: unknown
  ) {
    super(message, 'TERMINAL_STAGE_ERROR', { stage }, cause);
    this.name = 'TerminalStageError';
  }
}

/**
 * A status or ledger guard was violated, e.g. a second active job
 */
export class InvariantViolation extends PipelineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'INVARIANT_VIOLATION', details);
    this.name = 'InvariantViolation';
  }
}

export class DocumentNotFoundError extends PipelineError {
  constructor(documentId: string) {
    super(`Document not found: ${documentId}`, 'DOCUMENT_NOT_FOUND', { documentId });
    this.name = 'DocumentNotFoundError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CLASSIFICATION
// ═══════════════════════════════════════════════════════════════════════════════

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * Whether a failure may succeed on a later attempt
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof TransientStageError) return true;
  if (error instanceof PipelineError) return false;
  if (error instanceof OCRError) return isRetryableOcrError(error);
  if (error instanceof CircuitBreakerOpenError) return true;
  if (isAbortError(error)) return false;
  return isServerError(error);
}

/**
 * Map any thrown value from a stage into a transient or terminal stage error.
 * Stage errors pass through unchanged.
 */
export function classifyStageError(
  stage: PipelineStage,
  error: unknown
): TransientStageError | TerminalStageError {
  if (error instanceof TransientStageError || error instanceof TerminalStageError) {
    return error;
  }
  const message = `${stage} stage failed: ${errorMessage(error)}`;
  return isTransientError(error)
    ? new TransientStageError(message, stage, error)
    : new TerminalStageError(message, stage, error);
}
