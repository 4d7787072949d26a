/**
 * Document status state machines
 *
 * Text extraction (readiness):
 *   not_ready -> ready -> in_progress -> completed
 *       \-> failed          |  \-> failed
 *                           \-> ready      (requeued after a retryable failure)
 *
 * Processing (pipeline stage):
 *   pending_extraction -> ocr_running -> llm_running -> done
 *   any non-terminal -> failed
 *   ocr_running | llm_running -> pending_extraction   (requeued)
 *
 * Pure functions only; persistence lives in DocumentStatusModel.
 *
 * @module status/transitions
 */

import type { ProcessingStatus, TextExtractionStatus } from '../../models/document.js';

export type TransitionResult<S extends string> =
  | { ok: true; from: S; to: S }
  | { ok: false; from: S; to: S; reason: string };

/**
 * Map of current state -> allowed next states
 */
export const TEXT_EXTRACTION_TRANSITIONS: Record<TextExtractionStatus, readonly TextExtractionStatus[]> = {
  not_ready: ['ready', 'failed'],
  ready: ['in_progress'],
  in_progress: ['completed', 'failed', 'ready'],
  completed: [],
  failed: [],
};

export const PROCESSING_TRANSITIONS: Record<ProcessingStatus, readonly ProcessingStatus[]> = {
  pending_extraction: ['ocr_running', 'failed'],
  ocr_running: ['llm_running', 'failed', 'pending_extraction'],
  llm_running: ['done', 'failed', 'pending_extraction'],
  done: [],
  failed: [],
};

function check<S extends string>(
  table: Record<S, readonly S[]>,
  axis: string,
  from: S,
  to: S
): TransitionResult<S> {
  const allowed = table[from];
  if (allowed.includes(to)) {
    return { ok: true, from, to };
  }
  const reason =
    allowed.length === 0
      ? `${axis} status "${from}" is terminal`
      : `${axis} transition ${from} -> ${to} is not allowed (expected one of: ${allowed.join(', ')})`;
  return { ok: false, from, to, reason };
}

export function transitionTextExtraction(
  from: TextExtractionStatus,
  to: TextExtractionStatus
): TransitionResult<TextExtractionStatus> {
  return check(TEXT_EXTRACTION_TRANSITIONS, 'text extraction', from, to);
}

export function transitionProcessing(
  from: ProcessingStatus,
  to: ProcessingStatus
): TransitionResult<ProcessingStatus> {
  return check(PROCESSING_TRANSITIONS, 'processing', from, to);
}

export function isTerminalTextStatus(status: TextExtractionStatus): boolean {
  return TEXT_EXTRACTION_TRANSITIONS[status].length === 0;
}

export function isTerminalProcessingStatus(status: ProcessingStatus): boolean {
  return PROCESSING_TRANSITIONS[status].length === 0;
}
