/**
 * Status state machine tests
 *
 * @see src/services/status/transitions.ts
 */

import { describe, it, expect } from 'vitest';
import {
  TEXT_EXTRACTION_TRANSITIONS,
  isTerminalProcessingStatus,
  isTerminalTextStatus,
  transitionProcessing,
  transitionTextExtraction,
} from '../../../src/services/status/transitions.js';
import { TEXT_EXTRACTION_STATUSES } from '../../../src/models/document.js';

describe('transitionTextExtraction', () => {
  it.each([
    ['not_ready', 'ready'],
    ['not_ready', 'failed'],
    ['ready', 'in_progress'],
    ['in_progress', 'completed'],
    ['in_progress', 'failed'],
    ['in_progress', 'ready'],
  ] as const)('allows %s -> %s', (from, to) => {
    expect(transitionTextExtraction(from, to)).toEqual({ ok: true, from, to });
  });

  it('rejects skipping readiness with the allowed targets', () => {
    expect(transitionTextExtraction('not_ready', 'in_progress')).toEqual({
      ok: false,
      from: 'not_ready',
      to: 'in_progress',
      reason: 'text extraction transition not_ready -> in_progress is not allowed (expected one of: ready, failed)',
    });
  });

  it('rejects any move out of a terminal state', () => {
    const result = transitionTextExtraction('completed', 'ready');
    expect(result.ok).toBe(false);
    expect(!result.ok && result.reason).toBe('text extraction status "completed" is terminal');
  });

  it('knows which states are terminal', () => {
    expect(TEXT_EXTRACTION_STATUSES.filter(isTerminalTextStatus)).toEqual(['completed', 'failed']);
    expect(Object.keys(TEXT_EXTRACTION_TRANSITIONS)).toEqual([...TEXT_EXTRACTION_STATUSES]);
  });
});

describe('transitionProcessing', () => {
  it('walks the happy path', () => {
    expect(transitionProcessing('pending_extraction', 'ocr_running').ok).toBe(true);
    expect(transitionProcessing('ocr_running', 'llm_running').ok).toBe(true);
    expect(transitionProcessing('llm_running', 'done').ok).toBe(true);
  });

  it('allows failure from every running state and requeue from a stage', () => {
    expect(transitionProcessing('pending_extraction', 'failed').ok).toBe(true);
    expect(transitionProcessing('ocr_running', 'failed').ok).toBe(true);
    expect(transitionProcessing('llm_running', 'failed').ok).toBe(true);
    expect(transitionProcessing('llm_running', 'pending_extraction').ok).toBe(true);
  });

  it('rejects skipping the OCR stage', () => {
    const result = transitionProcessing('pending_extraction', 'llm_running');
    expect(!result.ok && result.reason).toBe(
      'processing transition pending_extraction -> llm_running is not allowed (expected one of: ocr_running, failed)'
    );
  });

  it('treats done and failed as terminal', () => {
    expect(isTerminalProcessingStatus('done')).toBe(true);
    expect(isTerminalProcessingStatus('failed')).toBe(true);
    expect(isTerminalProcessingStatus('llm_running')).toBe(false);
    expect(transitionProcessing('done', 'failed').ok).toBe(false);
  });
});
