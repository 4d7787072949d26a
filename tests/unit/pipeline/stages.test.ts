/**
 * Stage outcomes, error classification and annotation overlays
 *
 * @see src/services/pipeline/stages.ts
 * @see src/services/pipeline/errors.ts
 * @see src/services/pipeline/annotations.ts
 */

import { describe, it, expect } from 'vitest';
import { runStage } from '../../../src/services/pipeline/stages.js';
import {
  InvariantViolation,
  TerminalStageError,
  TransientStageError,
  ValidationError,
  classifyStageError,
  isTransientError,
} from '../../../src/services/pipeline/errors.js';
import { buildAnnotationOverlay } from '../../../src/services/pipeline/annotations.js';
import { CircuitBreakerOpenError } from '../../../src/services/llm/circuit-breaker.js';
import { OCRRateLimitError, OCRResponseError } from '../../../src/services/ocr/errors.js';
import { normalizeDocument } from '../../../src/services/layout/normalizer.js';
import { DEFAULT_LAYOUT_CONFIG } from '../../../src/services/layout/config.js';
import { COMPANY_FIELDS, COMPANY_PAGE, raw } from './helpers.js';

describe('runStage', () => {
  it('wraps a result as success', async () => {
    expect(await runStage('normalize', async () => 42)).toEqual({
      kind: 'success',
      stage: 'normalize',
      artifact: 42,
    });
  });

  it('tags a transient failure', async () => {
    const outcome = await runStage('llm', async () => {
      throw new Error('fetch failed');
    });
    expect(outcome.kind).toBe('transient');
    expect(outcome.kind !== 'success' && outcome.error.message).toBe('llm stage failed: fetch failed');
  });

  it('tags a terminal failure and keeps stage errors as thrown', async () => {
    const thrown = new TerminalStageError('LLM returned malformed JSON', 'llm');
    const outcome = await runStage('llm', async () => {
      throw thrown;
    });
    expect(outcome).toEqual({ kind: 'terminal', stage: 'llm', error: thrown });
  });
});

describe('isTransientError', () => {
  it.each([
    ['a transient stage error', new TransientStageError('busy', 'ocr'), true],
    ['an open circuit', new CircuitBreakerOpenError('Circuit breaker is OPEN', 1000), true],
    ['an OCR rate limit', new OCRRateLimitError('slow down', 30), true],
    ['an HTTP 503', new Error('Ollama API error 503: loading model'), true],
    ['a refused connection', new Error('connect ECONNREFUSED 127.0.0.1:11434'), true],
    ['a malformed OCR response', new OCRResponseError('missing pages'), false],
    ['a terminal stage error', new TerminalStageError('bad', 'llm'), false],
    ['a validation error', new ValidationError('bad input'), false],
    ['an invariant violation', new InvariantViolation('two jobs'), false],
    ['a plain bug', new TypeError('x is undefined'), false],
  ])('%s -> %s', (_name, error, expected) => {
    expect(isTransientError(error)).toBe(expected);
  });

  it('never retries an abort', () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';
    expect(isTransientError(abort)).toBe(false);
  });
});

describe('classifyStageError', () => {
  it('prefixes the stage and keeps the cause', () => {
    const cause = new Error('socket hang up');
    const classified = classifyStageError('ocr', cause);

    expect(classified).toBeInstanceOf(TransientStageError);
    expect(classified.message).toBe('ocr stage failed: socket hang up');
    expect(classified.stage).toBe('ocr');
    expect(classified.cause).toBe(cause);
  });

  it('stringifies non-errors', () => {
    expect(classifyStageError('store', 'disk full').message).toBe('store stage failed: disk full');
  });
});

describe('buildAnnotationOverlay', () => {
  it('lists pair boxes then leftovers with their fields', () => {
    const page = { ...COMPANY_PAGE, fragments: [...COMPANY_PAGE.fragments, raw('Page 1 of 1', 0, 90, 200)] };
    const structure = normalizeDocument([page], DEFAULT_LAYOUT_CONFIG);

    const overlay = buildAnnotationOverlay('doc-1', structure, COMPANY_FIELDS);

    expect(overlay.documentId).toBe('doc-1');
    expect(overlay.pages[0].boxes.map((b) => [b.kind, b.text, b.field])).toEqual([
      ['label', 'Company Name', null],
      ['value', 'DemoTech Solutions GmbH', 'company_name'],
      ['leftover', 'Page 1 of 1', null],
    ]);
    expect(overlay.pages[0].boxes[1].bbox).toEqual({ x1: 140, y1: 0, x2: 320, y2: 10 });
  });

  it('draws spans without field assignments when nothing was extracted', () => {
    const structure = normalizeDocument([COMPANY_PAGE], DEFAULT_LAYOUT_CONFIG);
    const overlay = buildAnnotationOverlay('doc-1', structure, null);
    expect(overlay.pages[0].boxes.every((b) => b.field === null)).toBe(true);
  });
});
