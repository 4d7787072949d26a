/**
 * CircuitBreaker state machine tests
 *
 * @see src/services/llm/circuit-breaker.ts
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  CircuitBreaker,
  CircuitBreakerOpenError,
  CircuitState,
  isServerError,
} from '../../../src/services/llm/circuit-breaker.js';

const serverDown = (): Promise<never> => Promise.reject(new Error('Ollama API error 503: Service Unavailable'));
const ok = (): Promise<string> => Promise.resolve('ok');

describe('isServerError', () => {
  it.each([
    ['Ollama API error 500: Internal Server Error', true],
    ['Ollama API error 429: Too Many Requests', true],
    ['fetch failed', true],
    ['connect ECONNREFUSED 127.0.0.1:11434', true],
    ['model is loading, retry shortly', true],
    ['Ollama API error 400: Bad Request', false],
    ['Invalid JSON in LLM response', false],
  ])('%s -> %s', (message, expected) => {
    expect(isServerError(new Error(message))).toBe(expected);
  });

  it('looks at the network code of the cause', () => {
    const cause = Object.assign(new Error('connect failed'), { code: 'ECONNRESET' });
    expect(isServerError(new Error('request failed', { cause }))).toBe(true);
  });

  it('ignores non-errors', () => {
    expect(isServerError('503')).toBe(false);
  });
});

describe('CircuitBreaker', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-15T09:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('opens after the failure threshold and rejects without calling', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 2, recoveryTimeMs: 10_000 });

    await expect(breaker.execute(serverDown)).rejects.toThrow('503');
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    await expect(breaker.execute(serverDown)).rejects.toThrow('503');
    expect(breaker.getState()).toBe(CircuitState.OPEN);

    const fn = vi.fn(ok);
    const error: unknown = await breaker.execute(fn).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CircuitBreakerOpenError);
    expect(error instanceof Error && error.message).toBe('Circuit breaker is OPEN. Try again in 10s');
    expect(fn).not.toHaveBeenCalled();
  });

  it('does not count client-side errors', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1 });

    await expect(breaker.execute(() => Promise.reject(new Error('prompt too long')))).rejects.toThrow(
      'prompt too long'
    );

    expect(breaker.getStatus()).toEqual({
      state: CircuitState.CLOSED,
      failureCount: 0,
      lastFailureTime: null,
      timeToRecovery: null,
    });
  });

  it('resets the failure count after a success', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 2 });

    await expect(breaker.execute(serverDown)).rejects.toThrow();
    await breaker.execute(ok);
    await expect(breaker.execute(serverDown)).rejects.toThrow();

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('half-opens after the recovery time and closes after enough successes', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1, recoveryTimeMs: 10_000, halfOpenSuccessThreshold: 2 });
    await expect(breaker.execute(serverDown)).rejects.toThrow();

    vi.advanceTimersByTime(4_000);
    expect(breaker.getStatus().timeToRecovery).toBe(6_000);

    vi.advanceTimersByTime(6_000);
    expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);

    await breaker.execute(ok);
    expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);
    await breaker.execute(ok);
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('doubles the recovery time when a half-open call fails', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1, recoveryTimeMs: 10_000 });
    await expect(breaker.execute(serverDown)).rejects.toThrow();
    vi.advanceTimersByTime(10_000);

    await expect(breaker.execute(serverDown)).rejects.toThrow();

    expect(breaker.getState()).toBe(CircuitState.OPEN);
    expect(breaker.getRecoveryTimeMs()).toBe(20_000);
  });

  it('can be reset by hand', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1 });
    await expect(breaker.execute(serverDown)).rejects.toThrow();

    breaker.reset();

    expect(breaker.isOpen()).toBe(false);
    expect(breaker.getRecoveryTimeMs()).toBe(60_000);
  });
});
