/**
 * OllamaClient tests with a stubbed fetch
 *
 * @see src/services/llm/client.ts
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { OllamaApiError, OllamaClient } from '../../../src/services/llm/client.js';
import { CircuitBreaker, CircuitBreakerOpenError } from '../../../src/services/llm/circuit-breaker.js';

function ollamaResponse(body: unknown, init: ResponseInit = { status: 200 }): Response {
  return new Response(JSON.stringify(body), {
    ...init,
    headers: { 'Content-Type': 'application/json' },
  });
}

function client(breaker?: CircuitBreaker): OllamaClient {
  return new OllamaClient(
    {
      baseUrl: 'http://ollama.test',
      model: 'test-model',
      temperature: 0,
      maxOutputTokens: 256,
      timeoutMs: 1000,
      retry: { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 },
    },
    breaker
  );
}

describe('OllamaClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts a non-streaming generate request and reports usage', async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      ollamaResponse({
        model: 'test-model',
        response: '{"extracted_fields": {}}',
        done: true,
        prompt_eval_count: 120,
        eval_count: 30,
      })
    );
    vi.stubGlobal('fetch', fetchMock);

    const result = await client().generate('Extract the fields', { json: true });

    expect(result.text).toBe('{"extracted_fields": {}}');
    expect(result.model).toBe('test-model');
    expect(result.usage).toEqual({ inputTokens: 120, outputTokens: 30, totalTokens: 150 });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://ollama.test/api/generate');
    expect(JSON.parse(init.body)).toEqual({
      model: 'test-model',
      prompt: 'Extract the fields',
      stream: false,
      format: 'json',
      options: { temperature: 0, num_predict: 256 },
    });
  });

  it('leaves out the format when JSON mode is off and falls back to the configured model', async () => {
    const fetchMock = vi.fn().mockResolvedValue(ollamaResponse({ response: 'hello' }));
    vi.stubGlobal('fetch', fetchMock);

    const result = await client().generate('Say hello', { temperature: 0.7 });

    expect(result.model).toBe('test-model');
    expect(result.usage.totalTokens).toBe(0);
    const body = JSON.parse(fetchMock.mock.calls[0][1].body);
    expect(body.format).toBeUndefined();
    expect(body.options.temperature).toBe(0.7);
  });

  it('retries a server error', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response('loading', { status: 503, statusText: 'Service Unavailable' }))
      .mockResolvedValueOnce(ollamaResponse({ response: '{}' }));
    vi.stubGlobal('fetch', fetchMock);

    const result = await client().generate('prompt');

    expect(result.text).toBe('{}');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('does not retry a client error', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValue(new Response('model "x" not found', { status: 404, statusText: 'Not Found' }));
    vi.stubGlobal('fetch', fetchMock);

    const error: unknown = await client()
      .generate('prompt')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(OllamaApiError);
    expect(error instanceof OllamaApiError && error.status).toBe(404);
    expect(error instanceof Error && error.message).toBe('Ollama API error 404: Not Found. model "x" not found');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('rejects a response without text', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(ollamaResponse({ done: true })));

    await expect(client().generate('prompt')).rejects.toThrow('Malformed Ollama response: Required');
  });

  it('stops calling the server once the circuit opens', async () => {
    const fetchMock = vi
      .fn()
      .mockImplementation(async () => new Response('down', { status: 502, statusText: 'Bad Gateway' }));
    vi.stubGlobal('fetch', fetchMock);
    const ollama = client(new CircuitBreaker({ failureThreshold: 2, recoveryTimeMs: 60_000 }));

    await expect(ollama.generate('a')).rejects.toThrow(OllamaApiError);
    await expect(ollama.generate('b')).rejects.toThrow(OllamaApiError);
    await expect(ollama.generate('c')).rejects.toThrow(CircuitBreakerOpenError);

    // two attempts per call before the breaker opened
    expect(fetchMock).toHaveBeenCalledTimes(4);
  });
});
