/**
 * Ollama text-generation client
 *
 * Calls /api/generate with stream disabled. Every request goes through the
 * circuit breaker and a retry loop for server-side failures.
 *
 * Start Ollama and pull a model before use:
 *   ollama serve
 *   ollama pull llama3.1
 */

import { z } from 'zod';

import { loadOllamaConfig, type OllamaConfig, type OllamaConfigOverrides } from './config.js';
import { CircuitBreaker, isServerError } from './circuit-breaker.js';
import { withRetry } from '../../utils/backoff.js';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface GenerateResponse {
  text: string;
  model: string;
  usage: TokenUsage;
  processingTimeMs: number;
}

export interface GenerateOptions {
  /** Ask Ollama to constrain output to JSON */
  json?: boolean;
  temperature?: number;
  maxOutputTokens?: number;
  /** Aborts the in-flight request and any pending retry */
  signal?: AbortSignal;
}

/**
 * Minimal text-generation contract used by the field extractor
 */
export interface TextGenerator {
  generate(prompt: string, options?: GenerateOptions): Promise<GenerateResponse>;
}

const OllamaGenerateResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string(),
  done: z.boolean().optional(),
  eval_count: z.number().optional(),
  prompt_eval_count: z.number().optional(),
});

export class OllamaApiError extends Error {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message);
    this.name = 'OllamaApiError';
  }
}

export class OllamaClient implements TextGenerator {
  private readonly config: OllamaConfig;
  private readonly circuitBreaker: CircuitBreaker;

  constructor(overrides?: OllamaConfigOverrides, circuitBreaker?: CircuitBreaker) {
    this.config = loadOllamaConfig(overrides);
    this.circuitBreaker =
      circuitBreaker ??
      new CircuitBreaker({
        failureThreshold: this.config.circuitBreaker.failureThreshold,
        recoveryTimeMs: this.config.circuitBreaker.recoveryTimeMs,
      });
  }

  get model(): string {
    return this.config.model;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<GenerateResponse> {
    const startTime = Date.now();
    const { maxAttempts, baseDelayMs, maxDelayMs } = this.config.retry;

    const result = await this.circuitBreaker.execute(() =>
      withRetry(() => this.callGenerate(prompt, options), isServerError, {
        maxAttempts,
        baseDelayMs,
        maxDelayMs,
        signal: options.signal,
        label: 'OllamaClient',
      })
    );

    return { ...result, processingTimeMs: Date.now() - startTime };
  }

  private async callGenerate(
    prompt: string,
    options: GenerateOptions
  ): Promise<Omit<GenerateResponse, 'processingTimeMs'>> {
    const url = `${this.config.baseUrl}/api/generate`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);
    const onAbort = (): void => controller.abort();
    if (options.signal?.aborted) controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    let rawResponse: Response;
    try {
      rawResponse = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.config.model,
          prompt,
          stream: false,
          ...(options.json ? { format: 'json' } : {}),
          options: {
            temperature: options.temperature ?? this.config.temperature,
            num_predict: options.maxOutputTokens ?? this.config.maxOutputTokens,
          },
        }),
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onAbort);
    }

    if (!rawResponse.ok) {
      const body = await rawResponse.text().catch((error: unknown) => `<unreadable body: ${String(error)}>`);
      throw new OllamaApiError(
        `Ollama API error ${rawResponse.status}: ${rawResponse.statusText}. ${body.slice(0, 200)}`,
        rawResponse.status
      );
    }

    const parsed = OllamaGenerateResponseSchema.safeParse(await rawResponse.json());
    if (!parsed.success) {
      throw new Error(`Malformed Ollama response: ${parsed.error.errors.map((e) => e.message).join('; ')}`);
    }

    const data = parsed.data;
    const inputTokens = data.prompt_eval_count ?? 0;
    const outputTokens = data.eval_count ?? 0;
    return {
      text: data.response,
      model: data.model ?? this.config.model,
      usage: { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens },
    };
  }
}
