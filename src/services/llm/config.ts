/**
 * Ollama configuration for field extraction
 *
 * No API key: Ollama runs as a local or sidecar service.
 */

import { z } from 'zod';
import { parseFloatEnv, parseIntEnv } from '../../utils/env.js';

export const OLLAMA_MODELS = {
  LLAMA3: 'llama3.1',
  QWEN: 'qwen2.5',
  MISTRAL: 'mistral',
} as const;

export const OllamaConfigSchema = z.object({
  baseUrl: z.string().url().default('http://localhost:11434'),

  model: z.string().min(1).default(OLLAMA_MODELS.LLAMA3),

  maxOutputTokens: z.number().int().positive().default(2048),
  temperature: z.number().min(0).max(2).default(0),

  /** Per-request timeout; the whole retry loop may take longer */
  timeoutMs: z.number().int().positive().default(60_000),

  retry: z
    .object({
      maxAttempts: z.number().int().positive().default(3),
      baseDelayMs: z.number().nonnegative().default(500),
      maxDelayMs: z.number().nonnegative().default(10_000),
    })
    .default({}),

  circuitBreaker: z
    .object({
      failureThreshold: z.number().int().positive().default(5),
      recoveryTimeMs: z.number().nonnegative().default(60_000),
    })
    .default({}),
});

export type OllamaConfig = z.infer<typeof OllamaConfigSchema>;

export type OllamaConfigOverrides = z.input<typeof OllamaConfigSchema>;

/**
 * Load Ollama configuration from environment variables.
 *
 * Environment variables:
 *   OLLAMA_BASE_URL          Ollama server URL (default: http://localhost:11434)
 *   OLLAMA_MODEL             Text model for field extraction (default: llama3.1)
 *   OLLAMA_TEMPERATURE       Generation temperature (default: 0)
 *   OLLAMA_MAX_OUTPUT_TOKENS num_predict (default: 2048)
 *   OLLAMA_TIMEOUT_MS        Per-request timeout (default: 60000)
 */
export function loadOllamaConfig(overrides?: OllamaConfigOverrides): OllamaConfig {
  const envConfig = {
    baseUrl: process.env.OLLAMA_BASE_URL || 'http://localhost:11434',
    model: process.env.OLLAMA_MODEL || OLLAMA_MODELS.LLAMA3,
    temperature: parseFloatEnv('OLLAMA_TEMPERATURE', 0),
    maxOutputTokens: parseIntEnv('OLLAMA_MAX_OUTPUT_TOKENS', 2048),
    timeoutMs: parseIntEnv('OLLAMA_TIMEOUT_MS', 60_000),
  };

  return OllamaConfigSchema.parse({ ...envConfig, ...overrides });
}
