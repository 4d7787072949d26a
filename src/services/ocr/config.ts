/**
 * OCR service configuration
 */

import { z } from 'zod';
import { parseIntEnv } from '../../utils/env.js';

export const OcrServiceConfigSchema = z.object({
  /** Endpoint that accepts raw document bytes and returns fragments */
  url: z.string().url().default('http://localhost:8500/ocr'),

  /** Per-request timeout */
  timeoutMs: z.number().int().positive().default(120_000),

  retry: z
    .object({
      maxAttempts: z.number().int().positive().default(3),
      baseDelayMs: z.number().nonnegative().default(1000),
      maxDelayMs: z.number().nonnegative().default(30_000),
    })
    .default({}),
});

export type OcrServiceConfig = z.infer<typeof OcrServiceConfigSchema>;

export type OcrServiceConfigOverrides = z.input<typeof OcrServiceConfigSchema>;

/**
 * Environment variables:
 *   OCR_SERVICE_URL    OCR endpoint (default: http://localhost:8500/ocr)
 *   OCR_TIMEOUT_MS     per-request timeout (default: 120000)
 *   OCR_MAX_ATTEMPTS   attempts per call, including the first (default: 3)
 */
export function loadOcrServiceConfig(overrides?: OcrServiceConfigOverrides): OcrServiceConfig {
  const envConfig = {
    url: process.env.OCR_SERVICE_URL || 'http://localhost:8500/ocr',
    timeoutMs: parseIntEnv('OCR_TIMEOUT_MS', 120_000),
    retry: { maxAttempts: parseIntEnv('OCR_MAX_ATTEMPTS', 3) },
  };
  return OcrServiceConfigSchema.parse({ ...envConfig, ...overrides });
}
