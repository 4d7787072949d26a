/**
 * Pipeline configuration
 *
 * @module services/pipeline/config
 */

import { z } from 'zod';
import { parseIntEnv } from '../../utils/env.js';

export const DEFAULT_ALLOWED_MIME_TYPES = ['application/pdf', 'image/png', 'image/jpeg'] as const;

export const PipelineConfigSchema = z.object({
  /** Runs a job may take before a transient failure becomes terminal */
  maxAttempts: z.number().int().positive().default(3),

  /** Wall-clock limit for one run; 0 disables it */
  runTimeoutMs: z.number().int().nonnegative().default(15 * 60_000),

  /** Documents processed at once by the dispatcher */
  concurrency: z.number().int().positive().default(2),

  /** Open jobs untouched this long are reclaimed by the sweeper */
  staleJobMs: z.number().int().positive().default(30 * 60_000),

  allowedMimeTypes: z.array(z.string().min(1)).min(1).default([...DEFAULT_ALLOWED_MIME_TYPES]),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export type PipelineConfigOverrides = z.input<typeof PipelineConfigSchema>;

function parseListEnv(name: string): string[] | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  return raw
    .split(',')
    .map((s) => s.trim().toLowerCase())
    .filter((s) => s.length > 0);
}

/**
 * Load pipeline configuration from environment variables.
 *
 * Environment variables:
 *   PIPELINE_MAX_ATTEMPTS    runs per job before giving up (default: 3)
 *   PIPELINE_RUN_TIMEOUT_MS  per-run timeout, 0 = none (default: 900000)
 *   PIPELINE_CONCURRENCY     dispatcher worker count (default: 2)
 *   PIPELINE_STALE_JOB_MS    sweeper threshold (default: 1800000)
 *   ALLOWED_MIME_TYPES       comma-separated allow-list
 */
export function loadPipelineConfig(overrides?: PipelineConfigOverrides): PipelineConfig {
  const envConfig = {
    maxAttempts: parseIntEnv('PIPELINE_MAX_ATTEMPTS', 3),
    runTimeoutMs: parseIntEnv('PIPELINE_RUN_TIMEOUT_MS', 15 * 60_000),
    concurrency: parseIntEnv('PIPELINE_CONCURRENCY', 2),
    staleJobMs: parseIntEnv('PIPELINE_STALE_JOB_MS', 30 * 60_000),
    allowedMimeTypes: parseListEnv('ALLOWED_MIME_TYPES') ?? [...DEFAULT_ALLOWED_MIME_TYPES],
  };
  return PipelineConfigSchema.parse({ ...envConfig, ...overrides });
}
