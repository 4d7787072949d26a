/**
 * Layout reconstruction thresholds
 *
 * Passed explicitly into the row grouper, merger and pairer. Document-type
 * profiles override individual values; nothing here is mutated at runtime.
 *
 * @module services/layout/config
 */

import { z } from 'zod';
import { optionalFloatEnv } from '../../utils/env.js';

export const LayoutConfigSchema = z.object({
  /** Max vertical-centre distance for two fragments to share a row */
  rowTolerance: z.number().nonnegative().default(15),

  /** Horizontal gap below which neighbouring fragments may merge */
  gapThreshold: z.number().positive().default(20),

  /** Combined trimmed text length required for a merge */
  minMergeLength: z.number().int().nonnegative().default(3),

  /** Overlap (negative gap) beyond which a pair is treated as malformed */
  overlapLimit: z.number().nonnegative().default(10),

  /** Gaps up to this width are word spacing and join with a single space */
  wordGap: z.number().nonnegative().default(12),

  /** Never merge a value-like fragment (digit or currency) with a non-value one */
  separateValues: z.boolean().default(true),

  /** Joins pieces whose gap lies between wordGap and gapThreshold */
  separator: z.string().default(' / '),

  /** Spans shorter than this may act as labels */
  shortLabelLength: z.number().int().positive().default(30),

  /** Confidence multiplier per skipped span, in (0, 1] */
  skipPenalty: z.number().gt(0).max(1).default(0.85),

  /** Pair a row's trailing label with the next row's leading value */
  allowAdjacentRowPairs: z.boolean().default(false),

  /** Max centre distance between rows for the adjacent-row rule */
  adjacentRowMaxGap: z.number().nonnegative().default(40),

  /** Extra confidence multiplier for adjacent-row pairs */
  adjacentRowPenalty: z.number().gt(0).max(1).default(0.9),

  /** Characters that mark a span as a monetary value */
  currencySymbols: z.string().default('€$£¥'),
});

export type LayoutConfig = z.infer<typeof LayoutConfigSchema>;

export type LayoutConfigOverrides = z.input<typeof LayoutConfigSchema>;

export const DEFAULT_LAYOUT_CONFIG: LayoutConfig = LayoutConfigSchema.parse({});

/**
 * Load layout thresholds from environment variables, then apply overrides.
 *
 * Environment variables:
 *   LAYOUT_ROW_TOLERANCE   row clustering tolerance (default: 15)
 *   LAYOUT_GAP_THRESHOLD   merge gap threshold (default: 20)
 *   LAYOUT_SHORT_LABEL     short-label length (default: 30)
 */
export function loadLayoutConfig(overrides?: LayoutConfigOverrides): LayoutConfig {
  const envConfig = {
    rowTolerance: optionalFloatEnv('LAYOUT_ROW_TOLERANCE'),
    gapThreshold: optionalFloatEnv('LAYOUT_GAP_THRESHOLD'),
    shortLabelLength: optionalFloatEnv('LAYOUT_SHORT_LABEL'),
  };
  const defined = Object.fromEntries(
    Object.entries(envConfig).filter(([, value]) => value !== undefined)
  );
  return LayoutConfigSchema.parse({ ...defined, ...overrides });
}

/**
 * Apply a document-type profile on top of a base configuration.
 */
export function withProfile(base: LayoutConfig, profile?: LayoutConfigOverrides): LayoutConfig {
  if (!profile) return base;
  return LayoutConfigSchema.parse({ ...base, ...profile });
}
