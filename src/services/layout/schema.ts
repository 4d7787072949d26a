/**
 * Schema for a stored normalized document
 *
 * The normalized structure is persisted as the 'ocr' artifact and read back
 * for status views and re-runs; this validates it on the way in.
 *
 * @module services/layout/schema
 */

import { z } from 'zod';

import type { MergedSpan, NormalizedDocument } from '../../models/layout.js';

const BoundingBoxSchema = z.object({
  x1: z.number(),
  y1: z.number(),
  x2: z.number(),
  y2: z.number(),
});

const FragmentSchema = z.object({
  id: z.string(),
  text: z.string(),
  bbox: BoundingBoxSchema,
  confidence: z.number().min(0).max(1),
});

const MergedSpanSchema: z.ZodType<MergedSpan> = z.object({
  id: z.string(),
  text: z.string(),
  bbox: BoundingBoxSchema,
  sourceFragmentIds: z.array(z.string()),
  confidence: z.number().min(0).max(1),
  rowIndex: z.number().int().nonnegative(),
});

const PairSchema = z.object({
  label: MergedSpanSchema,
  value: MergedSpanSchema,
  labelText: z.string(),
  confidence: z.number().min(0).max(1),
  page: z.number().int().positive(),
  skips: z.number().int().nonnegative(),
  crossRow: z.boolean(),
});

const PageSchema = z.object({
  pageNumber: z.number().int().positive(),
  fragments: z.array(FragmentSchema),
  rows: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      centerY: z.number(),
      fragmentIds: z.array(z.string()),
    })
  ),
  mergedSpans: z.array(MergedSpanSchema),
  pairs: z.array(PairSchema),
  leftovers: z.array(MergedSpanSchema),
});

export const NormalizedDocumentSchema: z.ZodType<NormalizedDocument> = z.object({
  pages: z.array(PageSchema),
  summary: z.object({
    pageCount: z.number().int().nonnegative(),
    fragmentCount: z.number().int().nonnegative(),
    mergedCount: z.number().int().nonnegative(),
    pairCount: z.number().int().nonnegative(),
    leftoverCount: z.number().int().nonnegative(),
  }),
});

export class NormalizedDocumentFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NormalizedDocumentFormatError';
  }
}

/**
 * @throws NormalizedDocumentFormatError when the value is not a normalized document
 */
export function parseNormalizedDocument(value: unknown): NormalizedDocument {
  const result = NormalizedDocumentSchema.safeParse(value);
  if (!result.success) {
    const errors = result.error.errors
      .slice(0, 5)
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new NormalizedDocumentFormatError(`Stored normalized document is malformed: ${errors}`);
  }
  return result.data;
}
