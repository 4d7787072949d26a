/**
 * Schema for a stored field-extraction result ('llm' artifact)
 */

import { z } from 'zod';

import type { ExtractedFields } from '../../models/extraction.js';

const ExtractedFieldSchema = z.object({
  value: z.union([z.string(), z.number(), z.boolean(), z.null()]),
  confidence: z.number().min(0).max(1),
  sourceSpanIds: z.array(z.string()),
  page: z.number().int().positive().optional(),
});

export const ExtractedFieldsSchema: z.ZodType<ExtractedFields> = z.object({
  fields: z.record(ExtractedFieldSchema),
  missingFields: z.array(z.string()),
  validation: z.record(z.object({ isValid: z.boolean(), errors: z.array(z.string()) })),
});

/**
 * Envelope written to blob storage after a successful extraction
 */
export const StoredExtractionSchema = z.object({
  documentId: z.string(),
  documentType: z.string(),
  jobId: z.string(),
  extractedAt: z.string(),
  result: ExtractedFieldsSchema,
});

export type StoredExtraction = z.infer<typeof StoredExtractionSchema>;
