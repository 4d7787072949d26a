/**
 * Zod input schemas for ingestion and the CLI
 *
 * @module utils/validation
 */

import { z } from 'zod';
import { ValidationError } from '../services/pipeline/errors.js';

/**
 * Validate input against schema and throw a ValidationError listing every
 * problem
 */
export function validateInput<T>(schema: z.ZodSchema<T>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '), { issues: errors });
  }
  return result.data;
}

const MimeTypeSchema = z
  .string()
  .regex(/^[a-z0-9.+-]+\/[a-z0-9.+-]+$/i, 'MIME type must look like "type/subtype"')
  .transform((s) => s.toLowerCase());

export const IngestInputSchema = z.object({
  filename: z
    .string()
    .min(1, 'Filename is required')
    .max(255, 'Filename must be at most 255 characters')
    .refine((s) => !/[\\/]/.test(s), 'Filename must not contain path separators'),
  documentType: z.string().min(1, 'Document type is required'),
  mimeType: MimeTypeSchema.optional(),
});
