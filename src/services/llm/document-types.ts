/**
 * Document-type registry
 *
 * Loads config/document-types.json: per type, the expected fields, their
 * human descriptions and types, validation rules, and an optional layout
 * profile that overrides the default thresholds.
 *
 * @module services/llm/document-types
 */

import fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

import type { FieldType, FieldValidationRule } from '../../models/extraction.js';
import { LayoutConfigSchema, type LayoutConfigOverrides } from '../layout/config.js';
import { ValidationError } from '../pipeline/errors.js';

export const FIELD_TYPES = ['string', 'date', 'currency', 'number', 'area', 'boolean'] as const;

const FieldTypeSchema = z.enum(FIELD_TYPES);

const FieldValidationRuleSchema = z.object({
  type: FieldTypeSchema.optional(),
  min: z.number().optional(),
  max: z.number().optional(),
  pattern: z
    .string()
    .refine(
      (source) => {
        try {
          new RegExp(source);
          return true;
        } catch {
          return false;
        }
      },
      { message: 'pattern is not a valid regular expression' }
    )
    .optional(),
});

const DocumentTypeEntrySchema = z
  .object({
    name: z.string().min(1),
    expected_fields: z.array(z.string().min(1)),
    field_descriptions: z.record(z.string()).default({}),
    field_types: z.record(FieldTypeSchema).default({}),
    validation_rules: z.record(FieldValidationRuleSchema).default({}),
    layout_profile: LayoutConfigSchema.partial().optional(),
  })
  .transform((entry) => ({
    name: entry.name,
    expectedFields: entry.expected_fields,
    fieldDescriptions: entry.field_descriptions,
    fieldTypes: entry.field_types,
    validationRules: entry.validation_rules,
    layoutProfile: entry.layout_profile,
  }));

const DocumentTypesFileSchema = z.record(DocumentTypeEntrySchema);

export interface DocumentTypeConfig {
  /** Registry key, e.g. 'credit_request' */
  key: string;
  name: string;
  expectedFields: string[];
  fieldDescriptions: Record<string, string>;
  fieldTypes: Record<string, FieldType>;
  validationRules: Record<string, FieldValidationRule>;
  layoutProfile?: LayoutConfigOverrides;
}

export const DEFAULT_DOCUMENT_TYPES_PATH = fileURLToPath(
  new URL('../../../config/document-types.json', import.meta.url)
);

export class DocumentTypeRegistry {
  private readonly types: Map<string, DocumentTypeConfig>;

  constructor(types: DocumentTypeConfig[]) {
    this.types = new Map(types.map((t) => [t.key, t]));
  }

  /**
   * Parse and validate a document-types object
   * @throws ValidationError listing every schema violation
   */
  static fromObject(raw: unknown): DocumentTypeRegistry {
    const result = DocumentTypesFileSchema.safeParse(raw);
    if (!result.success) {
      const errors = result.error.errors.map((e) => {
        const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
        return `${path}${e.message}`;
      });
      throw new ValidationError(`Invalid document type configuration: ${errors.join('; ')}`);
    }
    return new DocumentTypeRegistry(
      Object.entries(result.data).map(([key, entry]) => ({ key, ...entry }))
    );
  }

  /**
   * Load from a JSON file (default: config/document-types.json, or
   * DOCEXTRACT_DOCUMENT_TYPES when set)
   */
  static load(filePath?: string): DocumentTypeRegistry {
    const resolved = filePath ?? process.env.DOCEXTRACT_DOCUMENT_TYPES ?? DEFAULT_DOCUMENT_TYPES_PATH;
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
    } catch (error) {
      throw new ValidationError(
        `Cannot read document type configuration ${resolved}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return DocumentTypeRegistry.fromObject(raw);
  }

  has(key: string): boolean {
    return this.types.has(key);
  }

  /**
   * @throws ValidationError for an unknown document type
   */
  get(key: string): DocumentTypeConfig {
    const config = this.types.get(key);
    if (!config) {
      throw new ValidationError(`Unknown document type: ${key}`, {
        known: [...this.types.keys()],
      });
    }
    return config;
  }

  keys(): string[] {
    return [...this.types.keys()];
  }
}

/**
 * Declared type of a field, falling back to its rule type, then 'string'
 */
export function fieldTypeOf(config: DocumentTypeConfig, field: string): FieldType {
  return config.fieldTypes[field] ?? config.validationRules[field]?.type ?? 'string';
}
