/**
 * LLM field extraction
 *
 * The language model only maps document text to field names. Values,
 * confidences and span ids are taken from the normalized structure whenever
 * the model's answer shows up in a pair value or leftover span. A pair found
 * only through its label supplies span ids but never replaces the value.
 *
 * @module services/llm/field-extractor
 */

import { z } from 'zod';

import type { LabelValuePair, MergedSpan, NormalizedDocument } from '../../models/layout.js';
import type { ExtractedField, ExtractedFields } from '../../models/extraction.js';
import { toPromptLines } from '../layout/normalizer.js';
import { TerminalStageError } from '../pipeline/errors.js';
import { fieldTypeOf, type DocumentTypeConfig } from './document-types.js';
import type { TextGenerator } from './client.js';
import { cleanValue, parseLocaleNumber, validateExtractedFields, type FieldValue } from './validation.js';

/** Confidence given to a value the model returned but the page does not show */
export const UNMATCHED_CONFIDENCE = 0.5;

export interface FieldExtractionOptions {
  signal?: AbortSignal;
}

/**
 * Field-extraction capability consumed by the pipeline
 */
export interface FieldExtractor {
  extractFields(
    structure: NormalizedDocument,
    docType: DocumentTypeConfig,
    options?: FieldExtractionOptions
  ): Promise<ExtractedFields>;
}

const RawValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const LlmFieldSchema = z.union([
  RawValueSchema,
  z.object({ value: RawValueSchema.optional() }).passthrough(),
]);

const LlmResponseSchema = z.object({
  extracted_fields: z.record(LlmFieldSchema).default({}),
  missing_fields: z.array(z.string()).default([]),
});

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE PARSING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Pull a JSON object out of a model response that may wrap it in a fenced
 * block, prefix it with prose, or carry // comments.
 *
 * @throws TerminalStageError when no JSON object can be parsed
 */
export function extractJsonFromResponse(response: string): unknown {
  let body = response;

  const fence = body.indexOf('```');
  if (fence !== -1) {
    const start = body.indexOf('\n', fence) + 1;
    const end = body.indexOf('```', start);
    if (start > 0 && end !== -1) body = body.slice(start, end);
  }

  body = body
    .split('\n')
    .filter((line) => !/^\s*\/\//.test(line))
    .map((line) => line.replace(/([,{[\]"\d]|true|false|null)\s+\/\/.*$/, '$1'))
    .join('\n');

  const open = body.indexOf('{');
  const close = body.lastIndexOf('}');
  if (open === -1 || close < open) {
    throw new TerminalStageError('LLM response contains no JSON object', 'llm');
  }

  try {
    return JSON.parse(body.slice(open, close + 1));
  } catch (error) {
    throw new TerminalStageError(
      `Invalid JSON in LLM response: ${error instanceof Error ? error.message : String(error)}`,
      'llm',
      error
    );
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROMPT
// ═══════════════════════════════════════════════════════════════════════════════

export function buildExtractionPrompt(structure: NormalizedDocument, docType: DocumentTypeConfig): string {
  const fieldLines = docType.expectedFields.map(
    (field) => `- ${field}: ${docType.fieldDescriptions[field] ?? field}`
  );

  return [
    'Extract the following fields from the document content below.',
    '',
    'Field Descriptions:',
    ...fieldLines,
    '',
    'Document Content:',
    ...toPromptLines(structure),
    '',
    'Instructions:',
    '1. Return only a JSON object, no explanation',
    '2. Use the exact field names listed above',
    '3. Include only fields that are present in the document',
    '4. Copy values exactly as they appear, including units and currency symbols',
    '5. List expected fields you could not find under "missing_fields"',
    '',
    'Response format:',
    '{"extracted_fields": {"<field>": "<value>"}, "missing_fields": ["<field>"]}',
  ].join('\n');
}

// ═══════════════════════════════════════════════════════════════════════════════
// VALUE MATCHING
// ═══════════════════════════════════════════════════════════════════════════════

function rawValueOf(entry: z.infer<typeof LlmFieldSchema>): FieldValue {
  if (entry === null || typeof entry !== 'object') return entry;
  return entry.value ?? null;
}

const CURRENCY_MARKS = /[€$£]|\b(?:eur|usd|gbp|chf)\b/gi;

function normalizeText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-word containment; both sides already normalized */
function containsWords(haystack: string, needle: string): boolean {
  return new RegExp(`(?:^|[^\\p{L}\\p{N}])${escapeRegExp(needle)}(?:$|[^\\p{L}\\p{N}])`, 'u').test(haystack);
}

/** Numeric value of text that is only a number, optionally with a currency mark */
function numericValue(text: string): number | null {
  const stripped = text.replace(CURRENCY_MARKS, '').replace(/\s+/g, '');
  return /^-?[\d.,]*\d[\d.,]*$/.test(stripped) ? parseLocaleNumber(stripped) : null;
}

/**
 * Whether span text shows the model's value. Numbers compare by value
 * against the whole text or one of its tokens; other text must appear as
 * whole words.
 */
export function textShowsValue(spanText: string, rawValue: string): boolean {
  const number = numericValue(rawValue);
  if (number !== null) {
    return [spanText, ...spanText.split(/\s+/)].some((token) => numericValue(token) === number);
  }
  const needle = normalizeText(rawValue);
  return needle.length > 0 && containsWords(normalizeText(spanText), needle);
}

function candidateLabels(field: string, docType: DocumentTypeConfig): string[] {
  const labels = [normalizeText(field), normalizeText(field.replace(/_/g, ' '))];
  const description = docType.fieldDescriptions[field];
  if (description) labels.push(normalizeText(description));
  return labels;
}

export type FieldSource =
  | { kind: 'pair'; pair: LabelValuePair }
  | { kind: 'leftover'; span: MergedSpan; page: number }
  /** Only the label names the field; the value is the model's own */
  | { kind: 'label'; pair: LabelValuePair };

/**
 * Trace a model value back to the page: pairs whose value shows it (the
 * one whose label names the field first), then leftovers, then a pair
 * whose label names the field.
 */
export function traceFieldSource(
  structure: NormalizedDocument,
  field: string,
  rawValue: string,
  docType: DocumentTypeConfig
): FieldSource | null {
  const pairs = structure.pages.flatMap((p) => p.pairs);
  const labels = candidateLabels(field, docType);
  const namesField = (pair: LabelValuePair): boolean =>
    labels.some((label) => containsWords(normalizeText(pair.labelText), label));

  const byValue = pairs.filter((p) => textShowsValue(p.value.text, rawValue));
  if (byValue.length > 0) {
    return { kind: 'pair', pair: byValue.find(namesField) ?? byValue[0] };
  }

  for (const page of structure.pages) {
    const span = page.leftovers.find((s) => textShowsValue(s.text, rawValue));
    if (span) return { kind: 'leftover', span, page: page.pageNumber };
  }

  const byLabel = pairs.find(namesField);
  return byLabel ? { kind: 'label', pair: byLabel } : null;
}

function resolveField(
  structure: NormalizedDocument,
  field: string,
  raw: FieldValue,
  docType: DocumentTypeConfig
): ExtractedField {
  const type = fieldTypeOf(docType, field);
  if (raw === null) {
    return { value: null, confidence: 0, sourceSpanIds: [] };
  }

  const source = traceFieldSource(structure, field, String(raw).trim(), docType);
  if (source === null) {
    return { value: cleanValue(raw, type), confidence: UNMATCHED_CONFIDENCE, sourceSpanIds: [] };
  }

  switch (source.kind) {
    case 'pair':
      return {
        value: cleanValue(source.pair.value.text, type),
        confidence: source.pair.confidence,
        sourceSpanIds: [source.pair.label.id, source.pair.value.id],
        page: source.pair.page,
      };
    case 'leftover':
      return {
        value: cleanValue(source.span.text, type),
        confidence: source.span.confidence,
        sourceSpanIds: [source.span.id],
        page: source.page,
      };
    case 'label':
      return {
        value: cleanValue(raw, type),
        confidence: Math.min(source.pair.confidence, UNMATCHED_CONFIDENCE),
        sourceSpanIds: [source.pair.label.id, source.pair.value.id],
        page: source.pair.page,
      };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTOR
// ═══════════════════════════════════════════════════════════════════════════════

export class LlmFieldExtractor implements FieldExtractor {
  constructor(private readonly generator: TextGenerator) {}

  async extractFields(
    structure: NormalizedDocument,
    docType: DocumentTypeConfig,
    options: FieldExtractionOptions = {}
  ): Promise<ExtractedFields> {
    if (structure.summary.pairCount === 0 && structure.summary.leftoverCount === 0) {
      return { fields: {}, missingFields: [...docType.expectedFields], validation: {} };
    }

    const prompt = buildExtractionPrompt(structure, docType);
    const response = await this.generator.generate(prompt, { json: true, signal: options.signal });

    const parsed = LlmResponseSchema.safeParse(extractJsonFromResponse(response.text));
    if (!parsed.success) {
      throw new TerminalStageError(
        `LLM response has unexpected shape: ${parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ')}`,
        'llm'
      );
    }

    const expected = new Set(docType.expectedFields);
    const fields: Record<string, ExtractedField> = {};
    for (const [name, entry] of Object.entries(parsed.data.extracted_fields)) {
      if (expected.size > 0 && !expected.has(name)) {
        console.error(`[FieldExtractor] [WARN] Ignoring unexpected field "${name}" for ${docType.key}`);
        continue;
      }
      fields[name] = resolveField(structure, name, rawValueOf(entry), docType);
    }

    const reportedMissing = new Set(parsed.data.missing_fields);
    const missingFields = docType.expectedFields.filter(
      (name) => reportedMissing.has(name) || fields[name] === undefined || fields[name].value === null
    );

    console.error(
      `[FieldExtractor] ${Object.keys(fields).length} fields extracted, ${missingFields.length} missing (${response.model}, ${response.processingTimeMs}ms)`
    );

    return { fields, missingFields, validation: validateExtractedFields(fields, docType) };
  }
}
