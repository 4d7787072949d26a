/**
 * Field value cleaning and rule validation
 *
 * @module services/llm/validation
 */

import type {
  ExtractedField,
  FieldType,
  FieldValidationResult,
  FieldValidationRule,
} from '../../models/extraction.js';
import type { DocumentTypeConfig } from './document-types.js';

export type FieldValue = ExtractedField['value'];

const DATE_PATTERN = /^(\d{2})\.(\d{2})\.(\d{4})$/;

const TRUE_MARKERS = ['[x]', 'true', 'yes', 'ja'];

/**
 * Parse a number written with either German (1.234,56) or English
 * (1,234.56) grouping. The right-most separator is the decimal point when
 * both occur; a lone separator followed by exactly three digits is read as
 * thousands grouping.
 */
export function parseLocaleNumber(raw: string): number | null {
  const negative = /^\s*-/.test(raw);
  const cleaned = raw.replace(/[^\d.,]/g, '');
  if (!/\d/.test(cleaned)) return null;

  const lastDot = cleaned.lastIndexOf('.');
  const lastComma = cleaned.lastIndexOf(',');
  let normalized: string;

  if (lastDot !== -1 && lastComma !== -1) {
    const decimal = lastDot > lastComma ? '.' : ',';
    const group = decimal === '.' ? ',' : '.';
    normalized = cleaned.split(group).join('').replace(decimal, '.');
  } else if (lastDot !== -1 || lastComma !== -1) {
    const sep = lastDot !== -1 ? '.' : ',';
    const parts = cleaned.split(sep);
    const grouping = parts.length > 2 || parts[parts.length - 1].length === 3;
    normalized = grouping ? parts.join('') : parts.join('.');
  } else {
    normalized = cleaned;
  }

  const value = parseFloat(normalized);
  if (Number.isNaN(value)) return null;
  return negative ? -value : value;
}

/**
 * Convert a raw extracted value to the field's type. Unparseable input
 * becomes null.
 */
export function cleanValue(raw: FieldValue | undefined, type: FieldType): FieldValue {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === 'boolean') return type === 'boolean' || type === 'string' ? raw : null;
  if (typeof raw === 'number') {
    if (type === 'string') return String(raw);
    if (type === 'number') return Math.trunc(raw);
    if (type === 'currency' || type === 'area') return raw;
    return null;
  }

  const text = raw.trim();
  if (text.length === 0) return null;

  switch (type) {
    case 'string':
      return text;
    case 'date':
      return isValidDate(text) ? text : null;
    case 'currency':
      return parseLocaleNumber(text.replace(/[€$£¥]/g, ''));
    case 'area':
      return parseLocaleNumber(text.replace(/m²|m2|qm/gi, ''));
    case 'number': {
      const digits = text.replace(/\D/g, '');
      return digits.length > 0 ? parseInt(digits, 10) : null;
    }
    case 'boolean': {
      const lower = text.toLowerCase();
      return TRUE_MARKERS.some((marker) => lower.includes(marker));
    }
  }
}

/**
 * DD.MM.YYYY naming a real calendar day
 */
export function isValidDate(text: string): boolean {
  const match = DATE_PATTERN.exec(text);
  if (!match) return false;
  const [, dd, mm, yyyy] = match;
  const day = Number(dd);
  const month = Number(mm);
  const year = Number(yyyy);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

function isNumericType(type: FieldType | undefined): boolean {
  return type === 'number' || type === 'currency' || type === 'area';
}

export function validateField(value: FieldValue, rule: FieldValidationRule): FieldValidationResult {
  const errors: string[] = [];

  if (value === null) {
    return { isValid: false, errors: ['Value is missing'] };
  }

  if (isNumericType(rule.type) && typeof value !== 'number') {
    errors.push('Value must be a number');
  } else if (rule.type === 'boolean' && typeof value !== 'boolean') {
    errors.push('Value must be a boolean');
  } else if (rule.type === 'date' && (typeof value !== 'string' || !isValidDate(value))) {
    errors.push('Value must be a date in DD.MM.YYYY format');
  }

  if (typeof value === 'number') {
    if (rule.min !== undefined && value < rule.min) {
      errors.push(`Value must be at least ${rule.min}`);
    }
    if (rule.max !== undefined && value > rule.max) {
      errors.push(`Value must be at most ${rule.max}`);
    }
  }

  if (rule.pattern !== undefined && !new RegExp(rule.pattern).test(String(value))) {
    errors.push('Value does not match required pattern');
  }

  return { isValid: errors.length === 0, errors };
}

/**
 * Validate every extracted field that has a rule
 */
export function validateExtractedFields(
  fields: Record<string, ExtractedField>,
  docType: DocumentTypeConfig
): Record<string, FieldValidationResult> {
  const results: Record<string, FieldValidationResult> = {};
  for (const [name, field] of Object.entries(fields)) {
    const rule = docType.validationRules[name];
    if (rule) results[name] = validateField(field.value, rule);
  }
  return results;
}
