/**
 * Field extraction interfaces
 *
 * The field-extraction capability maps a normalized document to named
 * fields. Values are traced back to the spans they were read from.
 */

export type FieldType = 'string' | 'date' | 'currency' | 'number' | 'area' | 'boolean';

export interface FieldValidationRule {
  type?: FieldType;
  min?: number;
  max?: number;
  /** Regular expression source the value must match */
  pattern?: string;
}

export interface ExtractedField {
  value: string | number | boolean | null;
  confidence: number;
  /** Merged span ids the value was read from (empty when unmatched) */
  sourceSpanIds: string[];
  /** 1-indexed page number of the matched pair */
  page?: number;
}

export interface FieldValidationResult {
  isValid: boolean;
  errors: string[];
}

export interface ExtractedFields {
  fields: Record<string, ExtractedField>;
  missingFields: string[];
  validation: Record<string, FieldValidationResult>;
}
