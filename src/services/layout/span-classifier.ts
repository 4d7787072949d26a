/**
 * Span classification
 *
 * Total function from span text features to a classification tag. Rules are
 * evaluated in order; the first that matches wins:
 *
 *   1. ends with ':' or '?'             -> label
 *   2. contains a digit or currency mark -> value
 *   3. contains '/'                      -> label
 *   4. shorter than shortLabelLength     -> ambiguous (label or value)
 *   5. otherwise                         -> value
 *
 * @module services/layout/span-classifier
 */

import type { SpanClass } from '../../models/layout.js';
import type { LayoutConfig } from './config.js';

type ClassifierConfig = Pick<LayoutConfig, 'shortLabelLength' | 'currencySymbols'>;

export interface SpanFeatures {
  length: number;
  endsWithColon: boolean;
  hasValueMarker: boolean;
  hasSlash: boolean;
  isShort: boolean;
}

const DIGIT = /\d/;

/**
 * True when the text contains a digit or one of the currency symbols
 */
export function hasValueMarker(text: string, currencySymbols: string): boolean {
  if (DIGIT.test(text)) return true;
  for (const symbol of currencySymbols) {
    if (text.includes(symbol)) return true;
  }
  return false;
}

export function spanFeatures(text: string, config: ClassifierConfig): SpanFeatures {
  const trimmed = text.trim();
  return {
    length: trimmed.length,
    endsWithColon: trimmed.endsWith(':') || trimmed.endsWith('?'),
    hasValueMarker: hasValueMarker(trimmed, config.currencySymbols),
    hasSlash: trimmed.includes('/'),
    isShort: trimmed.length < config.shortLabelLength,
  };
}

export function classifyFeatures(features: SpanFeatures): SpanClass {
  if (features.endsWithColon) return 'label';
  if (features.hasValueMarker) return 'value';
  if (features.hasSlash) return 'label';
  if (features.isShort) return 'ambiguous';
  return 'value';
}

export function classifySpan(text: string, config: ClassifierConfig): SpanClass {
  return classifyFeatures(spanFeatures(text, config));
}

/**
 * Whether a span may act as the label side of a pair
 */
export function canBeLabel(text: string, config: ClassifierConfig): boolean {
  if (text.trim().length === 0) return false;
  const cls = classifySpan(text, config);
  return cls === 'label' || cls === 'ambiguous';
}

/**
 * Whether `candidate` reads as a value for `labelText`: not itself a strong
 * label, and either value-marked or longer than the label.
 */
export function isValueFor(labelText: string, candidate: string, config: ClassifierConfig): boolean {
  const features = spanFeatures(candidate, config);
  if (features.length === 0) return false;
  if (classifyFeatures(features) === 'label') return false;
  return features.hasValueMarker || features.length > labelText.trim().length;
}

/**
 * Label text with a trailing ':' or '?' removed
 */
export function cleanLabelText(text: string): string {
  return text
    .trim()
    .replace(/[:?]+$/, '')
    .trim();
}
