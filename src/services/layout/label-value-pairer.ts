/**
 * Label-Value Pairer
 *
 * Pairs label spans with value spans inside a row. A row of exactly two
 * spans where one can be a label and the other classifies as a value is
 * paired directly. Otherwise each label candidate, left to right, takes the
 * nearest unconsumed span to its right that reads as a value for it.
 *
 * Pair confidence is min(label, value) * skipPenalty^skips, clamped to [0, 1].
 * Spans that end up in no pair are returned as leftovers.
 *
 * @module services/layout/label-value-pairer
 */

import type { LabelValuePair, MergedSpan, PairingResult } from '../../models/layout.js';
import type { LayoutConfig } from './config.js';
import { canBeLabel, classifySpan, cleanLabelText, isValueFor } from './span-classifier.js';
import { clamp } from '../../utils/math.js';

type PairerConfig = Pick<
  LayoutConfig,
  | 'shortLabelLength'
  | 'currencySymbols'
  | 'skipPenalty'
  | 'allowAdjacentRowPairs'
  | 'adjacentRowMaxGap'
  | 'adjacentRowPenalty'
>;

/**
 * Deterministic pair confidence. Non-increasing in `skips`.
 */
export function pairConfidence(
  labelConfidence: number,
  valueConfidence: number,
  skips: number,
  skipPenalty: number
): number {
  const base = Math.min(labelConfidence, valueConfidence);
  return clamp(base * Math.pow(skipPenalty, Math.max(0, skips)), 0, 1);
}

function makePair(
  label: MergedSpan,
  value: MergedSpan,
  page: number,
  skips: number,
  config: PairerConfig,
  crossRow = false
): LabelValuePair {
  let confidence = pairConfidence(label.confidence, value.confidence, skips, config.skipPenalty);
  if (crossRow) confidence = clamp(confidence * config.adjacentRowPenalty, 0, 1);
  return {
    label,
    value,
    labelText: cleanLabelText(label.text),
    confidence,
    page,
    skips,
    crossRow,
  };
}

function directPair(spans: MergedSpan[], page: number, config: PairerConfig): LabelValuePair | null {
  if (spans.length !== 2) return null;
  const [left, right] = spans;
  if (classifySpan(right.text, config) === 'value' && canBeLabel(left.text, config)) {
    return makePair(left, right, page, 0, config);
  }
  // Value printed before its label, e.g. "€ 500  Fee"
  if (classifySpan(left.text, config) === 'value' && canBeLabel(right.text, config)) {
    return makePair(right, left, page, 0, config);
  }
  return null;
}

/**
 * Pair the spans of one row. Spans must be ordered left-to-right.
 */
export function pairSpans(spans: MergedSpan[], page: number, config: PairerConfig): PairingResult {
  const direct = directPair(spans, page, config);
  if (direct) return { pairs: [direct], leftovers: [] };

  const consumed = new Set<string>();
  const pairs: LabelValuePair[] = [];

  for (let i = 0; i < spans.length; i++) {
    const label = spans[i];
    if (consumed.has(label.id) || !canBeLabel(label.text, config)) continue;

    let skips = 0;
    for (let j = i + 1; j < spans.length; j++) {
      const candidate = spans[j];
      if (consumed.has(candidate.id)) continue;
      if (isValueFor(label.text, candidate.text, config)) {
        consumed.add(label.id);
        consumed.add(candidate.id);
        pairs.push(makePair(label, candidate, page, skips, config));
        break;
      }
      skips++;
    }
  }

  return { pairs, leftovers: spans.filter((s) => !consumed.has(s.id)) };
}

/**
 * Adjacent-row rule: a row whose last leftover is a strong label (ends with
 * ':' or '?') may take the first leftover of the next row as its value when
 * the rows are close enough. Operates on per-row results in row order and
 * returns new results; inputs are not mutated.
 */
export function pairAdjacentRows(
  rows: Array<{ centerY: number; result: PairingResult }>,
  page: number,
  config: PairerConfig
): PairingResult[] {
  const results: PairingResult[] = rows.map((r) => ({
    pairs: [...r.result.pairs],
    leftovers: [...r.result.leftovers],
  }));
  if (!config.allowAdjacentRowPairs) return results;

  for (let i = 0; i + 1 < rows.length; i++) {
    if (rows[i + 1].centerY - rows[i].centerY > config.adjacentRowMaxGap) continue;

    const current = results[i];
    const next = results[i + 1];
    const label = current.leftovers[current.leftovers.length - 1];
    const value = next.leftovers[0];
    if (label === undefined || value === undefined) continue;

    // Only a trailing span can reach down to the next row
    const rowSpans = [...current.pairs.flatMap((p) => [p.label, p.value]), ...current.leftovers];
    const rightmost = rowSpans.reduce((a, b) => (b.bbox.x2 > a.bbox.x2 ? b : a), label);
    if (rightmost.id !== label.id) continue;

    if (classifySpan(label.text, config) !== 'label') continue;
    if (!isValueFor(label.text, value.text, config)) continue;

    current.pairs.push(makePair(label, value, page, 0, config, true));
    current.leftovers = current.leftovers.slice(0, -1);
    next.leftovers = next.leftovers.slice(1);
  }

  return results;
}
