/**
 * Extraction Normalizer
 *
 * Runs row grouping, merging and pairing over every page and aggregates the
 * result into one NormalizedDocument, the only artifact handed to field
 * extraction. Output is a pure function of the input pages and config.
 *
 * @module services/layout/normalizer
 */

import type {
  Fragment,
  NormalizedDocument,
  NormalizedPage,
  OcrPage,
  PairingResult,
} from '../../models/layout.js';
import type { LayoutConfig } from './config.js';
import { normalizeBox } from './geometry.js';
import { groupRows } from './row-grouper.js';
import { mergeRow } from './fragment-merger.js';
import { pairAdjacentRows, pairSpans } from './label-value-pairer.js';
import { canonicalJson, computeHash } from '../../utils/hash.js';
import { clamp } from '../../utils/math.js';

/**
 * Assign ids and sanitize raw OCR fragments for one page.
 * Fragments with non-finite coordinates are dropped.
 */
export function prepareFragments(page: OcrPage): Fragment[] {
  const fragments: Fragment[] = [];
  page.fragments.forEach((raw, index) => {
    const { x1, y1, x2, y2 } = raw.bbox;
    if (![x1, y1, x2, y2].every(Number.isFinite)) {
      console.error(`[WARN] Dropping fragment ${index} on page ${page.pageNumber}: non-finite bbox`);
      return;
    }
    fragments.push({
      id: `p${page.pageNumber}-f${index}`,
      text: raw.text,
      bbox: normalizeBox(raw.bbox),
      confidence: clamp(raw.confidence, 0, 1),
    });
  });
  return fragments;
}

export function normalizePage(page: OcrPage, config: LayoutConfig): NormalizedPage {
  const fragments = prepareFragments(page);
  const rows = groupRows(fragments, config);

  const rowSpans = rows.map((row) => mergeRow(row, config, `p${page.pageNumber}-r${row.index}`));
  const rowResults: PairingResult[] = pairAdjacentRows(
    rows.map((row, i) => ({
      centerY: row.centerY,
      result: pairSpans(rowSpans[i], page.pageNumber, config),
    })),
    page.pageNumber,
    config
  );

  return {
    pageNumber: page.pageNumber,
    fragments,
    rows: rows.map((row) => ({
      index: row.index,
      centerY: row.centerY,
      fragmentIds: row.fragments.map((f) => f.id),
    })),
    mergedSpans: rowSpans.flat(),
    pairs: rowResults.flatMap((r) => r.pairs),
    leftovers: rowResults.flatMap((r) => r.leftovers),
  };
}

/**
 * Normalize a whole document. Pages are processed independently and
 * returned in ascending page-number order.
 */
export function normalizeDocument(pages: OcrPage[], config: LayoutConfig): NormalizedDocument {
  const normalized = [...pages]
    .sort((a, b) => a.pageNumber - b.pageNumber)
    .map((page) => normalizePage(page, config));

  return {
    pages: normalized,
    summary: {
      pageCount: normalized.length,
      fragmentCount: normalized.reduce((n, p) => n + p.fragments.length, 0),
      mergedCount: normalized.reduce((n, p) => n + p.mergedSpans.length, 0),
      pairCount: normalized.reduce((n, p) => n + p.pairs.length, 0),
      leftoverCount: normalized.reduce((n, p) => n + p.leftovers.length, 0),
    },
  };
}

/**
 * Plain-text rendering for prompts: one "label: value" line per pair,
 * followed by leftover span text, page by page.
 */
export function toPromptLines(doc: NormalizedDocument): string[] {
  const lines: string[] = [];
  for (const page of doc.pages) {
    lines.push(`--- Page ${page.pageNumber} ---`);
    for (const pair of page.pairs) {
      lines.push(`${pair.labelText}: ${pair.value.text} [${pair.value.id}]`);
    }
    for (const span of page.leftovers) {
      if (span.text.length > 0) lines.push(`${span.text} [${span.id}]`);
    }
  }
  return lines;
}

/**
 * Content hash of a normalized structure
 */
export function structureHash(doc: NormalizedDocument): string {
  return computeHash(canonicalJson(doc));
}
