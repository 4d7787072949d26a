/**
 * Fragment Merger
 *
 * Collapses runs of horizontally close fragments in one row into spans.
 *
 * Neighbours are linked when the gap from the left group's right edge is
 * below gapThreshold and no deeper than -overlapLimit. With separateValues
 * on, a value-like fragment (digit or currency) never links to a non-value
 * one. Each merge step joins the accumulated group with the next one only
 * when their combined trimmed text reaches minMergeLength, so a chain of
 * short tokens stays apart. Passes repeat left to right until nothing
 * merges, which makes the output a fixed point of the merger.
 *
 * Pieces are joined with a space when the gap is word spacing (<= wordGap)
 * and with the configured separator otherwise.
 *
 * @module services/layout/fragment-merger
 */

import type { Fragment, MergedSpan, Row } from '../../models/layout.js';
import type { LayoutConfig } from './config.js';
import { unionBox } from './geometry.js';
import { hasValueMarker } from './span-classifier.js';
import { safeMin } from '../../utils/math.js';

type MergerConfig = Pick<
  LayoutConfig,
  | 'gapThreshold'
  | 'minMergeLength'
  | 'overlapLimit'
  | 'wordGap'
  | 'separateValues'
  | 'separator'
  | 'currencySymbols'
>;

interface Group {
  fragments: Fragment[];
  rightEdge: number;
  isValue: boolean;
  /** Sum of trimmed text lengths */
  length: number;
}

function joinerFor(previous: string, next: string, gap: number, config: MergerConfig): string {
  if (previous.length === 0 || next.length === 0) return '';
  return gap <= config.wordGap ? ' ' : config.separator;
}

function buildSpan(fragments: Fragment[], rowIndex: number, id: string, config: MergerConfig): MergedSpan {
  let text = '';
  let rightEdge = -Infinity;
  for (const [i, fragment] of fragments.entries()) {
    const piece = fragment.text.trim();
    text = i === 0 ? piece : text + joinerFor(text, piece, fragment.bbox.x1 - rightEdge, config) + piece;
    rightEdge = Math.max(rightEdge, fragment.bbox.x2);
  }

  return {
    id,
    text,
    bbox: unionBox(fragments.map((f) => f.bbox)),
    sourceFragmentIds: fragments.map((f) => f.id),
    confidence: safeMin(fragments.map((f) => f.confidence)) ?? 0,
    rowIndex,
  };
}

function singleton(fragment: Fragment, config: MergerConfig): Group {
  return {
    fragments: [fragment],
    rightEdge: fragment.bbox.x2,
    isValue: hasValueMarker(fragment.text, config.currencySymbols),
    length: fragment.text.trim().length,
  };
}

function canMerge(left: Group, right: Group, config: MergerConfig): boolean {
  const gap = right.fragments[0].bbox.x1 - left.rightEdge;
  return (
    gap >= -config.overlapLimit &&
    gap < config.gapThreshold &&
    (!config.separateValues || left.isValue === right.isValue) &&
    left.length + right.length >= config.minMergeLength
  );
}

function mergePass(groups: Group[], config: MergerConfig): Group[] {
  const merged: Group[] = [];
  for (const group of groups) {
    const last = merged[merged.length - 1];
    if (last !== undefined && canMerge(last, group, config)) {
      merged[merged.length - 1] = {
        fragments: [...last.fragments, ...group.fragments],
        rightEdge: Math.max(last.rightEdge, group.rightEdge),
        isValue: last.isValue,
        length: last.length + group.length,
      };
    } else {
      merged.push(group);
    }
  }
  return merged;
}

/**
 * Merge one row's fragments into spans.
 *
 * The result partitions the row: every fragment id appears in exactly one
 * span, in left-to-right order. Malformed geometry only prevents merging.
 *
 * @param idPrefix - prefix for span ids, e.g. 'p1-r0'
 */
export function mergeRow(row: Row, config: MergerConfig, idPrefix = `r${row.index}`): MergedSpan[] {
  let groups = row.fragments.map((f) => singleton(f, config));
  for (;;) {
    const next = mergePass(groups, config);
    if (next.length === groups.length) break;
    groups = next;
  }

  return groups.map((group, i) => buildSpan(group.fragments, row.index, `${idPrefix}-s${i}`, config));
}

/**
 * Treat spans as fragments so the merger can be re-applied to its own output
 */
export function spansAsFragments(spans: MergedSpan[]): Fragment[] {
  return spans.map((span) => ({
    id: span.id,
    text: span.text,
    bbox: span.bbox,
    confidence: span.confidence,
  }));
}
