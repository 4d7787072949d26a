/**
 * Fragment and span builders for layout tests
 */

import type { Fragment, MergedSpan, Row } from '../../../src/models/layout.js';
import { DEFAULT_LAYOUT_CONFIG } from '../../../src/services/layout/config.js';

export const config = DEFAULT_LAYOUT_CONFIG;

/**
 * Fragment on a 10-unit-high line starting at `y`
 */
export function frag(
  id: string,
  text: string,
  x1: number,
  x2: number,
  opts: { y?: number; confidence?: number } = {}
): Fragment {
  const y = opts.y ?? 0;
  return { id, text, bbox: { x1, y1: y, x2, y2: y + 10 }, confidence: opts.confidence ?? 0.9 };
}

export function row(fragments: Fragment[], index = 0): Row {
  return { index, centerY: 5, fragments };
}

export function span(
  id: string,
  text: string,
  x1: number,
  x2: number,
  confidence = 0.9,
  rowIndex = 0
): MergedSpan {
  return {
    id,
    text,
    bbox: { x1, y1: 0, x2, y2: 10 },
    sourceFragmentIds: [`${id}-f`],
    confidence,
    rowIndex,
  };
}
