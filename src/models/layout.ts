/**
 * Layout interfaces for spatial reconstruction
 *
 * Fragments come from the OCR engine; rows, merged spans and label/value
 * pairs are derived per page and handed to field extraction by value.
 */

/**
 * Axis-aligned bounding box in page coordinates (origin top-left)
 */
export interface BoundingBox {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

/**
 * One OCR-detected text token
 */
export interface Fragment {
  /** Stable id within a document: 'p{page}-f{index}' */
  id: string;
  text: string;
  bbox: BoundingBox;
  /** OCR confidence in [0, 1] */
  confidence: number;
}

/**
 * Fragment as returned by the OCR engine, before ids are assigned
 */
export type RawFragment = Omit<Fragment, 'id'>;

/**
 * Fragments judged to lie on the same visual line, ordered left-to-right
 */
export interface Row {
  /** 0-indexed position top-to-bottom */
  index: number;
  /** Mean vertical centre of the member fragments */
  centerY: number;
  fragments: Fragment[];
}

/**
 * One or more adjacent fragments combined into a single text unit
 */
export interface MergedSpan {
  /** 'p{page}-r{row}-s{index}' */
  id: string;
  text: string;
  /** Union of the source fragment boxes */
  bbox: BoundingBox;
  /** Source fragment ids, left-to-right */
  sourceFragmentIds: string[];
  /** Minimum confidence of the source fragments */
  confidence: number;
  /** Index of the row the span was built from */
  rowIndex: number;
}

export type SpanClass = 'label' | 'value' | 'ambiguous';

export interface LabelValuePair {
  label: MergedSpan;
  value: MergedSpan;
  /** Label text without a trailing ':' or '?' */
  labelText: string;
  confidence: number;
  /** 1-indexed page number */
  page: number;
  /** Unconsumed spans passed over between label and value */
  skips: number;
  /** True when label and value come from consecutive rows */
  crossRow: boolean;
}

export interface PairingResult {
  pairs: LabelValuePair[];
  leftovers: MergedSpan[];
}

/**
 * OCR output for one page
 */
export interface OcrPage {
  /** 1-indexed page number */
  pageNumber: number;
  fragments: RawFragment[];
  width?: number;
  height?: number;
}

export interface NormalizedRow {
  index: number;
  centerY: number;
  fragmentIds: string[];
}

export interface NormalizedPage {
  pageNumber: number;
  fragments: Fragment[];
  rows: NormalizedRow[];
  mergedSpans: MergedSpan[];
  pairs: LabelValuePair[];
  leftovers: MergedSpan[];
}

export interface NormalizedSummary {
  pageCount: number;
  fragmentCount: number;
  mergedCount: number;
  pairCount: number;
  leftoverCount: number;
}

/**
 * Per-document structure handed to the field-extraction capability
 */
export interface NormalizedDocument {
  pages: NormalizedPage[];
  summary: NormalizedSummary;
}
