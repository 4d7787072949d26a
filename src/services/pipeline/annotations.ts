/**
 * Annotation overlay ('annotated' artifact)
 *
 * A JSON description of what to draw over each page for visual review:
 * label, value and leftover boxes, with the field each span was assigned
 * to. Rendering it is left to the viewer.
 *
 * @module services/pipeline/annotations
 */

import type { ExtractedFields } from '../../models/extraction.js';
import type { BoundingBox, MergedSpan, NormalizedDocument } from '../../models/layout.js';

export type AnnotationKind = 'label' | 'value' | 'leftover';

export interface AnnotationBox {
  kind: AnnotationKind;
  spanId: string;
  text: string;
  bbox: BoundingBox;
  confidence: number;
  /** Extracted field this span supports, if any */
  field: string | null;
}

export interface AnnotationOverlay {
  documentId: string;
  pages: Array<{ pageNumber: number; boxes: AnnotationBox[] }>;
}

function fieldsBySpan(extracted: ExtractedFields | null): Map<string, string> {
  const map = new Map<string, string>();
  if (!extracted) return map;
  for (const [name, field] of Object.entries(extracted.fields)) {
    for (const spanId of field.sourceSpanIds) {
      if (!map.has(spanId)) map.set(spanId, name);
    }
  }
  return map;
}

export function buildAnnotationOverlay(
  documentId: string,
  structure: NormalizedDocument,
  extracted: ExtractedFields | null
): AnnotationOverlay {
  const assigned = fieldsBySpan(extracted);
  const box = (kind: AnnotationKind, span: MergedSpan, confidence: number): AnnotationBox => ({
    kind,
    spanId: span.id,
    text: span.text,
    bbox: span.bbox,
    confidence,
    field: assigned.get(span.id) ?? null,
  });

  return {
    documentId,
    pages: structure.pages.map((page) => ({
      pageNumber: page.pageNumber,
      boxes: [
        ...page.pairs.flatMap((pair) => [
          box('label', pair.label, pair.confidence),
          box('value', pair.value, pair.confidence),
        ]),
        ...page.leftovers.map((span) => box('leftover', span, span.confidence)),
      ],
    })),
  };
}
