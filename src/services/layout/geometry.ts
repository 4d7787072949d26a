/**
 * Bounding-box primitives
 *
 * @module services/layout/geometry
 */

import type { BoundingBox } from '../../models/layout.js';
import { safeMax, safeMin } from '../../utils/math.js';

/**
 * Return a box whose corners are ordered (x1 <= x2, y1 <= y2).
 * OCR engines occasionally report swapped corners for rotated text.
 */
export function normalizeBox(box: BoundingBox): BoundingBox {
  return {
    x1: Math.min(box.x1, box.x2),
    y1: Math.min(box.y1, box.y2),
    x2: Math.max(box.x1, box.x2),
    y2: Math.max(box.y1, box.y2),
  };
}

export function centerY(box: BoundingBox): number {
  return (box.y1 + box.y2) / 2;
}

/**
 * Smallest box containing every input box.
 * @throws Error if boxes is empty
 */
export function unionBox(boxes: BoundingBox[]): BoundingBox {
  const x1 = safeMin(boxes.map((b) => b.x1));
  const y1 = safeMin(boxes.map((b) => b.y1));
  const x2 = safeMax(boxes.map((b) => b.x2));
  const y2 = safeMax(boxes.map((b) => b.y2));
  if (x1 === undefined || y1 === undefined || x2 === undefined || y2 === undefined) {
    throw new Error('unionBox requires at least one box');
  }
  return { x1, y1, x2, y2 };
}
