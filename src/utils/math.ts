/**
 * Numeric helpers for geometry and confidence arithmetic.
 *
 * safeMin/safeMax iterate instead of spreading into Math.min/Math.max, which
 * throws a RangeError past ~65k arguments on V8.
 */

/**
 * Minimum of a numeric array, or `undefined` when empty.
 * Callers supply their own fallback via `?? defaultValue`.
 */
export function safeMin(arr: number[]): number | undefined {
  if (arr.length === 0) return undefined;
  let min = arr[0];
  for (let i = 1; i < arr.length; i++) {
    if (arr[i] < min) min = arr[i];
  }
  return min;
}

/**
 * Maximum of a numeric array, or `undefined` when empty.
 */
export function safeMax(arr: number[]): number | undefined {
  if (arr.length === 0) return undefined;
  let max = arr[0];
  for (let i = 1; i < arr.length; i++) {
    if (arr[i] > max) max = arr[i];
  }
  return max;
}

/**
 * Restrict `value` to [min, max]. NaN collapses to `min`.
 */
export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}
