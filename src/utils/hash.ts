/**
 * SHA-256 hashing for uploads and normalized structures.
 *
 * Every hash is 'sha256:' followed by 64 lowercase hex characters.
 *
 * @module utils/hash
 */

import crypto from 'crypto';

const HASH_PREFIX = 'sha256:';

/**
 * @example
 * computeHash('hello')
 * // 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 */
export function computeHash(content: string | Buffer): string {
  return HASH_PREFIX + crypto.createHash('sha256').update(content).digest('hex');
}

/**
 * JSON with object keys sorted at every level, so equal values hash equally
 * regardless of property insertion order.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, val: unknown) => {
    if (val === null || typeof val !== 'object' || Array.isArray(val)) return val;
    const sorted: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(val).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      sorted[k] = v;
    }
    return sorted;
  });
}
