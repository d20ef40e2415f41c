import { createHash } from 'node:crypto';

/**
 * Deterministic JSON: keys sorted recursively, compact, no trailing newline.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (Array.isArray(value)) return value.map(sortKeys);
  if (typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      sorted[key] = sortKeys(entry);
    }
    return sorted;
  }
  return value;
}

/**
 * SHA-256 hex digest of a string or Buffer.
 */
export function sha256Hex(input: string | Buffer): string {
  return createHash('sha256').update(input).digest('hex');
}
