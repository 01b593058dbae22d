/**
 * Content hashing helpers shared by the renderer and the manifest tracker.
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';

export function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Hash an ordered list of input hashes. Each part is length-prefixed so that
 * ["ab", "c"] and ["a", "bc"] never collide.
 */
export function computeInputHash(parts: readonly string[]): string {
  const h = createHash('sha256');
  for (const part of parts) {
    h.update(`${Buffer.byteLength(part, 'utf8')}:`);
    h.update(part);
  }
  return h.digest('hex');
}

export async function hashFile(file: string): Promise<string> {
  const h = createHash('sha256');
  for await (const chunk of createReadStream(file)) {
    h.update(chunk);
  }
  return h.digest('hex');
}

/**
 * JSON serialization with object keys sorted, so structurally equal values
 * hash identically regardless of construction order.
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`;
}
