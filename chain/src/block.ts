import crypto from 'crypto';
import type { Block, Hash } from './types.js';

/**
 * Serializes a JSON-compatible value with object keys sorted at every depth,
 * so two nodes building the same block in a different key order agree on it.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return '[' + value.map(v => canonicalJson(v)).join(',') + ']';
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return '{' + entries.map(([k, v]) => JSON.stringify(k) + ':' + canonicalJson(v)).join(',') + '}';
  }
  return JSON.stringify(value) ?? 'null';
}

export function sha256Hex(input: string): Hash {
  return crypto.createHash('sha256').update(input).digest('hex');
}

/**
 * Canonical block digest. A `hash` field carried alongside the block (as some
 * peers attach one) never takes part in its own digest.
 */
export function hashBlock(block: Block): Hash {
  const { hash: _ignored, ...content }: Block & { hash?: unknown } = block;
  return sha256Hex(canonicalJson(content));
}
