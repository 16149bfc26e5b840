// Shared vector helpers for the similarity paths.
import type { Embedding } from '@/models/types';

export function cosineSimilarity(a: Embedding, b: Embedding): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

/**
 * Accepts a stored vector as a number array, a JSON-style string "[0.1, 0.2]"
 * or the graph's vector rendering "<0.1, 0.2>". Returns undefined for anything else.
 */
export function parseVector(value: unknown): Embedding | undefined {
  if (Array.isArray(value)) {
    const nums = value.map((v) => (typeof v === 'string' ? Number(v.trim()) : v));
    if (nums.length === 0) return undefined;
    const vector: number[] = [];
    for (const n of nums) {
      if (typeof n !== 'number' || !Number.isFinite(n)) return undefined;
      vector.push(n);
    }
    return vector;
  }
  if (typeof value === 'string') {
    const inner = value.trim().replace(/^[[<]/, '').replace(/[\]>]$/, '').trim();
    if (!inner) return undefined;
    return parseVector(inner.split(','));
  }
  return undefined;
}
