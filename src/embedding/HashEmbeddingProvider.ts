import type { Logger } from '../types/index.js';
import { BaseEmbeddingProvider } from './BaseEmbeddingProvider.js';

function fnv1a32(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    // hash *= 16777619 (with 32-bit overflow)
    hash = (hash + ((hash << 1) + (hash << 4) + (hash << 7) + (hash << 8) + (hash << 24))) >>> 0;
  }
  return hash >>> 0;
}

export function tokenize(text: string): string[] {
  return String(text || '').toLowerCase().split(/[^\p{L}\p{N}+#]+/u).filter(Boolean);
}

/**
 * Signed feature hashing, L2-normalised. Text without word tokens yields the
 * zero vector.
 */
export function hashEmbed(text: string, dim: number): number[] {
  const vec = new Array<number>(dim).fill(0);

  for (const tok of tokenize(text)) {
    const h = fnv1a32(tok);
    const idx = h % dim;
    const sign = (h & 0x80000000) ? -1 : 1;
    vec[idx] = (vec[idx] ?? 0) + sign;
  }

  let norm = 0;
  for (const v of vec) norm += v * v;
  norm = Math.sqrt(norm);
  if (norm > 0) {
    for (let i = 0; i < vec.length; i++) vec[i] = (vec[i] ?? 0) / norm;
  }
  return vec;
}

/**
 * Offline provider for local development and tests. Deterministic; shares
 * vocabulary overlap rather than meaning.
 */
export class HashEmbeddingProvider extends BaseEmbeddingProvider {
  readonly name = 'hash';

  constructor(opts: { dimension: number; logger: Logger }) {
    super(opts.dimension, opts.logger);
  }

  protected async compute(text: string): Promise<number[]> {
    return hashEmbed(text, this.dimension);
  }
}
