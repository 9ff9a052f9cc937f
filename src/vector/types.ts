import type { MetadataScalar, VectorMetadata } from '../types/index.js';

export interface VectorRecord {
  id: string;
  values: number[];
  metadata: VectorMetadata;
}

export interface VectorMatch {
  id: string;
  score: number;
  metadata: VectorMetadata;
}

/**
 * Conjunction of equality predicates over metadata keys.
 */
export type MetadataFilter = Record<string, MetadataScalar>;

export interface VectorQueryOptions {
  topK: number;
  filter?: MetadataFilter;
}

export interface VectorIndex {
  readonly dimension: number;
  /** Create the index once if absent; safe to call repeatedly. */
  ensureIndex(): Promise<void>;
  /** Insert or overwrite by id. */
  upsert(record: VectorRecord): Promise<void>;
  /** At most topK matches, by descending cosine similarity. */
  query(vector: number[], options: VectorQueryOptions): Promise<VectorMatch[]>;
  /** Unknown ids are ignored. */
  delete(ids: string[]): Promise<void>;
  /** Exact count-by-filter, where the backend supports it. */
  count?(filter: MetadataFilter): Promise<number>;
}

export function matchesFilter(metadata: VectorMetadata, filter?: MetadataFilter): boolean {
  if (!filter) return true;
  for (const [key, expected] of Object.entries(filter)) {
    if (metadata[key] !== expected) return false;
  }
  return true;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const n = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < n; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
