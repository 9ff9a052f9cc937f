import { VectorIndexError } from '../utils/errors.js';
import {
  cosineSimilarity,
  matchesFilter,
  type MetadataFilter,
  type VectorIndex,
  type VectorMatch,
  type VectorQueryOptions,
  type VectorRecord
} from './types.js';

/**
 * Exact-scan index kept in process memory. Each namespace is an isolated map;
 * ties in score are broken by ascending id.
 */
type NamespaceStore = Map<string, Map<string, VectorRecord>>;

export class InMemoryVectorIndex implements VectorIndex {
  private readonly namespaces: NamespaceStore;
  readonly dimension: number;
  private readonly namespace: string;

  constructor(opts: { dimension: number; namespace?: string; store?: NamespaceStore }) {
    this.dimension = Math.floor(opts.dimension);
    this.namespace = opts.namespace ?? '';
    this.namespaces = opts.store ?? new Map();
  }

  private get byId(): Map<string, VectorRecord> {
    let records = this.namespaces.get(this.namespace);
    if (!records) {
      records = new Map();
      this.namespaces.set(this.namespace, records);
    }
    return records;
  }

  /**
   * View of the same storage under another namespace.
   */
  withNamespace(namespace: string): InMemoryVectorIndex {
    return new InMemoryVectorIndex({ dimension: this.dimension, namespace, store: this.namespaces });
  }

  async ensureIndex(): Promise<void> {
    if (!this.namespaces.has(this.namespace)) this.namespaces.set(this.namespace, new Map());
  }

  async upsert(record: VectorRecord): Promise<void> {
    this.assertDimension(record.values, 'upsert');
    this.byId.set(record.id, {
      id: record.id,
      values: [...record.values],
      metadata: { ...record.metadata }
    });
  }

  async query(vector: number[], options: VectorQueryOptions): Promise<VectorMatch[]> {
    this.assertDimension(vector, 'query');
    const topK = Math.max(1, Math.floor(options.topK));

    const results: VectorMatch[] = [];
    for (const record of this.byId.values()) {
      if (!matchesFilter(record.metadata, options.filter)) continue;
      results.push({
        id: record.id,
        score: cosineSimilarity(vector, record.values),
        metadata: { ...record.metadata }
      });
    }

    results.sort((a, b) => (b.score - a.score) || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return results.slice(0, topK);
  }

  async delete(ids: string[]): Promise<void> {
    for (const id of ids) this.byId.delete(id);
  }

  async count(filter: MetadataFilter): Promise<number> {
    let n = 0;
    for (const record of this.byId.values()) {
      if (matchesFilter(record.metadata, filter)) n += 1;
    }
    return n;
  }

  size(): number {
    return this.byId.size;
  }

  private assertDimension(values: readonly number[], operation: 'upsert' | 'query'): void {
    if (values.length !== this.dimension) {
      throw new VectorIndexError(
        `Vector has ${values.length} dimensions, index expects ${this.dimension}`,
        operation,
        false
      );
    }
  }
}
