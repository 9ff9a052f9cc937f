import { Pinecone, type Index } from '@pinecone-database/pinecone';
import type { Logger, VectorIndexConfig, VectorMetadata } from '../types/index.js';
import { withTimeout } from '../utils/async.js';
import { ConfigurationError, VectorIndexError, errorMessage, type VectorIndexOperation } from '../utils/errors.js';
import type { MetadataFilter, VectorIndex, VectorMatch, VectorQueryOptions, VectorRecord } from './types.js';

export interface PineconeVectorIndexOptions {
  apiKey?: string;
  indexName: string;
  dimension: number;
  namespace?: string;
  cloud?: VectorIndexConfig['cloud'];
  region?: string;
  timeoutMs?: number;
  logger: Logger;
}

type PineconeFilter = Record<string, { $eq: string | number | boolean }>;

export function toPineconeFilter(filter?: MetadataFilter): PineconeFilter | undefined {
  if (!filter) return undefined;
  const entries = Object.entries(filter);
  if (entries.length === 0) return undefined;
  const out: PineconeFilter = {};
  for (const [key, value] of entries) out[key] = { $eq: value };
  return out;
}

/**
 * Serverless Pinecone index (cosine metric) scoped to one namespace. Every
 * call is bounded by `timeoutMs`; failures surface as VectorIndexError.
 */
export class PineconeVectorIndex implements VectorIndex {
  readonly dimension: number;
  private readonly client: Pinecone;
  private readonly index: Index<VectorMetadata>;
  private readonly indexName: string;
  private readonly cloud: VectorIndexConfig['cloud'];
  private readonly region: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(opts: PineconeVectorIndexOptions) {
    const apiKey = opts.apiKey?.trim() || process.env.PINECONE_API_KEY?.trim();
    if (!apiKey) {
      throw new ConfigurationError('PINECONE_API_KEY must be set', 'vectorIndex.apiKey');
    }

    this.dimension = opts.dimension;
    this.indexName = opts.indexName;
    this.cloud = opts.cloud ?? 'aws';
    this.region = opts.region ?? 'us-east-1';
    this.timeoutMs = opts.timeoutMs ?? 15000;
    this.logger = opts.logger;

    this.client = new Pinecone({ apiKey });
    this.index = this.client.index<VectorMetadata>(opts.indexName).namespace(opts.namespace ?? '');
  }

  async ensureIndex(): Promise<void> {
    await this.call('ensureIndex', async () => {
      const { indexes } = await this.client.listIndexes();
      const existing = (indexes ?? []).find((i) => i.name === this.indexName);

      if (!existing) {
        this.logger.info('Creating Pinecone index', {
          index: this.indexName,
          dimension: this.dimension,
          cloud: this.cloud,
          region: this.region
        });
        await this.client.createIndex({
          name: this.indexName,
          dimension: this.dimension,
          metric: 'cosine',
          spec: { serverless: { cloud: this.cloud, region: this.region } },
          waitUntilReady: true,
          suppressConflicts: true
        });
        return;
      }

      if (typeof existing.dimension === 'number' && existing.dimension !== this.dimension) {
        throw new ConfigurationError(
          `Pinecone index '${this.indexName}' has dimension ${existing.dimension}, embeddings produce ${this.dimension}`,
          'embedding.dimension'
        );
      }
      this.logger.debug('Pinecone index ready', { index: this.indexName });
    });
  }

  async upsert(record: VectorRecord): Promise<void> {
    await this.call('upsert', () => this.index.upsert([
      { id: record.id, values: record.values, metadata: record.metadata }
    ]));
  }

  async query(vector: number[], options: VectorQueryOptions): Promise<VectorMatch[]> {
    const response = await this.call('query', () => this.index.query({
      vector,
      topK: Math.max(1, Math.floor(options.topK)),
      filter: toPineconeFilter(options.filter),
      includeMetadata: true
    }));

    return (response.matches ?? []).map((match) => ({
      id: match.id,
      score: match.score ?? 0,
      metadata: match.metadata ?? {}
    }));
  }

  async delete(ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    await this.call('delete', () => this.index.deleteMany(ids));
  }

  private async call<T>(operation: VectorIndexOperation, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(fn, this.timeoutMs, `Pinecone ${operation} timed out after ${this.timeoutMs}ms`);
    } catch (error) {
      if (error instanceof ConfigurationError || error instanceof VectorIndexError) throw error;
      throw new VectorIndexError(`Pinecone ${operation} failed: ${errorMessage(error)}`, operation, true, { cause: error });
    }
  }
}
