import type { Logger, VectorIndexConfig } from '../types/index.js';
import { InMemoryVectorIndex } from './InMemoryVectorIndex.js';
import { PineconeVectorIndex } from './PineconeVectorIndex.js';
import type { VectorIndex } from './types.js';

export function createVectorIndexFromConfig(
  config: VectorIndexConfig,
  opts: { dimension: number; logger: Logger; apiKey?: string }
): VectorIndex {
  if (config.provider === 'memory') {
    opts.logger.warn('Using in-memory vector index; embeddings are lost on restart');
    return new InMemoryVectorIndex({ dimension: opts.dimension, namespace: config.namespace });
  }

  return new PineconeVectorIndex({
    apiKey: opts.apiKey,
    indexName: config.indexName,
    dimension: opts.dimension,
    namespace: config.namespace,
    cloud: config.cloud,
    region: config.region,
    timeoutMs: config.timeoutMs,
    logger: opts.logger
  });
}
