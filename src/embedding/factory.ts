import type { EmbeddingConfig, Logger } from '../types/index.js';
import { AiSdkEmbeddingProvider } from './AiSdkEmbeddingProvider.js';
import { HashEmbeddingProvider } from './HashEmbeddingProvider.js';
import type { EmbeddingProvider } from './types.js';

/**
 * Build the configured provider. Missing credentials throw ConfigurationError
 * here, before the server starts accepting requests.
 */
export function createEmbeddingProviderFromConfig(
  config: EmbeddingConfig,
  opts: { logger: Logger; apiKey?: string }
): EmbeddingProvider {
  if (config.provider === 'hash') {
    opts.logger.warn('Using offline hash embeddings; similarity reflects shared vocabulary only');
    return new HashEmbeddingProvider({ dimension: config.dimension, logger: opts.logger });
  }

  return new AiSdkEmbeddingProvider({
    provider: config.provider,
    model: config.model,
    dimension: config.dimension,
    timeoutMs: config.timeoutMs,
    maxRetries: config.maxRetries,
    apiKey: opts.apiKey,
    logger: opts.logger
  });
}
