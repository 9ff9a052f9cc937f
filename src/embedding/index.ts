export * from './types.js';
export { BaseEmbeddingProvider } from './BaseEmbeddingProvider.js';
export { HashEmbeddingProvider, hashEmbed } from './HashEmbeddingProvider.js';
export { AiSdkEmbeddingProvider, resolveApiKey } from './AiSdkEmbeddingProvider.js';
export { createEmbeddingProviderFromConfig } from './factory.js';
