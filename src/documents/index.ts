export * from './metadata.js';
export * from './DocumentEmbeddingStore.js';
