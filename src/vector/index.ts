export * from './types.js';
export { InMemoryVectorIndex } from './InMemoryVectorIndex.js';
export { PineconeVectorIndex, toPineconeFilter } from './PineconeVectorIndex.js';
export { createVectorIndexFromConfig } from './factory.js';
