export * from './KeywordExtractor.js';
