import type { AppConfig, Logger } from '../types/index.js';
import type { EmbeddingProvider } from '../embedding/types.js';
import type { VectorIndex } from '../vector/types.js';
import type { DocumentEmbeddingStore } from '../documents/DocumentEmbeddingStore.js';
import type { KeywordExtractor } from '../keywords/KeywordExtractor.js';
import type { SemanticSearchService } from '../search/SemanticSearchService.js';
import type { WebSearchClient } from '../search/TavilyClient.js';
import type { SkillEvidenceAggregator } from '../skills/SkillEvidenceAggregator.js';
import type { SkillRecommendationService } from '../skills/SkillRecommendationService.js';
import type { UnifiedErrorHandler } from '../utils/ErrorHandler.js';
import { Token } from './Container.js';

export const TOKENS = {
  config: new Token<AppConfig>('config'),
  logger: new Token<Logger>('logger'),
  errorHandler: new Token<UnifiedErrorHandler>('errorHandler'),
  embeddingProvider: new Token<EmbeddingProvider>('embeddingProvider'),
  vectorIndex: new Token<VectorIndex>('vectorIndex'),
  documents: new Token<DocumentEmbeddingStore>('documents'),
  search: new Token<SemanticSearchService>('search'),
  keywords: new Token<KeywordExtractor>('keywords'),
  webSearch: new Token<WebSearchClient>('webSearch'),
  aggregator: new Token<SkillEvidenceAggregator>('aggregator'),
  recommendations: new Token<SkillRecommendationService>('recommendations')
} as const;
