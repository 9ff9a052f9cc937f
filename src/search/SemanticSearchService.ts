import type { Logger, SearchConfig, SearchType, VectorMetadata } from '../types/index.js';
import type { DocumentEmbeddingStore, DocumentStats } from '../documents/DocumentEmbeddingStore.js';

export interface SearchRequest {
  query: string;
  type?: SearchType;
  ownerId?: number;
  topK?: number;
}

export interface SearchHit {
  id: string;
  type: string;
  score: number;
  preview: string;
  metadata: VectorMetadata;
}

/**
 * User-facing semantic search over stored resumes and jobs.
 */
export class SemanticSearchService {
  constructor(
    private readonly store: DocumentEmbeddingStore,
    private readonly config: Pick<SearchConfig, 'defaultTopK' | 'maxTopK'>,
    private readonly logger: Logger
  ) {}

  async search(request: SearchRequest): Promise<SearchHit[]> {
    const query = typeof request.query === 'string' ? request.query.trim() : '';
    if (!query) return [];

    const type = request.type ?? 'all';
    const topK = this.clampTopK(request.topK);

    const matches = await this.store.findSimilar(type, query, { ownerId: request.ownerId, topK });
    this.logger.debug('Semantic search completed', { type, ownerId: request.ownerId, topK, hits: matches.length });

    return matches.map((match) => ({
      id: match.id,
      type: match.type ?? 'unknown',
      score: match.score,
      preview: match.textPreview,
      metadata: match.metadata
    }));
  }

  stats(ownerId: number): Promise<DocumentStats> {
    return this.store.stats(ownerId);
  }

  private clampTopK(topK: number | undefined): number {
    if (topK === undefined || !Number.isFinite(topK)) return Math.min(this.config.defaultTopK, this.config.maxTopK);
    return Math.max(1, Math.min(Math.floor(topK), this.config.maxTopK));
  }
}
