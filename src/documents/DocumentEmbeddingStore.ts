import { DOCUMENT_TYPES, type DocumentType, type ExtraAttributes, type Logger, type SearchType, type VectorMetadata } from '../types/index.js';
import type { EmbeddingProvider, EmbeddingPurpose, EmbeddingVector } from '../embedding/types.js';
import type { MetadataFilter, VectorIndex } from '../vector/types.js';
import { UnifiedErrorHandler, type ErrorContext } from '../utils/ErrorHandler.js';
import { buildMetadata, readNumber, readString, vectorId } from './metadata.js';

export interface StoreDocumentInput {
  type: DocumentType;
  entityId: number;
  ownerId: number;
  text: string;
  extra?: ExtraAttributes;
}

export interface FindSimilarOptions {
  ownerId?: number;
  topK?: number;
}

export interface DocumentMatch {
  id: string;
  type?: DocumentType;
  entityId?: number;
  ownerId?: number;
  score: number;
  textPreview: string;
  metadata: VectorMetadata;
}

export interface ResumeMatch {
  resumeId?: number;
  similarityScore: number;
  textPreview: string;
  metadata: VectorMetadata;
}

export interface DocumentStats {
  resumes: number;
  jobs: number;
}

export interface DocumentEmbeddingStoreOptions {
  provider: EmbeddingProvider;
  index: VectorIndex;
  logger: Logger;
  errorHandler?: UnifiedErrorHandler;
  /** Input longer than this is cut before embedding. */
  maxInputChars?: number;
  previewChars?: number;
  defaultTopK?: number;
  /** Upper bound used when stats fall back to a zero-vector query. */
  statsMaxTopK?: number;
}

function toDocumentType(value: string): DocumentType | undefined {
  return DOCUMENT_TYPES.find((t) => t === value);
}

/**
 * Stores resume and job embeddings with per-owner isolation. Every public
 * operation reports failure through its return value; nothing here throws
 * for provider or index errors.
 */
export class DocumentEmbeddingStore {
  private readonly provider: EmbeddingProvider;
  private readonly index: VectorIndex;
  private readonly logger: Logger;
  private readonly errorHandler: UnifiedErrorHandler;
  private readonly maxInputChars: number;
  private readonly previewChars: number;
  private readonly defaultTopK: number;
  private readonly statsMaxTopK: number;

  constructor(opts: DocumentEmbeddingStoreOptions) {
    this.provider = opts.provider;
    this.index = opts.index;
    this.logger = opts.logger;
    this.errorHandler = opts.errorHandler ?? new UnifiedErrorHandler(opts.logger);
    this.maxInputChars = opts.maxInputChars ?? 8000;
    this.previewChars = opts.previewChars ?? 200;
    this.defaultTopK = opts.defaultTopK ?? 5;
    this.statsMaxTopK = opts.statsMaxTopK ?? 1000;
  }

  async store(input: StoreDocumentInput): Promise<boolean> {
    const { type, entityId, ownerId } = input;
    const text = typeof input.text === 'string' ? input.text.slice(0, this.maxInputChars) : '';
    if (!text.trim()) {
      this.logger.warn('Skipping embedding for empty text', { type, entityId, ownerId });
      return false;
    }

    const vector = await this.embed(text, 'document');
    if (!vector) {
      this.logger.warn('Embedding unavailable, document not stored', { type, entityId, ownerId });
      return false;
    }

    try {
      await this.index.upsert({
        id: vectorId(type, ownerId, entityId),
        values: vector,
        metadata: buildMetadata(
          { type, ownerId, entityId, text, extra: input.extra, previewChars: this.previewChars },
          this.logger
        )
      });
      this.logger.info('Stored document embedding', { type, entityId, ownerId });
      return true;
    } catch (error) {
      this.fail(error, { operation: 'store', type, entityId, ownerId });
      return false;
    }
  }

  /**
   * Nearest documents of `type` to the query text. `'all'` searches both
   * types; `ownerId` restricts results to one owner.
   */
  async findSimilar(type: SearchType, queryText: string, options: FindSimilarOptions = {}): Promise<DocumentMatch[]> {
    const vector = await this.embed(queryText, 'query');
    if (!vector) return [];

    const filter: MetadataFilter = {};
    if (type !== 'all') filter.type = type;
    if (options.ownerId !== undefined) filter.owner_id = options.ownerId;

    try {
      const matches = await this.index.query(vector, {
        topK: options.topK ?? this.defaultTopK,
        filter
      });
      return matches.map((match) => ({
        id: match.id,
        type: toDocumentType(readString(match.metadata, 'type')),
        entityId: readNumber(match.metadata, 'entity_id'),
        ownerId: readNumber(match.metadata, 'owner_id'),
        score: match.score,
        textPreview: readString(match.metadata, 'text_preview'),
        metadata: match.metadata
      }));
    } catch (error) {
      this.fail(error, { operation: 'findSimilar', type, ownerId: options.ownerId });
      return [];
    }
  }

  async findMatchingResumesForOwner(jobText: string, ownerId: number, topK = 3): Promise<ResumeMatch[]> {
    const matches = await this.findSimilar('resume', jobText, { ownerId, topK });
    return matches.map((match) => ({
      resumeId: readNumber(match.metadata, 'resume_id') ?? match.entityId,
      similarityScore: match.score,
      textPreview: match.textPreview,
      metadata: match.metadata
    }));
  }

  async delete(type: DocumentType, entityId: number, ownerId: number): Promise<boolean> {
    try {
      await this.index.delete([vectorId(type, ownerId, entityId)]);
      this.logger.info('Deleted document embedding', { type, entityId, ownerId });
      return true;
    } catch (error) {
      this.fail(error, { operation: 'delete', type, entityId, ownerId });
      return false;
    }
  }

  /**
   * Per-owner document counts. Exact when the index can count by filter;
   * otherwise bounded by `statsMaxTopK`.
   */
  async stats(ownerId: number): Promise<DocumentStats> {
    try {
      const [resumes, jobs] = await Promise.all([
        this.countType('resume', ownerId),
        this.countType('job', ownerId)
      ]);
      return { resumes, jobs };
    } catch (error) {
      this.fail(error, { operation: 'stats', ownerId });
      return { resumes: 0, jobs: 0 };
    }
  }

  storeResume(resumeId: number, ownerId: number, text: string, extra?: ExtraAttributes): Promise<boolean> {
    return this.store({ type: 'resume', entityId: resumeId, ownerId, text, extra });
  }

  storeJob(jobId: number, ownerId: number, text: string, extra?: ExtraAttributes): Promise<boolean> {
    return this.store({ type: 'job', entityId: jobId, ownerId, text, extra });
  }

  deleteResume(resumeId: number, ownerId: number): Promise<boolean> {
    return this.delete('resume', resumeId, ownerId);
  }

  deleteJob(jobId: number, ownerId: number): Promise<boolean> {
    return this.delete('job', jobId, ownerId);
  }

  findSimilarResumes(queryText: string, options?: FindSimilarOptions): Promise<DocumentMatch[]> {
    return this.findSimilar('resume', queryText, options);
  }

  findSimilarJobs(queryText: string, options?: FindSimilarOptions): Promise<DocumentMatch[]> {
    return this.findSimilar('job', queryText, options);
  }

  private async countType(type: DocumentType, ownerId: number): Promise<number> {
    const filter: MetadataFilter = { type, owner_id: ownerId };
    if (this.index.count) return this.index.count(filter);

    const zero = new Array<number>(this.index.dimension).fill(0);
    const matches = await this.index.query(zero, { topK: this.statsMaxTopK, filter });
    return matches.length;
  }

  private async embed(text: string, purpose: EmbeddingPurpose): Promise<EmbeddingVector | undefined> {
    if (typeof text !== 'string' || !text.trim()) return undefined;
    try {
      const result = await this.provider.embed(text.slice(0, this.maxInputChars), { purpose });
      return result.ok ? result.vector : undefined;
    } catch (error) {
      this.fail(error, { operation: 'embed', provider: this.provider.name });
      return undefined;
    }
  }

  private fail(error: unknown, context: ErrorContext): void {
    this.errorHandler.handleError(error, context);
  }
}
