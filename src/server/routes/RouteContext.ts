import type { FastifyInstance, FastifyReply } from 'fastify';
import type { z } from 'zod';
import type { AppConfig, Logger } from '../../types/index.js';
import type { DocumentEmbeddingStore } from '../../documents/DocumentEmbeddingStore.js';
import type { SemanticSearchService } from '../../search/SemanticSearchService.js';
import type { KeywordExtractor } from '../../keywords/KeywordExtractor.js';
import type { SkillEvidenceAggregator } from '../../skills/SkillEvidenceAggregator.js';
import type { SkillRecommendationService } from '../../skills/SkillRecommendationService.js';
import type { UnifiedErrorHandler } from '../../utils/ErrorHandler.js';

export interface ErrorResponseOptions {
  code?: string;
  recoverable?: boolean;
  meta?: unknown;
}

/**
 * Application services the routes call into.
 */
export interface RouteServices {
  documents: DocumentEmbeddingStore;
  search: SemanticSearchService;
  keywords: KeywordExtractor;
  aggregator: SkillEvidenceAggregator;
  recommendations: SkillRecommendationService;
  errorHandler: UnifiedErrorHandler;
}

/**
 * Context shared across all route handlers
 */
export interface RouteContext extends RouteServices {
  server: FastifyInstance;
  logger: Logger;
  config: AppConfig;
  respondError: (reply: FastifyReply, status: number, message: string, opts?: ErrorResponseOptions) => FastifyReply;
}

/**
 * Base class for route handlers
 */
export abstract class BaseRouteHandler {
  constructor(protected ctx: RouteContext) {}

  abstract setupRoutes(): void;

  protected respondError(reply: FastifyReply, status: number, message: string, opts?: ErrorResponseOptions) {
    return this.ctx.respondError(reply, status, message, opts);
  }

  /**
   * Validate input against a schema. On failure a 400 is sent and undefined returned.
   */
  protected parseOrReject<T extends z.ZodTypeAny>(
    schema: T,
    value: unknown,
    reply: FastifyReply,
    what = 'request body'
  ): z.output<T> | undefined {
    const result = schema.safeParse(value ?? {});
    if (result.success) return result.data;
    this.respondError(reply, 400, `Invalid ${what}`, { code: 'BAD_REQUEST', recoverable: true, meta: result.error.errors });
    return undefined;
  }
}
