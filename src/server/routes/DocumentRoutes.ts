import { z } from 'zod';
import { DOCUMENT_TYPES } from '../../types/index.js';
import { BaseRouteHandler } from './RouteContext.js';

const TypeParamsSchema = z.object({
  type: z.enum(DOCUMENT_TYPES)
});

const DocumentParamsSchema = TypeParamsSchema.extend({
  entityId: z.coerce.number().int().nonnegative()
});

const StoreBodySchema = z.object({
  ownerId: z.number().int().nonnegative(),
  text: z.string(),
  metadata: z.record(z.union([z.string(), z.number(), z.boolean()])).optional()
});

const DeleteQuerySchema = z.object({
  owner_id: z.coerce.number().int().nonnegative()
});

// Owner scoping is mandatory over HTTP; cross-owner search stays library-only
const SimilarBodySchema = z.object({
  query: z.string().min(1),
  ownerId: z.number().int().nonnegative(),
  topK: z.number().int().positive().max(100).optional()
});

const MatchBodySchema = z.object({
  jobText: z.string().min(1),
  ownerId: z.number().int().nonnegative(),
  topK: z.number().int().positive().max(100).optional()
});

export class DocumentRoutes extends BaseRouteHandler {
  setupRoutes(): void {
    const { server } = this.ctx;

    server.put('/api/documents/:type/:entityId', async (request, reply) => {
      const params = this.parseOrReject(DocumentParamsSchema, request.params, reply, 'path parameters');
      if (!params) return;
      const body = this.parseOrReject(StoreBodySchema, request.body, reply);
      if (!body) return;

      const stored = await this.ctx.documents.store({
        type: params.type,
        entityId: params.entityId,
        ownerId: body.ownerId,
        text: body.text,
        extra: body.metadata
      });
      reply.send({ success: true, stored });
    });

    server.delete('/api/documents/:type/:entityId', async (request, reply) => {
      const params = this.parseOrReject(DocumentParamsSchema, request.params, reply, 'path parameters');
      if (!params) return;
      const query = this.parseOrReject(DeleteQuerySchema, request.query, reply, 'query parameters');
      if (!query) return;

      const deleted = await this.ctx.documents.delete(params.type, params.entityId, query.owner_id);
      reply.send({ success: true, deleted });
    });

    server.post('/api/documents/:type/similar', async (request, reply) => {
      const params = this.parseOrReject(TypeParamsSchema, request.params, reply, 'path parameters');
      if (!params) return;
      const body = this.parseOrReject(SimilarBodySchema, request.body, reply);
      if (!body) return;

      const matches = await this.ctx.documents.findSimilar(params.type, body.query, {
        ownerId: body.ownerId,
        topK: body.topK
      });
      reply.send({ matches });
    });

    server.post('/api/resumes/match', async (request, reply) => {
      const body = this.parseOrReject(MatchBodySchema, request.body, reply);
      if (!body) return;

      const matches = await this.ctx.documents.findMatchingResumesForOwner(body.jobText, body.ownerId, body.topK);
      reply.send({ matches });
    });
  }
}
