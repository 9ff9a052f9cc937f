import { z } from 'zod';
import { SEARCH_TYPES } from '../../types/index.js';
import { BaseRouteHandler } from './RouteContext.js';

const SearchQuerySchema = z.object({
  q: z.string().default(''),
  type: z.enum(SEARCH_TYPES).default('all'),
  owner_id: z.coerce.number().int().nonnegative(),
  top_k: z.coerce.number().int().positive().optional()
});

const StatsQuerySchema = z.object({
  owner_id: z.coerce.number().int().nonnegative()
});

export class SearchRoutes extends BaseRouteHandler {
  setupRoutes(): void {
    const { server } = this.ctx;

    server.get('/api/search', async (request, reply) => {
      const query = this.parseOrReject(SearchQuerySchema, request.query, reply, 'query parameters');
      if (!query) return;

      const results = await this.ctx.search.search({
        query: query.q,
        type: query.type,
        ownerId: query.owner_id,
        topK: query.top_k
      });
      reply.send({ results });
    });

    server.get('/api/stats', async (request, reply) => {
      const query = this.parseOrReject(StatsQuerySchema, request.query, reply, 'query parameters');
      if (!query) return;

      reply.send(await this.ctx.search.stats(query.owner_id));
    });
  }
}
