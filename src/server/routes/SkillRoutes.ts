import { z } from 'zod';
import { WebSearchResultInputSchema } from '../../skills/types.js';
import { BaseRouteHandler } from './RouteContext.js';

const AggregateBodySchema = z.object({
  results: z.array(WebSearchResultInputSchema)
});

const RecommendBodySchema = z.object({
  query: z.string(),
  maxResults: z.number().int().min(1).max(10).optional()
});

export class SkillRoutes extends BaseRouteHandler {
  setupRoutes(): void {
    const { server } = this.ctx;

    server.post('/api/skills/aggregate', async (request, reply) => {
      const body = this.parseOrReject(AggregateBodySchema, request.body, reply);
      if (!body) return;

      reply.send(this.ctx.aggregator.aggregate(body.results));
    });

    server.post('/api/skills/recommend', async (request, reply) => {
      const body = this.parseOrReject(RecommendBodySchema, request.body, reply);
      if (!body) return;

      reply.send(await this.ctx.recommendations.recommend(body.query, body.maxResults));
    });
  }
}
