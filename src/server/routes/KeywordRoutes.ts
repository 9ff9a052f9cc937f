import { z } from 'zod';
import { BaseRouteHandler } from './RouteContext.js';

const ExtractBodySchema = z.object({
  text: z.string(),
  maxKeywords: z.number().int().positive().max(200).optional(),
  byCategory: z.boolean().optional()
});

export class KeywordRoutes extends BaseRouteHandler {
  setupRoutes(): void {
    const { server } = this.ctx;

    server.post('/api/keywords/extract', async (request, reply) => {
      const body = this.parseOrReject(ExtractBodySchema, request.body, reply);
      if (!body) return;

      const keywords = this.ctx.keywords.extract(body.text, body.maxKeywords ?? this.ctx.config.keywords.maxKeywords);
      if (body.byCategory) {
        reply.send({ keywords, categories: this.ctx.keywords.extractByCategory(body.text) });
        return;
      }
      reply.send({ keywords });
    });
  }
}
