import { BaseRouteHandler } from './RouteContext.js';

export class HealthRoutes extends BaseRouteHandler {
  setupRoutes(): void {
    const { server } = this.ctx;

    server.get('/health', async (_request, reply) => {
      reply.send({ status: 'ok', errors: this.ctx.errorHandler.getErrorStatistics() });
    });
  }
}
