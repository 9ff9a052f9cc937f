import Fastify, { type FastifyError, type FastifyInstance, type FastifyReply } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import type { AppConfig, Logger } from '../types/index.js';
import { runWithTrace, traceIdFromHeader } from '../observability/trace.js';
import {
  DocumentRoutes,
  HealthRoutes,
  KeywordRoutes,
  SearchRoutes,
  SkillRoutes,
  type ErrorResponseOptions,
  type RouteContext,
  type RouteServices
} from './routes/index.js';

export class HttpApiServer {
  private readonly server: FastifyInstance;

  constructor(
    private readonly config: AppConfig,
    private readonly logger: Logger,
    private readonly services: RouteServices
  ) {
    this.server = Fastify({
      logger: false, // We'll use our own logger
      bodyLimit: config.maxRequestSize
    });

    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandlers();
  }

  async start(): Promise<void> {
    try {
      const { host, port } = this.config;
      await this.server.listen({ host, port });
      this.logger.info(`HTTP API server started on http://${host}:${port}`);
    } catch (error) {
      this.logger.error('Failed to start HTTP API server:', error);
      throw error;
    }
  }

  async stop(): Promise<void> {
    try {
      await this.server.close();
      this.logger.info('HTTP API server stopped');
    } catch (error) {
      this.logger.error('Error stopping HTTP API server:', error);
      throw error;
    }
  }

  getServer(): FastifyInstance {
    return this.server;
  }

  private createRouteContext(server: FastifyInstance): RouteContext {
    return {
      ...this.services,
      server,
      logger: this.logger,
      config: this.config,
      respondError: this.respondError.bind(this)
    };
  }

  // Routes load as a plugin after rate-limit, helmet and cors so their hooks apply
  private setupRoutes(): void {
    this.server.register(async (instance) => {
      const routeContext = this.createRouteContext(instance);

      new HealthRoutes(routeContext).setupRoutes();
      new SearchRoutes(routeContext).setupRoutes();
      new DocumentRoutes(routeContext).setupRoutes();
      new KeywordRoutes(routeContext).setupRoutes();
      new SkillRoutes(routeContext).setupRoutes();
    });
  }

  private setupMiddleware(): void {
    // Trace id first, so every later hook and handler logs with it
    this.server.addHook('onRequest', (request, reply, done) => {
      const traceId = traceIdFromHeader(request.headers['x-request-id']);
      reply.header('x-request-id', traceId);
      runWithTrace(traceId, done);
    });

    if (this.config.rateLimiting.enabled) {
      this.server.register(rateLimit, {
        max: this.config.rateLimiting.maxRequests,
        timeWindow: this.config.rateLimiting.windowMs
      });
    }

    // JSON API only: no scripts, no framing
    this.server.register(helmet, {
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'none'"],
          frameAncestors: ["'none'"]
        }
      },
      frameguard: { action: 'deny' },
      referrerPolicy: { policy: 'no-referrer' },
      hsts: this.isLoopback() ? false : { maxAge: 31536000 }
    });

    this.server.register(cors, {
      origin: (origin, cb) => {
        // Requests without origin (curl, server-to-server) are always allowed
        if (!origin) return cb(null, true);
        if (!this.config.enableCors) return cb(null, false);

        const normalized = origin.replace(/\/$/, '');
        const allowed = this.config.corsOrigins.some((a) => a.replace(/\/$/, '') === normalized);
        cb(null, allowed);
      },
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-Id']
    });

    this.server.addHook('onRequest', async (request) => {
      this.logger.debug(`${request.method} ${request.url}`, {
        ip: request.ip,
        userAgent: request.headers['user-agent']
      });
    });

    this.server.addHook('onResponse', async (request, reply) => {
      this.logger.debug(`${request.method} ${request.url} - ${reply.statusCode}`, {
        responseTime: reply.elapsedTime
      });
    });
  }

  // Unified error response helper
  private respondError(reply: FastifyReply, status: number, message: string, opts?: ErrorResponseOptions): FastifyReply {
    const payload = {
      success: false,
      error: {
        message,
        code: opts?.code || 'INTERNAL_ERROR',
        recoverable: opts?.recoverable ?? false,
        meta: opts?.meta
      }
    };
    const log = status >= 500 ? this.logger.error : this.logger.warn;
    log.call(this.logger, message, { code: payload.error.code, httpStatus: status });
    return reply.code(status).send(payload);
  }

  private setupErrorHandlers(): void {
    this.server.setErrorHandler(async (error: FastifyError, request, reply) => {
      const status = error.statusCode ?? 500;
      if (status < 500) {
        return this.respondError(reply, status, error.message, {
          code: status === 429 ? 'RATE_LIMITED' : 'BAD_REQUEST',
          recoverable: true
        });
      }

      this.services.errorHandler.handleError(error, { operation: `${request.method} ${request.routeOptions.url ?? request.url}` });
      return this.respondError(reply, 500, 'Internal Server Error', { code: 'INTERNAL_ERROR' });
    });

    this.server.setNotFoundHandler(async (request, reply) => {
      return this.respondError(reply, 404, `Route ${request.method} ${request.url} not found`, {
        code: 'NOT_FOUND',
        recoverable: false
      });
    });
  }

  private isLoopback(): boolean {
    return this.config.host === '127.0.0.1' || this.config.host === 'localhost' || this.config.host === '::1';
  }
}
