import { EventEmitter } from 'node:events';
import type { AppConfig, AppConfigLayer, Logger } from './types/index.js';
import { ConfigResolver } from './config/ConfigResolver.js';
import { Container } from './bootstrap/Container.js';
import { TOKENS } from './bootstrap/tokens.js';
import { PinoLogger } from './utils/PinoLogger.js';
import { UnifiedErrorHandler } from './utils/ErrorHandler.js';
import { createEmbeddingProviderFromConfig } from './embedding/factory.js';
import type { EmbeddingProvider } from './embedding/types.js';
import { createVectorIndexFromConfig } from './vector/factory.js';
import type { VectorIndex } from './vector/types.js';
import { DocumentEmbeddingStore } from './documents/DocumentEmbeddingStore.js';
import { KeywordExtractor } from './keywords/KeywordExtractor.js';
import { SemanticSearchService } from './search/SemanticSearchService.js';
import { TavilyClient, type WebSearchClient } from './search/TavilyClient.js';
import { SkillEvidenceAggregator } from './skills/SkillEvidenceAggregator.js';
import { SkillRecommendationService } from './skills/SkillRecommendationService.js';
import { HttpApiServer } from './server/HttpApiServer.js';

export interface AppOptions {
  configPath?: string;
  overrides?: AppConfigLayer;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Pre-built clients; replace the configured ones (tests, embedding hosts). */
  components?: {
    embeddingProvider?: EmbeddingProvider;
    vectorIndex?: VectorIndex;
    webSearch?: WebSearchClient;
  };
}

/**
 * Register every service on a fresh container. Nothing is constructed until
 * first resolved.
 */
export function buildContainer(config: AppConfig, logger: Logger, components: AppOptions['components'] = {}): Container {
  const container = new Container();
  container.registerValue(TOKENS.config, config);
  container.registerValue(TOKENS.logger, logger);
  container.singleton(TOKENS.errorHandler, () => new UnifiedErrorHandler(logger));

  const { embeddingProvider, vectorIndex, webSearch } = components;
  container.singleton(TOKENS.embeddingProvider, () =>
    embeddingProvider ?? createEmbeddingProviderFromConfig(config.embedding, { logger })
  );
  container.singleton(TOKENS.vectorIndex, () =>
    vectorIndex ?? createVectorIndexFromConfig(config.vectorIndex, { dimension: config.embedding.dimension, logger })
  );
  container.singleton(TOKENS.webSearch, () =>
    webSearch ?? new TavilyClient({ baseUrl: config.webSearch.baseUrl, timeoutMs: config.webSearch.timeoutMs, logger })
  );

  container.singleton(TOKENS.documents, (c) => new DocumentEmbeddingStore({
    provider: c.resolve(TOKENS.embeddingProvider),
    index: c.resolve(TOKENS.vectorIndex),
    logger,
    errorHandler: c.resolve(TOKENS.errorHandler),
    maxInputChars: config.embedding.maxInputChars,
    previewChars: config.search.previewChars,
    defaultTopK: config.search.defaultTopK,
    statsMaxTopK: config.search.statsMaxTopK
  }));
  container.singleton(TOKENS.search, (c) => new SemanticSearchService(c.resolve(TOKENS.documents), config.search, logger));
  container.singleton(TOKENS.keywords, () => new KeywordExtractor(undefined, { maxInputChars: config.keywords.maxInputChars }));
  container.singleton(TOKENS.aggregator, () => new SkillEvidenceAggregator());
  container.singleton(TOKENS.recommendations, (c) => new SkillRecommendationService(
    c.resolve(TOKENS.webSearch),
    c.resolve(TOKENS.aggregator),
    logger,
    { enabled: config.webSearch.enabled, maxResults: config.webSearch.maxResults }
  ));

  return container;
}

export class TailorMatchApp extends EventEmitter {
  private config?: AppConfig;
  private logger?: Logger;
  private container?: Container;
  private httpServer?: HttpApiServer;
  private _isStarted = false;
  private shutdownHandlersInstalled = false;

  constructor(private readonly options: AppOptions = {}) {
    super();
  }

  isRunning(): boolean {
    return this._isStarted;
  }

  /**
   * Load configuration, wire the services and provision the vector index.
   * Configuration errors (missing keys, index dimension mismatch) throw here.
   */
  async initialize(): Promise<HttpApiServer> {
    if (this.httpServer) return this.httpServer;

    const config = await ConfigResolver.load({
      configPath: this.options.configPath,
      overrides: this.options.overrides,
      env: this.options.env
    });
    const logger = this.options.logger ?? new PinoLogger({ level: config.logLevel });
    logger.info('Configuration loaded', {
      host: config.host,
      port: config.port,
      embeddingProvider: config.embedding.provider,
      vectorIndexProvider: config.vectorIndex.provider
    });

    const container = buildContainer(config, logger, this.options.components);
    await container.resolve(TOKENS.vectorIndex).ensureIndex();

    const httpServer = new HttpApiServer(config, logger, {
      documents: container.resolve(TOKENS.documents),
      search: container.resolve(TOKENS.search),
      keywords: container.resolve(TOKENS.keywords),
      aggregator: container.resolve(TOKENS.aggregator),
      recommendations: container.resolve(TOKENS.recommendations),
      errorHandler: container.resolve(TOKENS.errorHandler)
    });

    this.config = config;
    this.logger = logger;
    this.container = container;
    this.httpServer = httpServer;
    return httpServer;
  }

  async start(): Promise<void> {
    if (this._isStarted) {
      throw new Error('App is already started');
    }

    const httpServer = await this.initialize();
    await httpServer.start();
    this._isStarted = true;
    this.logger?.info('Tailor match service started');
    this.emit('started');
  }

  async stop(): Promise<void> {
    if (!this.httpServer) return;

    try {
      if (this._isStarted) await this.httpServer.stop();
    } finally {
      this._isStarted = false;
      this.httpServer = undefined;
      this.container = undefined;
    }
    this.logger?.info('Tailor match service stopped');
    this.emit('stopped');
  }

  getConfig(): AppConfig | undefined {
    return this.config;
  }

  getContainer(): Container | undefined {
    return this.container;
  }

  enableGracefulShutdown(): void {
    if (this.shutdownHandlersInstalled) return;
    this.shutdownHandlersInstalled = true;

    const shutdown = (signal: NodeJS.Signals) => {
      this.logger?.info(`Received ${signal}, shutting down gracefully...`);
      this.stop().then(
        () => process.exit(0),
        (error: unknown) => {
          this.logger?.error('Error during shutdown:', error);
          process.exit(1);
        }
      );
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  }
}

export function createApp(options?: AppOptions): TailorMatchApp {
  return new TailorMatchApp(options);
}
