import { readFile } from 'fs/promises';
import {
  AppConfigSchema,
  EMBEDDING_PROVIDERS,
  LOG_LEVELS,
  VECTOR_INDEX_PROVIDERS,
  type AppConfig,
  type AppConfigLayer
} from '../types/index.js';
import { errorCode } from '../utils/ErrorHandler.js';
import { deepMerge, isObject } from './merge.js';

export interface ConfigLayer {
  name: string;
  priority: number;
  config: AppConfigLayer | Record<string, unknown>;
}

type InternalLayer = ConfigLayer & { index: number };

export const DEFAULT_CONFIG_PATH = './tailor.config.json';

function oneOf<T extends string>(values: readonly T[], raw: string | undefined): T | undefined {
  return values.find((v) => v === raw);
}

function positiveInt(raw: string | undefined, max = Number.MAX_SAFE_INTEGER): number | undefined {
  if (!raw) return undefined;
  const n = Number.parseInt(raw, 10);
  return Number.isInteger(n) && n >= 1 && n <= max ? n : undefined;
}

/**
 * Layered configuration: defaults < file < env < overrides. Layers with equal
 * priority apply in insertion order.
 */
export class ConfigResolver {
  private layers: InternalLayer[] = [];
  private nextIndex = 0;

  addLayer(layer: ConfigLayer): void {
    this.layers.push({ ...layer, index: this.nextIndex });
    this.nextIndex += 1;
  }

  resolve(): AppConfig {
    const ordered = [...this.layers].sort((a, b) => {
      const byPriority = a.priority - b.priority;
      return byPriority !== 0 ? byPriority : a.index - b.index;
    });

    const merged = deepMerge(...ordered.map((l) => l.config));
    return AppConfigSchema.parse(merged);
  }

  static loadDefault(): AppConfig {
    return AppConfigSchema.parse({});
  }

  static async loadFromFile(path: string): Promise<Record<string, unknown> | null> {
    try {
      const data = await readFile(path, 'utf-8');
      if (!data.trim()) {
        return null;
      }

      const parsed: unknown = JSON.parse(data);
      if (!isObject(parsed)) {
        throw new Error(`Invalid config JSON at ${path}: expected an object`);
      }
      return parsed;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  static loadFromEnv(env: NodeJS.ProcessEnv = process.env): AppConfigLayer {
    const out: AppConfigLayer = {};

    if (env.TAILOR_HOST) out.host = env.TAILOR_HOST;

    const port = positiveInt(env.TAILOR_PORT, 65535);
    if (port !== undefined) out.port = port;

    const level = oneOf(LOG_LEVELS, env.TAILOR_LOG_LEVEL);
    if (level) out.logLevel = level;

    const embedding: NonNullable<AppConfigLayer['embedding']> = {};
    const embeddingProvider = oneOf(EMBEDDING_PROVIDERS, env.EMBEDDING_PROVIDER);
    if (embeddingProvider) embedding.provider = embeddingProvider;
    if (env.EMBEDDING_MODEL) embedding.model = env.EMBEDDING_MODEL.replace(/^models\//, '');
    const dimension = positiveInt(env.VECTOR_DIMENSION);
    if (dimension !== undefined) embedding.dimension = dimension;
    if (Object.keys(embedding).length) out.embedding = embedding;

    const vectorIndex: NonNullable<AppConfigLayer['vectorIndex']> = {};
    const indexProvider = oneOf(VECTOR_INDEX_PROVIDERS, env.VECTOR_INDEX_PROVIDER);
    if (indexProvider) vectorIndex.provider = indexProvider;
    if (env.PINECONE_INDEX_NAME) vectorIndex.indexName = env.PINECONE_INDEX_NAME;
    if (env.PINECONE_NAMESPACE !== undefined) vectorIndex.namespace = env.PINECONE_NAMESPACE;
    if (env.PINECONE_ENVIRONMENT) vectorIndex.region = env.PINECONE_ENVIRONMENT;
    if (Object.keys(vectorIndex).length) out.vectorIndex = vectorIndex;

    return out;
  }

  /**
   * Resolve the full configuration from defaults, an optional JSON file, the
   * environment and programmatic overrides.
   */
  static async load(options: { configPath?: string; overrides?: AppConfigLayer; env?: NodeJS.ProcessEnv } = {}): Promise<AppConfig> {
    const env = options.env ?? process.env;
    const resolver = new ConfigResolver();
    resolver.addLayer({ name: 'defaults', priority: 0, config: ConfigResolver.loadDefault() });

    const fromFile = await ConfigResolver.loadFromFile(options.configPath ?? env.TAILOR_CONFIG ?? DEFAULT_CONFIG_PATH);
    if (fromFile) resolver.addLayer({ name: 'file', priority: 10, config: fromFile });

    resolver.addLayer({ name: 'env', priority: 20, config: ConfigResolver.loadFromEnv(env) });
    if (options.overrides) resolver.addLayer({ name: 'overrides', priority: 30, config: options.overrides });

    return resolver.resolve();
  }
}
