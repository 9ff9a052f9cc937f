import { z } from 'zod';

// ===== Logging =====

export interface Logger {
  trace(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

// ===== Documents =====

export const DOCUMENT_TYPES = ['resume', 'job'] as const;
export type DocumentType = typeof DOCUMENT_TYPES[number];

export const SEARCH_TYPES = ['resume', 'job', 'all'] as const;
export type SearchType = typeof SEARCH_TYPES[number];

export type MetadataScalar = string | number | boolean;

/**
 * Flat metadata as stored alongside a vector. Pinecone only accepts scalar
 * values (and string lists), so nested objects are not representable.
 */
export type VectorMetadata = Record<string, MetadataScalar>;

/**
 * Caller-supplied attributes merged into document metadata. Keys listed in
 * RESERVED_METADATA_KEYS are ignored.
 */
export type ExtraAttributes = Record<string, MetadataScalar>;

export interface DocumentMetadata extends VectorMetadata {
  type: DocumentType;
  owner_id: number;
  entity_id: number;
  text_preview: string;
}

// ===== Configuration =====

export const EMBEDDING_PROVIDERS = ['google', 'openai', 'hash'] as const;
export type EmbeddingProviderId = typeof EMBEDDING_PROVIDERS[number];

export const VECTOR_INDEX_PROVIDERS = ['pinecone', 'memory'] as const;
export type VectorIndexProviderId = typeof VECTOR_INDEX_PROVIDERS[number];

export const EmbeddingConfigSchema = z.object({
  provider: z.enum(EMBEDDING_PROVIDERS).default('google'),
  model: z.string().min(1).default('text-embedding-004'),
  dimension: z.number().int().positive().default(768),
  timeoutMs: z.number().int().positive().default(15000),
  maxRetries: z.number().int().min(0).default(2),
  maxInputChars: z.number().int().positive().default(8000)
});

export const VectorIndexConfigSchema = z.object({
  provider: z.enum(VECTOR_INDEX_PROVIDERS).default('pinecone'),
  indexName: z.string().min(1).default('resume-index'),
  namespace: z.string().default(''),
  cloud: z.enum(['aws', 'gcp', 'azure']).default('aws'),
  region: z.string().min(1).default('us-east-1'),
  timeoutMs: z.number().int().positive().default(15000)
});

export const SearchConfigSchema = z.object({
  defaultTopK: z.number().int().positive().default(10),
  maxTopK: z.number().int().positive().default(50),
  // Pinecone caps topK at 1000 for queries that return metadata
  statsMaxTopK: z.number().int().positive().max(1000).default(1000),
  previewChars: z.number().int().positive().default(200)
});

export const WebSearchConfigSchema = z.object({
  enabled: z.boolean().default(true),
  baseUrl: z.string().url().default('https://api.tavily.com'),
  maxResults: z.number().int().min(1).max(10).default(5),
  timeoutMs: z.number().int().positive().default(15000)
});

export const AppConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(4100),
  host: z.string().default('127.0.0.1'),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  enableCors: z.boolean().default(true),
  corsOrigins: z.array(z.string()).default(['http://localhost:3000']),
  maxRequestSize: z.number().int().positive().default(2 * 1024 * 1024),
  rateLimiting: z.object({
    enabled: z.boolean().default(false),
    maxRequests: z.number().int().positive().default(100),
    windowMs: z.number().int().positive().default(60000)
  }).default({}),
  embedding: EmbeddingConfigSchema.default({}),
  vectorIndex: VectorIndexConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  keywords: z.object({
    maxKeywords: z.number().int().positive().default(50),
    maxInputChars: z.number().int().positive().default(8000)
  }).default({}),
  webSearch: WebSearchConfigSchema.default({})
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;
export type VectorIndexConfig = z.infer<typeof VectorIndexConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type WebSearchConfig = z.infer<typeof WebSearchConfigSchema>;

/**
 * Deeply optional view of AppConfig, used for config layers.
 */
export type AppConfigLayer = {
  [K in keyof AppConfig]?: AppConfig[K] extends unknown[]
    ? AppConfig[K]
    : AppConfig[K] extends object
      ? Partial<AppConfig[K]>
      : AppConfig[K];
};
