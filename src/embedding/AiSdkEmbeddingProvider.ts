import { embed, type EmbeddingModel } from 'ai';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import type { Logger } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { BaseEmbeddingProvider } from './BaseEmbeddingProvider.js';
import type { EmbeddingPurpose } from './types.js';

export type AiSdkEmbeddingProviderId = 'google' | 'openai';

export interface AiSdkEmbeddingProviderOptions {
  provider: AiSdkEmbeddingProviderId;
  model: string;
  dimension: number;
  logger: Logger;
  /** Falls back to the provider's environment variable. */
  apiKey?: string;
  timeoutMs?: number;
  maxRetries?: number;
}

const API_KEY_ENV: Record<AiSdkEmbeddingProviderId, string[]> = {
  google: ['GOOGLE_GENERATIVE_AI_API_KEY', 'GOOGLE_API_KEY'],
  openai: ['OPENAI_API_KEY']
};

export function resolveApiKey(provider: AiSdkEmbeddingProviderId, env: NodeJS.ProcessEnv = process.env): string | undefined {
  for (const name of API_KEY_ENV[provider]) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  return undefined;
}

/**
 * Remote embeddings through the AI SDK. Every call is bounded by `timeoutMs`
 * and retried up to `maxRetries` times by the SDK.
 */
export class AiSdkEmbeddingProvider extends BaseEmbeddingProvider {
  readonly name: string;
  private readonly model: EmbeddingModel<string>;
  private readonly provider: AiSdkEmbeddingProviderId;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;

  constructor(opts: AiSdkEmbeddingProviderOptions) {
    super(opts.dimension, opts.logger);

    const apiKey = opts.apiKey?.trim() || resolveApiKey(opts.provider);
    if (!apiKey) {
      throw new ConfigurationError(
        `${API_KEY_ENV[opts.provider].join(' or ')} must be set for ${opts.provider} embeddings`,
        'embedding.apiKey'
      );
    }

    this.provider = opts.provider;
    this.name = `${opts.provider}:${opts.model}`;
    this.timeoutMs = opts.timeoutMs ?? 15000;
    this.maxRetries = opts.maxRetries ?? 2;
    this.model = opts.provider === 'google'
      ? createGoogleGenerativeAI({ apiKey }).textEmbeddingModel(opts.model)
      : createOpenAI({ apiKey }).textEmbeddingModel(opts.model);
  }

  protected async compute(text: string, purpose: EmbeddingPurpose): Promise<number[]> {
    const providerOptions: Parameters<typeof embed>[0]['providerOptions'] = this.provider === 'google'
      ? {
          google: {
            outputDimensionality: this.dimension,
            taskType: purpose === 'query' ? 'RETRIEVAL_QUERY' : 'RETRIEVAL_DOCUMENT'
          }
        }
      : { openai: { dimensions: this.dimension } };

    const { embedding } = await embed({
      model: this.model,
      value: text,
      providerOptions,
      maxRetries: this.maxRetries,
      abortSignal: AbortSignal.timeout(this.timeoutMs)
    });
    return embedding;
  }
}
