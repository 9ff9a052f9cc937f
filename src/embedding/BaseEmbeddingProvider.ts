import type { Logger } from '../types/index.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import {
  isZeroVector,
  type EmbeddingFailureReason,
  type EmbeddingProvider,
  type EmbeddingPurpose,
  type EmbeddingResult,
  type EmbedOptions
} from './types.js';

/**
 * Shared guard rails for providers: empty input, dimension check, zero-vector
 * detection and error mapping. Subclasses only compute the raw vector.
 */
export abstract class BaseEmbeddingProvider implements EmbeddingProvider {
  abstract readonly name: string;

  constructor(public readonly dimension: number, protected readonly logger: Logger) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new ConfigurationError(`Embedding dimension must be a positive integer, got ${dimension}`, 'embedding.dimension');
    }
  }

  protected abstract compute(text: string, purpose: EmbeddingPurpose): Promise<number[]>;

  async embed(text: string, options?: EmbedOptions): Promise<EmbeddingResult> {
    const input = typeof text === 'string' ? text.trim() : '';
    if (!input) {
      return this.fail('empty_input', 'Cannot embed empty text');
    }

    let vector: number[];
    try {
      vector = await this.compute(input, options?.purpose ?? 'document');
    } catch (error) {
      const timedOut = error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
      return this.fail(timedOut ? 'timeout' : 'provider_error', errorMessage(error), { chars: input.length });
    }

    if (vector.length !== this.dimension) {
      return this.fail(
        'dimension_mismatch',
        `Expected ${this.dimension} dimensions, provider returned ${vector.length}`
      );
    }
    if (isZeroVector(vector)) {
      return this.fail('zero_vector', 'Provider returned an all-zero vector', { chars: input.length });
    }
    return { ok: true, vector };
  }

  private fail(reason: EmbeddingFailureReason, message: string, meta?: Record<string, unknown>): EmbeddingResult {
    const log = reason === 'empty_input' ? this.logger.debug : this.logger.warn;
    log.call(this.logger, 'Embedding generation failed', { provider: this.name, reason, message, ...meta });
    return { ok: false, reason, message };
  }
}
