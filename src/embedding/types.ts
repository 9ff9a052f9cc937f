export type EmbeddingVector = number[];

export type EmbeddingPurpose = 'document' | 'query';

export type EmbeddingFailureReason =
  | 'empty_input'
  | 'zero_vector'
  | 'dimension_mismatch'
  | 'timeout'
  | 'provider_error';

/**
 * Outcome of a single embedding call. Providers report failures here instead
 * of throwing, so callers can branch without inspecting vector contents.
 */
export type EmbeddingResult =
  | { ok: true; vector: EmbeddingVector }
  | { ok: false; reason: EmbeddingFailureReason; message: string };

export interface EmbedOptions {
  purpose?: EmbeddingPurpose;
}

export interface EmbeddingProvider {
  readonly name: string;
  readonly dimension: number;
  embed(text: string, options?: EmbedOptions): Promise<EmbeddingResult>;
}

export function isZeroVector(vector: readonly number[]): boolean {
  return !vector.some((v) => Math.abs(v) > 1e-12);
}
