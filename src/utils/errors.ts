/**
 * Raised while wiring the service: missing credentials, an unknown provider,
 * or an index whose dimension does not match the embedding model. These are
 * fatal at startup.
 */
export class ConfigurationError extends Error {
  constructor(message: string, public readonly setting?: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type VectorIndexOperation = 'ensureIndex' | 'upsert' | 'query' | 'delete' | 'count';

export class VectorIndexError extends Error {
  constructor(
    message: string,
    public readonly operation: VectorIndexOperation,
    public readonly retryable: boolean = true,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'VectorIndexError';
  }
}

export class TimeoutError extends Error {
  constructor(message: string, public readonly timeoutMs: number) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : String(error);
}
