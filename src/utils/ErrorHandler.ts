import type { Logger } from '../types/index.js';
import { ConfigurationError, TimeoutError, VectorIndexError } from './errors.js';

export type ErrorCategory = 'network' | 'timeout' | 'configuration' | 'index' | 'embedding' | 'validation' | 'unknown';

/**
 * Context attached to a handled error. `operation` names the store or index
 * call; entity and owner ids identify the document involved.
 */
export interface ErrorContext {
  operation?: string;
  type?: string;
  entityId?: number;
  ownerId?: number;
  [key: string]: unknown;
}

export interface HandledError {
  category: ErrorCategory;
  recoverable: boolean;
  suggestion: string;
}

export interface RecentError {
  message: string;
  name?: string;
  category: ErrorCategory;
  operation?: string;
  timestamp: Date;
}

const MAX_RECENT_ERRORS = 100;

const NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'ETIMEDOUT', 'EPIPE']);

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export interface ErrorStatistics {
  totalErrors: number;
  recentErrors: RecentError[];
  errorsByCategory: Partial<Record<ErrorCategory, number>>;
  errorsByOperation: Record<string, number>;
}

export class UnifiedErrorHandler {
  private stats: ErrorStatistics = {
    totalErrors: 0,
    recentErrors: [],
    errorsByCategory: {},
    errorsByOperation: {}
  };

  constructor(private readonly logger: Logger) {}

  categorize(error: unknown): { category: ErrorCategory; recoverable: boolean } {
    if (error instanceof ConfigurationError) return { category: 'configuration', recoverable: false };
    if (error instanceof TimeoutError) return { category: 'timeout', recoverable: true };
    if (error instanceof VectorIndexError) {
      if (error.cause instanceof TimeoutError) return { category: 'timeout', recoverable: true };
      return { category: 'index', recoverable: error.retryable };
    }

    const name = error instanceof Error ? error.name : '';
    const code = errorCode(error);
    if (code && NETWORK_CODES.has(code)) return { category: 'network', recoverable: true };
    if (name === 'AbortError' || name.includes('Timeout')) return { category: 'timeout', recoverable: true };
    if (name.includes('Network') || name === 'FetchError') return { category: 'network', recoverable: true };
    if (name === 'ZodError' || name.includes('Validation')) return { category: 'validation', recoverable: false };
    if (name.includes('Embedding')) return { category: 'embedding', recoverable: true };
    return { category: 'unknown', recoverable: false };
  }

  private redact(message: string): string {
    return message
      .replace(/(api[_-]?key|token|password)=[^\s&]+/gi, '$1=[REDACTED]')
      .replace(/Bearer\s+[A-Za-z0-9._-]+/g, 'Bearer [REDACTED]');
  }

  /**
   * Log an error with its context and record it in the statistics. Never throws.
   */
  handleError(error: unknown, context: ErrorContext = {}): HandledError {
    const { category, recoverable } = this.categorize(error);
    const message = this.redact(
      error instanceof Error ? error.message : typeof error === 'string' ? error : 'Unknown error'
    );
    const name = error instanceof Error ? error.name : undefined;

    this.stats.totalErrors++;
    this.stats.recentErrors.push({ message, name, category, operation: context.operation, timestamp: new Date() });
    if (this.stats.recentErrors.length > MAX_RECENT_ERRORS) {
      this.stats.recentErrors.splice(0, this.stats.recentErrors.length - MAX_RECENT_ERRORS);
    }
    this.stats.errorsByCategory[category] = (this.stats.errorsByCategory[category] ?? 0) + 1;
    if (context.operation) {
      this.stats.errorsByOperation[context.operation] = (this.stats.errorsByOperation[context.operation] ?? 0) + 1;
    }

    let suggestion = 'check logs';
    if (category === 'network' || category === 'timeout') suggestion = 'retry later';
    else if (category === 'configuration') suggestion = 'fix configuration and restart';
    else if (category === 'validation') suggestion = 'fix input parameters';
    else if (category === 'index') suggestion = recoverable ? 'retry later' : 'check vector index';

    const prefix = context.operation ? `Error in operation ${context.operation}:` : 'Unhandled error:';
    this.logger.error(prefix, {
      message,
      name,
      category,
      recoverable,
      context,
      stack: error instanceof Error ? error.stack : undefined
    });

    return { category, recoverable, suggestion };
  }

  getErrorStatistics(): ErrorStatistics {
    return {
      totalErrors: this.stats.totalErrors,
      recentErrors: [...this.stats.recentErrors],
      errorsByCategory: { ...this.stats.errorsByCategory },
      errorsByOperation: { ...this.stats.errorsByOperation }
    };
  }

  resetStatistics(): void {
    this.stats = { totalErrors: 0, recentErrors: [], errorsByCategory: {}, errorsByOperation: {} };
  }
}
