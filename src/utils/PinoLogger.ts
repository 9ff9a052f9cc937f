import pino from 'pino';
import { LOG_LEVELS, type Logger, type LogLevel } from '../types/index.js';
import { getTraceId } from '../observability/trace.js';

export interface PinoLoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  /** Write to this stream instead of stdout (tests). */
  destination?: pino.DestinationStream;
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

function withTrace(meta: unknown): Record<string, unknown> | undefined {
  const traceId = getTraceId();
  if (!traceId && (meta == null || typeof meta !== 'object')) {
    return meta == null ? undefined : { meta };
  }

  const base: Record<string, unknown> = traceId ? { traceId } : {};
  if (meta == null) return Object.keys(base).length ? base : undefined;
  if (meta instanceof Error) return { ...base, err: meta };
  if (typeof meta === 'object' && !Array.isArray(meta)) return { ...base, ...meta };
  return { ...base, meta };
}

export class PinoLogger implements Logger {
  private readonly log: pino.Logger;

  constructor(options: PinoLoggerOptions = {}) {
    const envLevel = process.env.TAILOR_LOG_LEVEL;
    const level = options.level || (isLogLevel(envLevel) ? envLevel : 'info');
    const pretty = options.pretty ?? (process.env.TAILOR_LOG_PRETTY === '1');

    const destination = options.destination ?? (pretty
      ? pino.transport({ target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:standard' } })
      : undefined);

    this.log = pino(
      {
        level,
        redact: {
          paths: [
            '*.password',
            '*.secret',
            '*.token',
            '*.apiKey',
            '*.apikey',
            'req.headers.authorization',
            'req.headers.cookie',
            'headers.authorization',
            'headers.cookie',
            'headers["x-api-key"]'
          ],
          censor: '***'
        }
      },
      destination
    );
  }

  trace(message: string, meta?: unknown): void {
    this.log.trace(withTrace(meta), message);
  }

  debug(message: string, meta?: unknown): void {
    this.log.debug(withTrace(meta), message);
  }

  info(message: string, meta?: unknown): void {
    this.log.info(withTrace(meta), message);
  }

  warn(message: string, meta?: unknown): void {
    this.log.warn(withTrace(meta), message);
  }

  error(message: string, meta?: unknown): void {
    this.log.error(withTrace(meta), message);
  }
}
