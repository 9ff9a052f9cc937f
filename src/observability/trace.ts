import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RequestTrace {
  traceId: string;
}

const storage = new AsyncLocalStorage<RequestTrace>();

export function getTraceId(): string | undefined {
  return storage.getStore()?.traceId;
}

export function runWithTrace<T>(traceId: string, fn: () => T): T {
  return storage.run({ traceId }, fn);
}

export function createTraceId(): string {
  return randomUUID();
}

/**
 * Accept an inbound x-request-id only when it looks like an opaque token.
 */
export function traceIdFromHeader(header: string | string[] | undefined): string {
  const value = Array.isArray(header) ? header[0] : header;
  if (value && /^[A-Za-z0-9._-]{1,128}$/.test(value)) return value;
  return createTraceId();
}
