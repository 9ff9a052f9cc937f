import { getTraceId, runWithTrace, traceIdFromHeader } from '../../observability/trace.js';

describe('trace', () => {
  it('exposes the trace id inside runWithTrace only', async () => {
    expect(getTraceId()).toBeUndefined();

    const seen = await runWithTrace('req-1', async () => {
      await Promise.resolve();
      return getTraceId();
    });

    expect(seen).toBe('req-1');
    expect(getTraceId()).toBeUndefined();
  });

  it('accepts opaque inbound ids', () => {
    expect(traceIdFromHeader('abc-123_x.y')).toBe('abc-123_x.y');
    expect(traceIdFromHeader(['first', 'second'])).toBe('first');
  });

  it('generates an id for missing or unsafe headers', () => {
    const uuid = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

    expect(traceIdFromHeader(undefined)).toMatch(uuid);
    expect(traceIdFromHeader('has spaces')).toMatch(uuid);
    expect(traceIdFromHeader('x'.repeat(129))).toMatch(uuid);
  });
});
