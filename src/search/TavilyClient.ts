import { z } from 'zod';
import type { Logger, WebSearchConfig } from '../types/index.js';
import type { WebSearchResult } from '../skills/types.js';
import { errorMessage } from '../utils/errors.js';

export interface WebSearchClient {
  search(query: string, maxResults?: number): Promise<WebSearchResult[]>;
}

const RawResultSchema = z.object({
  title: z.string().nullish(),
  name: z.string().nullish(),
  url: z.string().nullish(),
  link: z.string().nullish(),
  snippet: z.string().nullish(),
  content: z.string().nullish(),
  source: z.string().nullish()
}).passthrough();

const ResponseSchema = z.object({
  results: z.array(RawResultSchema).nullish(),
  data: z.array(RawResultSchema).nullish()
}).passthrough();

export interface TavilyClientOptions extends Partial<Pick<WebSearchConfig, 'baseUrl' | 'timeoutMs'>> {
  apiKey?: string;
  logger: Logger;
}

export function clampMaxResults(value: number): number {
  if (!Number.isFinite(value)) return 5;
  return Math.max(1, Math.min(Math.floor(value), 10));
}

/**
 * Thin wrapper over the Tavily search endpoint. A missing key or any
 * transport failure yields an empty list.
 */
export class TavilyClient implements WebSearchClient {
  private readonly apiKey?: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(opts: TavilyClientOptions) {
    this.apiKey = opts.apiKey?.trim() || process.env.TAVILY_API_KEY?.trim() || undefined;
    this.baseUrl = (opts.baseUrl ?? 'https://api.tavily.com').replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs ?? 15000;
    this.logger = opts.logger;
  }

  get configured(): boolean {
    return Boolean(this.apiKey);
  }

  async search(query: string, maxResults = 5): Promise<WebSearchResult[]> {
    if (!this.apiKey) {
      this.logger.debug('Web search skipped: TAVILY_API_KEY not set');
      return [];
    }

    try {
      const res = await fetch(`${this.baseUrl}/search`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'Accept': 'application/json' },
        body: JSON.stringify({
          api_key: this.apiKey,
          query,
          search_depth: 'basic',
          max_results: clampMaxResults(maxResults)
        }),
        signal: AbortSignal.timeout(this.timeoutMs)
      });

      if (!res.ok) {
        this.logger.warn('Web search request failed', { status: res.status, statusText: res.statusText });
        return [];
      }

      const parsed = ResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        this.logger.warn('Web search returned an unexpected payload', { issues: parsed.error.errors.length });
        return [];
      }

      const items = parsed.data.results ?? parsed.data.data ?? [];
      return items.map((item) => ({
        title: item.title || item.name || '',
        url: item.url || item.link || '',
        snippet: item.snippet || item.content || '',
        source: item.source || 'web'
      }));
    } catch (error) {
      this.logger.warn('Web search error', { message: errorMessage(error) });
      return [];
    }
  }
}
