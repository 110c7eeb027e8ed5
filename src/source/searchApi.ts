import { z } from 'zod';
import type { Config } from '../shared/config.js';
import type {
  AdapterResult,
  CandidateRecord,
  FetchOptions,
  QueryKind,
  SourceAdapter,
} from './adapter.js';
import { queryLabel } from './adapter.js';
import { canonicalizeLink } from './dedup.js';
import { cleanHtml, finalizeRecords } from './normalize.js';
import { SourceError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep } from '../shared/utils.js';

const SearchItemSchema = z.object({
  title: z.string().default(''),
  originallink: z.string().default(''),
  link: z.string().default(''),
  description: z.string().default(''),
  pubDate: z.string().default(''),
});

const SearchResponseSchema = z.object({
  total: z.number().optional(),
  start: z.number().optional(),
  display: z.number().optional(),
  items: z.array(SearchItemSchema).default([]),
});

export type SearchResponse = z.infer<typeof SearchResponseSchema>;
type SearchItem = z.infer<typeof SearchItemSchema>;

export type SearchApiConfig = Config['search_api'];

/**
 * News search API source. Pages through results newest-first until `limit`
 * matching records are gathered, the API runs dry, or its start ceiling is hit.
 */
export class SearchApiAdapter implements SourceAdapter {
  readonly tag = 'api';
  private readonly inflight = new Set<AbortController>();

  constructor(private readonly config: SearchApiConfig) {}

  async fetch(query: QueryKind, limit: number, options: FetchOptions = {}): Promise<AdapterResult> {
    const { signal } = options;
    const keyword = queryLabel(query);
    const searchTerm = query.kind === 'keyword' ? query.keyword : this.config.latest_query;
    const category = options.category ?? 'general';

    const collected: CandidateRecord[] = [];
    let start = 1;
    let error: string | undefined;

    while (collected.length < limit) {
      signal?.throwIfAborted();

      const display = Math.min(this.config.page_size, limit - collected.length);
      let page: SearchResponse;
      try {
        page = await this.search(searchTerm, display, start, signal);
      } catch (err) {
        if (signal?.aborted) throw err;
        error = errorMessage(err);
        logger.warn({ query: keyword, start, error }, 'Search API page failed');
        break;
      }

      if (page.items.length === 0) {
        logger.debug({ query: keyword, start }, 'Search API returned no more items');
        break;
      }

      const mapped = page.items.map((item) => this.toRecord(item, keyword, category));
      collected.push(...finalizeRecords(mapped, query, limit - collected.length));

      start += display;
      if (page.items.length < display || (page.total !== undefined && start > page.total)) {
        logger.debug({ query: keyword, start, total: page.total }, 'Search API results exhausted');
        break;
      }
      if (start > this.config.max_start) {
        logger.warn({ query: keyword, max_start: this.config.max_start }, 'Search API pagination ceiling reached');
        break;
      }
      if (collected.length < limit) {
        await sleep(this.config.request_delay_ms);
      }
    }

    logger.info({ query: keyword, count: collected.length }, 'Search API fetch complete');
    return error ? { records: collected, error } : { records: collected };
  }

  /**
   * One page request. Throws SourceError on transport, status or shape failures.
   */
  async search(
    searchTerm: string,
    display: number,
    start: number,
    signal?: AbortSignal,
  ): Promise<SearchResponse> {
    const url = new URL(this.config.base_url);
    url.searchParams.set('query', searchTerm);
    url.searchParams.set('display', String(Math.min(display, 100)));
    url.searchParams.set('start', String(Math.max(1, Math.min(start, this.config.max_start))));
    url.searchParams.set('sort', 'date');

    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const timer = setTimeout(() => controller.abort(), this.config.timeout_ms);
    this.inflight.add(controller);

    try {
      const response = await fetch(url, {
        headers: {
          'X-Naver-Client-Id': this.config.client_id,
          'X-Naver-Client-Secret': this.config.client_secret,
          'User-Agent': this.config.user_agent,
          Accept: 'application/json',
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new SourceError(`Search API request failed: ${response.status}`, {
          status: response.status,
          start,
        });
      }

      const parsed = SearchResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new SourceError('Search API returned an unexpected response shape', {
          issues: parsed.error.issues.length,
        });
      }
      return parsed.data;
    } catch (err) {
      if (err instanceof SourceError) throw err;
      if (err instanceof Error && err.name === 'AbortError' && !signal?.aborted) {
        throw new SourceError(`Search API request timed out after ${this.config.timeout_ms}ms`, {
          timeout: this.config.timeout_ms,
        });
      }
      if (signal?.aborted) throw err;
      throw new SourceError(`Search API request failed: ${errorMessage(err)}`);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      this.inflight.delete(controller);
    }
  }

  async validate(): Promise<boolean> {
    if (!this.config.client_id || !this.config.client_secret) {
      logger.error('Search API credentials are not configured');
      return false;
    }
    try {
      await this.search(this.config.latest_query, 1, 1);
      return true;
    } catch (err) {
      logger.error({ error: errorMessage(err) }, 'Search API credential check failed');
      return false;
    }
  }

  close(): void {
    for (const controller of this.inflight) {
      controller.abort();
    }
    this.inflight.clear();
  }

  private toRecord(item: SearchItem, keyword: string, category: string): CandidateRecord {
    const link = item.link.trim();
    const publisher = item.originallink.trim() || link;
    return {
      title: cleanHtml(item.title),
      canonical_link: canonicalizeLink(publisher),
      link: link || publisher,
      summary: cleanHtml(item.description) || undefined,
      pub_date: item.pubDate,
      source: 'api',
      keyword,
      category,
    };
  }
}
