import { JSDOM } from 'jsdom';
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
import { finalizeRecords } from './normalize.js';
import { SourceError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export type CrawlConfig = Config['crawl'];

// Tried in order; the first selector that matches anything wins.
const CARD_SELECTORS = ['article', 'div.xrnccd', 'c-wiz > div > article', 'div[jsname]'];
const TITLE_SELECTORS = ['a.gPFEn', 'a.JtKRv', 'a.DY5T1d', 'h3 a', 'h4 a', 'a[href*="./articles/"]'];
const TIME_TEXT_SELECTORS = ['div.SVJrMe', 'span.SVJrMe', 'div.UOVeFe'];
const SUMMARY_SELECTORS = ['div.GI74Re', 'div.Rai5ob', 'div.xBbh9'];

function text(el: Element | null | undefined): string {
  return el?.textContent?.replace(/\s+/g, ' ').trim() ?? '';
}

function isArticleHref(href: string): boolean {
  return href.includes('articles/');
}

/**
 * Aggregator HTML scraper. One page per fetch: the search page for a keyword,
 * the front page for "latest".
 */
export class CrawlAdapter implements SourceAdapter {
  readonly tag = 'crawl';
  private readonly inflight = new Set<AbortController>();

  constructor(
    private readonly config: CrawlConfig,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async fetch(query: QueryKind, limit: number, options: FetchOptions = {}): Promise<AdapterResult> {
    const { signal } = options;
    signal?.throwIfAborted();

    const keyword = queryLabel(query);
    let html: string;
    try {
      html = await this.download(this.pageUrl(query), signal);
    } catch (err) {
      if (signal?.aborted) throw err;
      const error = errorMessage(err);
      logger.warn({ query: keyword, error }, 'Crawl fetch failed');
      return { records: [], error };
    }

    let parsed: CandidateRecord[];
    try {
      parsed = this.parse(html, keyword, options.category ?? 'general');
    } catch (err) {
      const error = `Crawl parse failed: ${errorMessage(err)}`;
      logger.warn({ query: keyword, error }, 'Crawl parse failed');
      return { records: [], error };
    }

    const records = finalizeRecords(parsed, query, limit);
    logger.info({ query: keyword, parsed: parsed.length, count: records.length }, 'Crawl fetch complete');
    return { records };
  }

  pageUrl(query: QueryKind): URL {
    const url =
      query.kind === 'keyword'
        ? new URL('/search', this.config.base_url)
        : new URL('/', this.config.base_url);
    if (query.kind === 'keyword') {
      url.searchParams.set('q', query.keyword);
    }
    url.searchParams.set('hl', this.config.language);
    url.searchParams.set('gl', this.config.country);
    url.searchParams.set('ceid', this.config.edition);
    return url;
  }

  /**
   * Extract candidates from an aggregator page. Card-based extraction first,
   * then a plain article-link sweep when no card selector matches.
   */
  parse(html: string, keyword: string, category: string): CandidateRecord[] {
    const doc = new JSDOM(html).window.document;

    let cards: Element[] = [];
    for (const selector of CARD_SELECTORS) {
      cards = Array.from(doc.querySelectorAll(selector));
      if (cards.length > 0) break;
    }

    if (cards.length === 0) {
      return this.parseLinks(doc, keyword, category);
    }

    const records: CandidateRecord[] = [];
    for (const card of cards) {
      const record = this.parseCard(card, keyword, category);
      if (record) records.push(record);
    }
    return records;
  }

  private parseCard(card: Element, keyword: string, category: string): CandidateRecord | null {
    let anchor: Element | null = null;
    for (const selector of TITLE_SELECTORS) {
      const candidate = card.querySelector(selector);
      if (candidate && text(candidate)) {
        anchor = candidate;
        break;
      }
    }
    if (!anchor) {
      anchor =
        Array.from(card.querySelectorAll('a')).find(
          (a) => isArticleHref(a.getAttribute('href') ?? '') && text(a).length > this.config.min_title_length,
        ) ?? null;
    }
    if (!anchor) return null;

    const title = text(anchor);
    const link = this.resolveLink(anchor.getAttribute('href') ?? '');
    if (!title || !link || title.length < this.config.min_title_length) return null;

    let pubDate = card.querySelector('time')?.getAttribute('datetime') ?? '';
    if (!pubDate) {
      for (const selector of TIME_TEXT_SELECTORS) {
        pubDate = text(card.querySelector(selector));
        if (pubDate) break;
      }
    }

    let summary = '';
    for (const selector of SUMMARY_SELECTORS) {
      summary = text(card.querySelector(selector));
      if (summary) break;
    }

    return {
      title,
      canonical_link: canonicalizeLink(link),
      link,
      summary: summary || undefined,
      pub_date: pubDate || this.now().toUTCString(),
      source: 'crawl',
      keyword,
      category,
    };
  }

  private parseLinks(doc: Document, keyword: string, category: string): CandidateRecord[] {
    let anchors = Array.from(doc.querySelectorAll('a[href*="./articles/"]'));
    if (anchors.length === 0) {
      anchors = Array.from(doc.querySelectorAll('a'));
    }

    const seenTitles = new Set<string>();
    const records: CandidateRecord[] = [];
    for (const anchor of anchors) {
      const href = anchor.getAttribute('href') ?? '';
      if (!isArticleHref(href)) continue;

      const title = text(anchor);
      if (title.length < this.config.min_title_length || seenTitles.has(title)) continue;
      seenTitles.add(title);

      const link = this.resolveLink(href);
      if (!link) continue;

      records.push({
        title,
        canonical_link: canonicalizeLink(link),
        link,
        pub_date: this.now().toUTCString(),
        source: 'crawl',
        keyword,
        category,
      });
    }
    return records;
  }

  /** Resolve "./articles/..." style hrefs against the aggregator root. */
  resolveLink(href: string): string {
    if (!href) return '';
    try {
      return new URL(href, this.config.base_url).toString();
    } catch {
      return '';
    }
  }

  private async download(url: URL, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const timer = setTimeout(() => controller.abort(), this.config.timeout_ms);
    this.inflight.add(controller);

    try {
      const response = await fetch(url, {
        headers: {
          'User-Agent': this.config.user_agent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': `${this.config.language},en;q=0.7`,
        },
        signal: controller.signal,
        redirect: 'follow',
      });
      if (!response.ok) {
        throw new SourceError(`Crawl request failed: ${response.status}`, {
          url: url.toString(),
          status: response.status,
        });
      }
      return await response.text();
    } catch (err) {
      if (err instanceof SourceError) throw err;
      if (err instanceof Error && err.name === 'AbortError' && !signal?.aborted) {
        throw new SourceError(`Crawl request timed out after ${this.config.timeout_ms}ms`, {
          url: url.toString(),
        });
      }
      if (signal?.aborted) throw err;
      throw new SourceError(`Crawl request failed: ${errorMessage(err)}`, { url: url.toString() });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      this.inflight.delete(controller);
    }
  }

  async validate(): Promise<boolean> {
    try {
      await this.download(new URL('/', this.config.base_url));
      return true;
    } catch (err) {
      logger.error({ error: errorMessage(err) }, 'Crawl source unreachable');
      return false;
    }
  }

  close(): void {
    for (const controller of this.inflight) {
      controller.abort();
    }
    this.inflight.clear();
  }
}
