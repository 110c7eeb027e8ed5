import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SearchApiAdapter } from '../searchApi.js';
import { LATEST, keywordQuery } from '../adapter.js';
import { parseConfig } from '../../shared/config.js';

function apiConfig(overrides: Record<string, unknown> = {}) {
  return parseConfig({
    search_api: {
      client_id: 'test-id',
      client_secret: 'test-secret',
      request_delay_ms: 0,
      page_size: 2,
      ...overrides,
    },
  }).search_api;
}

function item(n: number, title = `Headline ${n}`) {
  return {
    title,
    originallink: `https://www.publisher.com/news/${n}/?utm_source=search`,
    link: `https://search.example.com/read/${n}`,
    description: `<b>Body</b> of story ${n}`,
    pubDate: 'Mon, 01 Jan 2024 09:00:00 +0900',
  };
}

function page(items: unknown[], total = 100): Response {
  return new Response(JSON.stringify({ total, items }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

function requestedUrl(mockFetch: ReturnType<typeof vi.fn>, call: number): URL {
  return new URL(String(mockFetch.mock.calls[call][0]));
}

describe('SearchApiAdapter', () => {
  const originalFetch = globalThis.fetch;

  beforeEach(() => {
    vi.restoreAllMocks();
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('maps items to candidate records', async () => {
    globalThis.fetch = vi.fn().mockResolvedValueOnce(page([item(1, '<b>AI</b> chip &amp; cloud')]));

    const adapter = new SearchApiAdapter(apiConfig({ page_size: 1 }));
    const { records, error } = await adapter.fetch(keywordQuery('AI'), 1, { category: 'tech' });

    expect(error).toBeUndefined();
    expect(records).toEqual([
      {
        title: 'AI chip & cloud',
        canonical_link: 'https://publisher.com/news/1',
        link: 'https://search.example.com/read/1',
        summary: 'Body of story 1',
        pub_date: 'Mon, 01 Jan 2024 09:00:00 +0900',
        source: 'api',
        keyword: 'AI',
        category: 'tech',
      },
    ]);
  });

  it('pages until the limit is reached', async () => {
    const mockFetch = vi
      .fn()
      .mockResolvedValueOnce(page([item(1), item(2)]))
      .mockResolvedValueOnce(page([item(3)]));
    globalThis.fetch = mockFetch;

    const adapter = new SearchApiAdapter(apiConfig());
    const { records } = await adapter.fetch(LATEST, 3);

    expect(records.map((r) => r.canonical_link)).toEqual([
      'https://publisher.com/news/1',
      'https://publisher.com/news/2',
      'https://publisher.com/news/3',
    ]);
    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(requestedUrl(mockFetch, 0).searchParams.get('start')).toBe('1');
    expect(requestedUrl(mockFetch, 0).searchParams.get('display')).toBe('2');
    expect(requestedUrl(mockFetch, 1).searchParams.get('start')).toBe('3');
    expect(requestedUrl(mockFetch, 1).searchParams.get('display')).toBe('1');
  });

  it('searches the configured term for latest and sorts by date', async () => {
    const mockFetch = vi.fn().mockResolvedValueOnce(page([item(1)]));
    globalThis.fetch = mockFetch;

    const adapter = new SearchApiAdapter(apiConfig({ page_size: 1 }));
    const { records } = await adapter.fetch(LATEST, 1);

    const url = requestedUrl(mockFetch, 0);
    expect(url.searchParams.get('query')).toBe('뉴스');
    expect(url.searchParams.get('sort')).toBe('date');
    expect(records[0].keyword).toBe('latest');
  });

  it('sends credential headers', async () => {
    const mockFetch = vi.fn().mockResolvedValueOnce(page([item(1)]));
    globalThis.fetch = mockFetch;

    await new SearchApiAdapter(apiConfig({ page_size: 1 })).fetch(LATEST, 1);

    const headers = mockFetch.mock.calls[0][1].headers;
    expect(headers['X-Naver-Client-Id']).toBe('test-id');
    expect(headers['X-Naver-Client-Secret']).toBe('test-secret');
  });

  it('filters out items that lack the keyword and stops on an empty page', async () => {
    const mockFetch = vi
      .fn()
      .mockResolvedValueOnce(page([item(1, '<b>경제</b> 전망'), item(2, '스포츠 소식')]))
      .mockResolvedValueOnce(page([]));
    globalThis.fetch = mockFetch;

    const adapter = new SearchApiAdapter(apiConfig());
    const { records, error } = await adapter.fetch(keywordQuery('경제'), 5);

    expect(records.map((r) => r.title)).toEqual(['경제 전망']);
    expect(error).toBeUndefined();
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('stops after a page shorter than requested', async () => {
    const mockFetch = vi.fn().mockResolvedValueOnce(page([item(1)]));
    globalThis.fetch = mockFetch;

    const { records, error } = await new SearchApiAdapter(apiConfig()).fetch(LATEST, 10);

    expect(records).toHaveLength(1);
    expect(error).toBeUndefined();
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('stops once the reported total is covered', async () => {
    const mockFetch = vi.fn().mockResolvedValueOnce(page([item(1), item(2)], 2));
    globalThis.fetch = mockFetch;

    const { records } = await new SearchApiAdapter(apiConfig()).fetch(LATEST, 10);

    expect(records).toHaveLength(2);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('keeps paging when the response omits the total', async () => {
    const mockFetch = vi
      .fn()
      .mockResolvedValueOnce(
        new Response(JSON.stringify({ items: [item(1), item(2)] }), {
          status: 200,
          headers: { 'Content-Type': 'application/json' },
        }),
      )
      .mockResolvedValueOnce(page([]));
    globalThis.fetch = mockFetch;

    const { records } = await new SearchApiAdapter(apiConfig()).fetch(LATEST, 10);

    expect(records).toHaveLength(2);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('stops at the pagination ceiling', async () => {
    const mockFetch = vi
      .fn()
      .mockResolvedValueOnce(page([item(1), item(2)]))
      .mockResolvedValueOnce(page([item(3), item(4)]));
    globalThis.fetch = mockFetch;

    const adapter = new SearchApiAdapter(apiConfig({ max_start: 3 }));
    const { records } = await adapter.fetch(LATEST, 10);

    expect(records).toHaveLength(4);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('reports an HTTP failure as an empty result with the reason', async () => {
    globalThis.fetch = vi.fn().mockResolvedValueOnce(new Response('nope', { status: 500 }));

    const result = await new SearchApiAdapter(apiConfig()).fetch(LATEST, 5);

    expect(result).toEqual({ records: [], error: 'Search API request failed: 500' });
  });

  it('keeps records gathered before a later page fails', async () => {
    globalThis.fetch = vi
      .fn()
      .mockResolvedValueOnce(page([item(1), item(2)]))
      .mockResolvedValueOnce(new Response('slow down', { status: 429 }));

    const result = await new SearchApiAdapter(apiConfig()).fetch(LATEST, 4);

    expect(result.records).toHaveLength(2);
    expect(result.error).toBe('Search API request failed: 429');
  });

  it('rejects a malformed response body', async () => {
    globalThis.fetch = vi
      .fn()
      .mockResolvedValueOnce(new Response(JSON.stringify({ items: 'bad' }), { status: 200 }));

    const result = await new SearchApiAdapter(apiConfig()).fetch(LATEST, 2);

    expect(result).toEqual({ records: [], error: 'Search API returned an unexpected response shape' });
  });

  it('rejects when the caller cancels', async () => {
    globalThis.fetch = vi.fn();
    const controller = new AbortController();
    controller.abort();

    await expect(
      new SearchApiAdapter(apiConfig()).fetch(LATEST, 2, { signal: controller.signal }),
    ).rejects.toThrow();
    expect(globalThis.fetch).not.toHaveBeenCalled();
  });

  it('fails validation without credentials and without calling the API', async () => {
    const mockFetch = vi.fn();
    globalThis.fetch = mockFetch;

    const adapter = new SearchApiAdapter(apiConfig({ client_id: '', client_secret: '' }));
    expect(await adapter.validate()).toBe(false);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('passes validation when a one-item search succeeds', async () => {
    const mockFetch = vi.fn().mockResolvedValueOnce(page([item(1)]));
    globalThis.fetch = mockFetch;

    expect(await new SearchApiAdapter(apiConfig()).validate()).toBe(true);
    expect(requestedUrl(mockFetch, 0).searchParams.get('display')).toBe('1');
  });
});
