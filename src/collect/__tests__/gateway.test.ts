import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PersistenceGateway } from '../gateway.js';
import { RecencyCache } from '../recencyCache.js';
import type { SqliteArticleStore } from '../../store/sqliteStore.js';
import { makeRecord } from '../../source/__tests__/fixtures.js';
import { memoryStore } from './fakes.js';

let store: SqliteArticleStore;
let cache: RecencyCache;
let gateway: PersistenceGateway;

beforeEach(() => {
  store = memoryStore();
  cache = new RecencyCache(store, { retryAttempts: 1, retryDelayMs: 0 });
  gateway = new PersistenceGateway(store, cache, { windowMs: 120_000, maxRecords: 500 });
});

afterEach(() => {
  store.close();
  vi.restoreAllMocks();
});

describe('PersistenceGateway.saveBatch', () => {
  it('returns zeros for an empty batch without touching the store', async () => {
    const insert = vi.spyOn(store, 'insertBatchIfAbsent');
    const recent = vi.spyOn(cache, 'recentLinks');

    expect(await gateway.saveBatch([])).toEqual({ saved: 0, duplicates: 0, totalProcessed: 0 });
    expect(insert).not.toHaveBeenCalled();
    expect(recent).not.toHaveBeenCalled();
  });

  it('saves new records and counts repeats on the next call', async () => {
    const batch = [
      makeRecord({ canonical_link: 'https://a.com/1' }),
      makeRecord({ canonical_link: 'https://a.com/2' }),
    ];

    expect(await gateway.saveBatch(batch)).toEqual({ saved: 2, duplicates: 0, totalProcessed: 2 });
    expect(await gateway.saveBatch(batch)).toEqual({ saved: 0, duplicates: 2, totalProcessed: 2 });
    expect(store.aggregateCounts()).toEqual({ total: 2, duplicates: 2, unique: 2 });
  });

  it('counts every stored link as unique, including resighted ones', async () => {
    const a = makeRecord({ canonical_link: 'https://a.com/1' });
    const b = makeRecord({ canonical_link: 'https://a.com/2' });

    expect(await gateway.saveBatch([a, a, b])).toEqual({ saved: 2, duplicates: 1, totalProcessed: 3 });
    expect(store.aggregateCounts()).toEqual({ total: 2, duplicates: 1, unique: 2 });
  });

  it('hands recently stored links to the store', async () => {
    vi.spyOn(cache, 'recentLinks').mockResolvedValue(new Set(['https://a.com/1']));
    const insert = vi.spyOn(store, 'insertBatchIfAbsent');
    const batch = [makeRecord({ canonical_link: 'https://a.com/1' })];

    await gateway.saveBatch(batch);

    expect(insert).toHaveBeenCalledWith(batch, { knownLinks: new Set(['https://a.com/1']) });
  });

  it('still saves when the recency cache is unavailable', async () => {
    vi.spyOn(store, 'queryLinksSince').mockImplementation(() => {
      throw new Error('database is locked');
    });

    const result = await gateway.saveBatch([makeRecord({ canonical_link: 'https://a.com/1' })]);

    expect(result).toEqual({ saved: 1, duplicates: 0, totalProcessed: 1 });
  });

  it('works without a cache', async () => {
    const plain = new PersistenceGateway(store, null, { windowMs: 120_000, maxRecords: 500 });
    const record = makeRecord({ canonical_link: 'https://a.com/1' });

    await plain.saveBatch([record]);
    expect(await plain.saveBatch([record])).toEqual({ saved: 0, duplicates: 1, totalProcessed: 1 });
  });
});

describe('PersistenceGateway.saveOne', () => {
  it('returns the stored article, then null for a repeat', () => {
    const record = makeRecord({ canonical_link: 'https://a.com/1', title: 'First sighting' });

    const article = gateway.saveOne(record);
    expect(article?.title).toBe('First sighting');

    expect(gateway.saveOne({ ...record, title: 'Second sighting' })).toBeNull();
    const stored = store.getRecentArticles(1)[0];
    expect(stored.title).toBe('First sighting');
    expect(stored.is_duplicate).toBe(1);
  });
});
