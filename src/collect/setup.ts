import type { Config } from '../shared/config.js';
import { assertCredentials } from '../shared/config.js';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { openDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import type { SourceAdapter } from '../source/adapter.js';
import { SearchApiAdapter } from '../source/searchApi.js';
import { CrawlAdapter } from '../source/crawl.js';
import type { ArticleStore } from '../store/types.js';
import { SqliteArticleStore } from '../store/sqliteStore.js';
import { RecencyCache } from './recencyCache.js';
import { PersistenceGateway } from './gateway.js';
import { CollectionOrchestrator } from './orchestrator.js';

/**
 * An orchestrator together with the resources it owns.
 */
export interface Collector {
  readonly orchestrator: CollectionOrchestrator;
  readonly store: ArticleStore;
  readonly config: Config;
  close(): void;
}

export interface CollectorDeps {
  store?: ArticleStore;
  api?: SourceAdapter | null;
  crawl?: SourceAdapter | null;
}

/** For commands that only read or prune the store: no sources, no credential check. */
export const STORE_ONLY: Readonly<CollectorDeps> = { api: null, crawl: null };

function openStore(config: Config): ArticleStore {
  const db = openDb(config.db.path);
  try {
    runMigrations(db);
  } catch (err) {
    db.close();
    throw err;
  }
  return new SqliteArticleStore(db);
}

/**
 * Build the collector from an explicit config. Injected dependencies replace
 * the ones the config would create. Throws ConfigError when the search API is
 * enabled without credentials.
 */
export function createCollector(config: Config, deps: CollectorDeps = {}): Collector {
  if (deps.api === undefined) {
    assertCredentials(config);
  }

  const store = deps.store ?? openStore(config);

  const api =
    deps.api !== undefined ? deps.api : config.search_api.enabled ? new SearchApiAdapter(config.search_api) : null;
  const crawl =
    deps.crawl !== undefined ? deps.crawl : config.crawl.enabled ? new CrawlAdapter(config.crawl) : null;

  const cache = new RecencyCache(store, {
    retryAttempts: config.recency.retry_attempts,
    retryDelayMs: config.recency.retry_delay_ms,
  });
  const gateway = new PersistenceGateway(store, cache, {
    windowMs: config.recency.window_minutes * 60_000,
    maxRecords: config.recency.max_records,
  });
  const orchestrator = new CollectionOrchestrator({ api, crawl }, gateway, store, {
    concurrentAdapters: config.collect.concurrent_adapters,
    queryDelayMs: config.collect.query_delay_ms,
    defaultCategory: config.collect.default_category,
    trendingKeywords: config.collect.trending_keywords,
    defaults: { useApi: api !== null, useCrawl: crawl !== null },
  });

  let closed = false;
  return {
    orchestrator,
    store,
    config,
    close(): void {
      if (closed) return;
      closed = true;
      // Release everything even if one release throws.
      for (const release of [() => api?.close(), () => crawl?.close(), () => store.close()]) {
        try {
          release();
        } catch (err) {
          logger.error({ error: errorMessage(err) }, 'Failed to release collector resource');
        }
      }
      logger.debug('Collector closed');
    },
  };
}

/**
 * Run `fn` with a fresh collector and release it on every exit path.
 */
export async function withCollector<T>(
  config: Config,
  fn: (collector: Collector) => Promise<T>,
  deps?: CollectorDeps,
): Promise<T> {
  const collector = createCollector(config, deps);
  try {
    return await fn(collector);
  } finally {
    collector.close();
  }
}
