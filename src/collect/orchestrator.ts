import type { Logger } from 'pino';
import type { AdapterResult, CandidateRecord, QueryKind, SourceAdapter, SourceTag } from '../source/adapter.js';
import { queryLabel } from '../source/adapter.js';
import { mergeCandidates } from '../source/dedup.js';
import type { ArticleStore, CollectionAttemptLog, StoredArticle } from '../store/types.js';
import type { PersistenceGateway } from './gateway.js';
import { getStatistics, type Statistics } from './stats.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { generateId, sleep } from '../shared/utils.js';

export interface CollectOptions {
  useApi: boolean;
  useCrawl: boolean;
  category?: string;
  signal?: AbortSignal;
}

export type CollectManyOptions = Partial<CollectOptions>;

export interface CollectionOutcome {
  success: boolean;
  runId: string;
  query: string;
  apiCount: number;
  crawlCount: number;
  /** Distinct candidates handed to the gateway. */
  collected: number;
  saved: number;
  duplicates: number;
  elapsedMs: number;
  error?: string;
}

export interface QuantityPlan {
  api: number;
  crawl: number;
}

export interface OrchestratorSettings {
  concurrentAdapters: boolean;
  queryDelayMs: number;
  defaultCategory: string;
  trendingKeywords: readonly string[];
  /** Sources used when a call does not say. */
  defaults: { useApi: boolean; useCrawl: boolean };
}

/**
 * Split `maxCount` across enabled sources. With both enabled the API gets the
 * floor of half and the crawler the remainder.
 */
export function splitQuantity(maxCount: number, useApi: boolean, useCrawl: boolean): QuantityPlan {
  if (useApi && useCrawl) {
    const api = Math.floor(maxCount / 2);
    return { api, crawl: maxCount - api };
  }
  return { api: useApi ? maxCount : 0, crawl: useCrawl ? maxCount : 0 };
}

function sourceLabel(plan: QuantityPlan): string {
  const tags: SourceTag[] = [];
  if (plan.api > 0) tags.push('api');
  if (plan.crawl > 0) tags.push('crawl');
  return tags.join('+');
}

function countByTag(records: readonly CandidateRecord[], tag: SourceTag): number {
  return records.reduce((n, r) => (r.source === tag ? n + 1 : n), 0);
}

/**
 * Top-level coordinator: fan out to the enabled adapters, merge first-seen-wins
 * (API results ahead of crawl results), save once per call, log the attempt.
 *
 * `collect` never rejects; every failure becomes `success: false` with the
 * error text in the outcome.
 */
export class CollectionOrchestrator {
  constructor(
    private readonly adapters: { api: SourceAdapter | null; crawl: SourceAdapter | null },
    private readonly gateway: PersistenceGateway,
    private readonly store: ArticleStore,
    private readonly settings: OrchestratorSettings,
  ) {}

  async collect(query: QueryKind, maxCount: number, options?: Partial<CollectOptions>): Promise<CollectionOutcome> {
    const startTime = Date.now();
    const runId = generateId(10);
    const label = queryLabel(query);
    const log = logger.child({ runId, query: label });

    const useApi = (options?.useApi ?? this.settings.defaults.useApi) && this.adapters.api !== null;
    const useCrawl = (options?.useCrawl ?? this.settings.defaults.useCrawl) && this.adapters.crawl !== null;
    const plan = splitQuantity(Math.max(0, Math.floor(maxCount)), useApi, useCrawl);
    const signal = options?.signal;

    const outcome: CollectionOutcome = {
      success: false,
      runId,
      query: label,
      apiCount: 0,
      crawlCount: 0,
      collected: 0,
      saved: 0,
      duplicates: 0,
      elapsedMs: 0,
    };

    if (plan.api === 0 && plan.crawl === 0) {
      log.info('No sources enabled, nothing to collect');
      outcome.elapsedMs = Date.now() - startTime;
      return outcome;
    }

    log.info({ api: plan.api, crawl: plan.crawl }, 'Collection started');

    try {
      signal?.throwIfAborted();
      const category = options?.category ?? this.settings.defaultCategory;
      const [apiResult, crawlResult] = await this.fetchAll(query, plan, category, signal);

      const { merged, dropped } = mergeCandidates([apiResult.records, crawlResult.records]);
      outcome.apiCount = countByTag(merged, 'api');
      outcome.crawlCount = countByTag(merged, 'crawl');
      outcome.collected = merged.length;

      if (merged.length === 0) {
        const reasons = [
          plan.api > 0 ? `api: ${apiResult.error ?? 'no matching articles'}` : null,
          plan.crawl > 0 ? `crawl: ${crawlResult.error ?? 'no matching articles'}` : null,
        ].filter((r): r is string => r !== null);
        outcome.error = `No articles collected (${reasons.join('; ')})`;
        outcome.elapsedMs = Date.now() - startTime;
        log.warn({ reason: outcome.error }, 'Collection returned nothing');
        return outcome;
      }

      if (dropped > 0) {
        log.debug({ dropped }, 'Cross-source repeats dropped at merge');
      }

      const saved = await this.gateway.saveBatch(merged, signal);
      outcome.saved = saved.saved;
      outcome.duplicates = saved.duplicates;
      outcome.success = true;
      outcome.elapsedMs = Date.now() - startTime;

      this.writeLog(log, {
        run_id: runId,
        source: sourceLabel(plan),
        keyword: label,
        collected: outcome.collected,
        saved: outcome.saved,
        duplicates: outcome.duplicates,
        success: true,
        elapsed_ms: outcome.elapsedMs,
      });

      log.info(
        {
          api: outcome.apiCount,
          crawl: outcome.crawlCount,
          saved: outcome.saved,
          duplicates: outcome.duplicates,
          elapsedMs: outcome.elapsedMs,
        },
        'Collection complete',
      );
      return outcome;
    } catch (err) {
      const error = errorMessage(err);
      outcome.success = false;
      outcome.saved = 0;
      outcome.duplicates = 0;
      outcome.error = error;
      outcome.elapsedMs = Date.now() - startTime;
      log.error({ error }, 'Collection failed');

      this.writeLog(log, {
        run_id: runId,
        source: sourceLabel(plan),
        keyword: label,
        collected: outcome.collected,
        saved: 0,
        duplicates: 0,
        success: false,
        error_message: error,
        elapsed_ms: outcome.elapsedMs,
      });
      return outcome;
    }
  }

  /**
   * Run `collect` once per query, strictly in order, pausing between calls.
   */
  async collectMany(
    queries: readonly QueryKind[],
    perQueryMax: number,
    options?: CollectManyOptions,
  ): Promise<CollectionOutcome[]> {
    const outcomes: CollectionOutcome[] = [];
    const signal = options?.signal;

    logger.info({ queries: queries.length, perQueryMax }, 'Multi-query collection started');

    for (const [i, query] of queries.entries()) {
      if (i > 0 && !signal?.aborted) {
        await sleep(this.settings.queryDelayMs);
      }
      // the pause may have outlasted a cancel
      if (signal?.aborted) {
        logger.warn({ completed: i, remaining: queries.length - i }, 'Multi-query collection cancelled');
        break;
      }
      logger.info({ progress: `${i + 1}/${queries.length}`, query: queryLabel(query) }, 'Collecting');
      outcomes.push(await this.collect(query, perQueryMax, options));
    }

    return outcomes;
  }

  /**
   * Collect for the first trending keyword, then return the newest stored
   * articles. Empty when that collection failed.
   */
  async collectTrending(limit: number, options?: Partial<CollectOptions>): Promise<StoredArticle[]> {
    const keyword = this.settings.trendingKeywords[0];
    if (!keyword) {
      logger.warn('No trending keywords configured');
      return [];
    }
    const outcome = await this.collect({ kind: 'keyword', keyword }, limit, options);
    return outcome.success ? this.store.getRecentArticles(limit) : [];
  }

  getStatistics(): Statistics {
    return getStatistics(this.store);
  }

  /**
   * Check enabled sources and the store without collecting anything.
   */
  async validateSetup(): Promise<boolean> {
    try {
      for (const adapter of [this.adapters.api, this.adapters.crawl]) {
        if (adapter && !(await adapter.validate())) {
          logger.error({ source: adapter.tag }, 'Source validation failed');
          return false;
        }
      }
      if (!this.store.ping()) {
        logger.error('Database connection check failed');
        return false;
      }
      this.store.aggregateCounts();
      logger.info('Setup validated');
      return true;
    } catch (err) {
      logger.error({ error: errorMessage(err) }, 'Setup validation failed');
      return false;
    }
  }

  private async fetchAll(
    query: QueryKind,
    plan: QuantityPlan,
    category: string,
    signal?: AbortSignal,
  ): Promise<[AdapterResult, AdapterResult]> {
    const run = (adapter: SourceAdapter | null, limit: number): Promise<AdapterResult> =>
      adapter && limit > 0
        ? adapter.fetch(query, limit, { category, signal })
        : Promise.resolve({ records: [] });

    if (this.settings.concurrentAdapters) {
      // Order of the tuple, not completion order, decides merge order.
      return Promise.all([run(this.adapters.api, plan.api), run(this.adapters.crawl, plan.crawl)]);
    }

    const apiResult = await run(this.adapters.api, plan.api);
    signal?.throwIfAborted();
    const crawlResult = await run(this.adapters.crawl, plan.crawl);
    return [apiResult, crawlResult];
  }

  private writeLog(log: Logger, entry: CollectionAttemptLog): void {
    try {
      this.store.appendLog(entry);
    } catch (err) {
      log.error({ error: errorMessage(err) }, 'Could not record collection attempt');
    }
  }
}
