import type { CandidateRecord } from '../source/adapter.js';
import type { ArticleStore, StoredArticle } from '../store/types.js';
import type { RecencyCache } from './recencyCache.js';
import { logger } from '../shared/logger.js';

export interface SaveBatchResult {
  saved: number;
  duplicates: number;
  totalProcessed: number;
}

export interface GatewayOptions {
  windowMs: number;
  maxRecords: number;
}

/**
 * Novelty check and persistence for candidate records, keyed by canonical link.
 *
 * Duplicate policy, shared by both paths: a repeat sighting never overwrites
 * the stored fields; it sets the stored row's duplicate flag.
 */
export class PersistenceGateway {
  constructor(
    private readonly store: ArticleStore,
    private readonly cache: RecencyCache | null,
    private readonly options: GatewayOptions,
  ) {}

  /**
   * Save a batch as one transaction. Rejects with the store's error when the
   * transaction rolls back; nothing from the batch is kept in that case.
   */
  async saveBatch(records: readonly CandidateRecord[], signal?: AbortSignal): Promise<SaveBatchResult> {
    if (records.length === 0) {
      return { saved: 0, duplicates: 0, totalProcessed: 0 };
    }

    const knownLinks = this.cache
      ? await this.cache.recentLinks(this.options.windowMs, this.options.maxRecords, signal)
      : new Set<string>();
    signal?.throwIfAborted();

    const result = this.store.insertBatchIfAbsent(records, { knownLinks });
    logger.debug(
      { saved: result.saved, duplicates: result.duplicates, cached: knownLinks.size },
      'Batch saved',
    );
    return { saved: result.saved, duplicates: result.duplicates, totalProcessed: result.total };
  }

  /**
   * Incremental save outside batch flows. Returns null for a repeat.
   */
  saveOne(record: CandidateRecord): StoredArticle | null {
    const { article, wasNew } = this.store.insertIfAbsent(record);
    if (!wasNew) {
      logger.debug({ id: article.id, title: record.title.slice(0, 50) }, 'Duplicate article seen');
      return null;
    }
    return article;
  }
}
