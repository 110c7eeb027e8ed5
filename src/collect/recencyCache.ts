import type { ArticleStore } from '../store/types.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep, toSqlTimestamp } from '../shared/utils.js';

export interface RecencyCacheOptions {
  retryAttempts: number;
  retryDelayMs: number;
  now?: () => Date;
  wait?: (ms: number) => Promise<void>;
}

/**
 * Time-windowed read of recently stored links.
 *
 * Fails open: when every attempt fails the result is an empty set, which only
 * means "nothing known", never "nothing is duplicate".
 */
export class RecencyCache {
  private readonly now: () => Date;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(
    private readonly store: ArticleStore,
    private readonly options: RecencyCacheOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.wait = options.wait ?? sleep;
  }

  async recentLinks(windowMs: number, maxRecords: number, signal?: AbortSignal): Promise<Set<string>> {
    const attempts = Math.max(1, this.options.retryAttempts);

    for (let attempt = 1; attempt <= attempts; attempt++) {
      signal?.throwIfAborted();

      const cutoff = toSqlTimestamp(new Date(this.now().getTime() - windowMs));
      try {
        const links = this.store.queryLinksSince(cutoff, maxRecords);
        logger.debug({ count: links.size, cutoff, maxRecords }, 'Recency cache loaded');
        return links;
      } catch (err) {
        logger.warn(
          { attempt, attempts, error: errorMessage(err) },
          'Recency cache query failed',
        );
        if (attempt < attempts) {
          await this.wait(this.options.retryDelayMs);
        }
      }
    }

    logger.error({ attempts }, 'Recency cache unavailable, continuing with an empty cache');
    return new Set();
  }
}
