/**
 * Continuous collection driven by node-cron. The first cycle pulls a large
 * batch; later cycles pull incremental batches. Started by `newsgather watch`
 * and `newsgather server`.
 */

import cron from 'node-cron';
import type { Config } from '../shared/config.js';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { parseQuery, type QueryKind } from '../source/adapter.js';
import type { CollectionOrchestrator, CollectionOutcome } from '../collect/orchestrator.js';

export interface CycleTotals {
  cycles: number;
  collected: number;
  saved: number;
  duplicates: number;
  apiCount: number;
  crawlCount: number;
}

export function emptyTotals(): CycleTotals {
  return { cycles: 0, collected: 0, saved: 0, duplicates: 0, apiCount: 0, crawlCount: 0 };
}

export function addOutcomes(totals: CycleTotals, outcomes: readonly CollectionOutcome[]): CycleTotals {
  const next = { ...totals, cycles: totals.cycles + 1 };
  for (const o of outcomes) {
    if (!o.success) continue;
    next.collected += o.collected;
    next.saved += o.saved;
    next.duplicates += o.duplicates;
    next.apiCount += o.apiCount;
    next.crawlCount += o.crawlCount;
  }
  return next;
}

export class CollectionScheduler {
  private task: cron.ScheduledTask | null = null;
  private running = false;
  private abort: AbortController | null = null;
  private totals = emptyTotals();
  private readonly queries: QueryKind[];

  constructor(
    private readonly orchestrator: CollectionOrchestrator,
    private readonly schedule: Config['schedule'],
  ) {
    this.queries = schedule.queries.length > 0 ? schedule.queries.map((q) => parseQuery(q)) : [parseQuery('latest')];
  }

  get stats(): CycleTotals {
    return { ...this.totals };
  }

  /**
   * One collection cycle. Skipped (returns null) while a previous cycle runs.
   */
  async runCycle(): Promise<CollectionOutcome[] | null> {
    if (this.running) {
      logger.warn('Previous collection cycle still running, skipping');
      return null;
    }
    this.running = true;
    this.abort = new AbortController();

    const maxCount =
      this.totals.cycles === 0 ? this.schedule.initial_max_count : this.schedule.incremental_max_count;

    try {
      const outcomes = await this.orchestrator.collectMany(this.queries, maxCount, {
        signal: this.abort.signal,
      });
      this.totals = addOutcomes(this.totals, outcomes);
      logger.info({ maxCount, ...this.totals }, 'Collection cycle complete');
      return outcomes;
    } finally {
      this.running = false;
      this.abort = null;
    }
  }

  start(options: { runImmediately?: boolean } = {}): boolean {
    const expression = this.schedule.collect_cron;
    if (!cron.validate(expression)) {
      logger.warn({ collect_cron: expression }, 'Invalid collect_cron expression, scheduler not started');
      return false;
    }

    this.task = cron.schedule(expression, () => {
      this.runCycle().catch((err: unknown) => {
        logger.error({ error: errorMessage(err) }, 'Scheduled collection failed');
      });
    });

    logger.info({ collect_cron: expression, queries: this.queries.length }, 'Scheduler started');

    if (options.runImmediately) {
      this.runCycle().catch((err: unknown) => {
        logger.error({ error: errorMessage(err) }, 'Initial collection failed');
      });
    }
    return true;
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
    this.abort?.abort();
    logger.info(this.totals, 'Scheduler stopped');
  }
}
