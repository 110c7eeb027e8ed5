#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import { loadConfig, writeDefaultConfig, getDefaultConfigPath, type Config } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { parseQuery, LATEST, type QueryKind } from '../source/adapter.js';
import { withCollector, STORE_ONLY, type Collector, type CollectorDeps } from '../collect/setup.js';
import type { CollectionOutcome } from '../collect/orchestrator.js';
import { CollectionScheduler } from '../schedule/scheduler.js';
import { startServer } from '../api/server.js';

interface SourceFlags {
  count?: string;
  category?: string;
  api: boolean;
  crawl: boolean;
}

const program = new Command();

program
  .name('newsgather')
  .description('Collect news from a search API and an aggregator, deduplicated by publisher link')
  .version('0.1.0')
  .option('--config <path>', 'Config file (defaults to ~/.newsgather/config.yaml)');

// === init ===
program
  .command('init')
  .description('Write a default config file')
  .action(() => {
    const configPath = getDefaultConfigPath();
    if (fs.existsSync(configPath)) {
      log(`✓ ${configPath} already exists`);
      return;
    }
    writeDefaultConfig(configPath);
    log(`✓ ${configPath} created; add your search API credentials before collecting`);
  });

// === validate ===
program
  .command('validate')
  .description('Check source credentials/reachability and the database without collecting')
  .action(async () => {
    await run(async (collector) => {
      const ok = await collector.orchestrator.validateSetup();
      log(ok ? '✓ Setup is valid' : '✗ Setup has problems, see the log output');
      if (!ok) process.exitCode = 1;
    });
  });

// === collect ===
withSourceOptions(
  program.command('collect <keyword>').description('Collect articles mentioning a keyword'),
).action(async (keyword: string, opts: SourceFlags) => {
  await run(async (collector, config) => {
    const outcome = await collector.orchestrator.collect(parseQuery(keyword), count(opts, config), {
      useApi: opts.api,
      useCrawl: opts.crawl,
      category: opts.category,
    });
    printOutcome(outcome);
    if (!outcome.success) process.exitCode = 1;
  });
});

withSourceOptions(
  program.command('collect-many <keywords...>').description('Collect several keywords in order'),
).action(async (keywords: string[], opts: SourceFlags) => {
  await run(async (collector, config) => {
    const queries: QueryKind[] = keywords.map((k) => parseQuery(k));
    const outcomes = await collector.orchestrator.collectMany(queries, count(opts, config), {
      useApi: opts.api,
      useCrawl: opts.crawl,
      category: opts.category,
    });
    for (const outcome of outcomes) {
      printOutcome(outcome);
    }
    const ok = outcomes.filter((o) => o.success);
    log('');
    log(`Queries: ${outcomes.length} (${ok.length} succeeded)`);
    log(`Collected: ${sum(ok, 'collected')}  Saved: ${sum(ok, 'saved')}  Duplicates: ${sum(ok, 'duplicates')}`);
  });
});

withSourceOptions(
  program.command('latest').description('Collect the newest articles without keyword filtering'),
).action(async (opts: SourceFlags) => {
  await run(async (collector, config) => {
    const outcome = await collector.orchestrator.collect(LATEST, count(opts, config), {
      useApi: opts.api,
      useCrawl: opts.crawl,
      category: opts.category,
    });
    printOutcome(outcome);
    if (!outcome.success) process.exitCode = 1;
  });
});

program
  .command('trending')
  .description('Collect for the first trending keyword and list the newest articles')
  .option('-c, --count <n>', 'Number of articles', '20')
  .action(async (opts: { count: string }) => {
    await run(async (collector) => {
      const articles = await collector.orchestrator.collectTrending(positiveInt(opts.count, 20));
      if (articles.length === 0) {
        log('✗ No trending articles collected');
        process.exitCode = 1;
        return;
      }
      articles.slice(0, 5).forEach((a, i) => log(`${i + 1}. ${a.title.slice(0, 60)}`));
      log(`✓ ${articles.length} articles`);
    });
  });

// === reporting ===
program
  .command('stats')
  .description('Show database statistics')
  .action(async () => {
    await run((collector) => {
      const stats = collector.orchestrator.getStatistics();
      log(`Articles:   ${stats.total}`);
      log(`Unique:     ${stats.unique}`);
      log(`Resighted:  ${stats.duplicates}`);
      if (stats.bySource.length > 0) {
        log('');
        for (const row of stats.bySource) log(`  ${row.source.padEnd(8)} ${row.count}`);
      }
      if (stats.topKeywords.length > 0) {
        log('');
        for (const row of stats.topKeywords) log(`  ${row.keyword.padEnd(16)} ${row.count}`);
      }
      if (stats.recentCollections.length > 0) {
        log('');
        for (const entry of stats.recentCollections) {
          const status = entry.success ? '✓' : '✗';
          log(`  ${status} ${entry.created_at}  ${entry.source.padEnd(9)} ${entry.keyword}  saved=${entry.saved} dup=${entry.duplicates}`);
        }
      }
      return Promise.resolve();
    }, STORE_ONLY);
  });

program
  .command('recent')
  .description('List the most recently stored articles')
  .option('-n, --limit <n>', 'Number of articles', '10')
  .action(async (opts: { limit: string }) => {
    await run((collector) => {
      for (const a of collector.store.getRecentArticles(positiveInt(opts.limit, 10))) {
        const dup = a.is_duplicate ? ' (dup)' : '';
        log(`[${a.id}] ${a.source.padEnd(5)} ${a.title.slice(0, 60)}${dup}`);
        log(`      ${a.canonical_link}`);
      }
      return Promise.resolve();
    }, STORE_ONLY);
  });

program
  .command('prune')
  .description('Find stored articles whose title and summary lack their keyword')
  .option('--delete', 'Delete them instead of listing', false)
  .action(async (opts: { delete: boolean }) => {
    await run((collector) => {
      const irrelevant = collector.store.findIrrelevant();
      for (const a of irrelevant.slice(0, 20)) {
        log(`[${a.id}] ${a.keyword}: ${a.title.slice(0, 60)}`);
      }
      if (opts.delete) {
        const removed = collector.store.deleteArticles(irrelevant.map((a) => a.id));
        log(`✓ ${removed} articles deleted`);
      } else {
        log(`${irrelevant.length} irrelevant articles (use --delete to remove)`);
      }
      return Promise.resolve();
    }, STORE_ONLY);
  });

// === long-running ===
program
  .command('watch')
  .description('Collect continuously on the configured cron schedule')
  .action(async () => {
    const config = await loadConfig(configPath());
    await withCollector(config, (collector) => {
      const scheduler = new CollectionScheduler(collector.orchestrator, config.schedule);
      if (!scheduler.start({ runImmediately: true })) {
        process.exitCode = 1;
        return Promise.resolve();
      }
      return new Promise<void>((resolve) => {
        const stop = (): void => {
          scheduler.stop();
          const t = scheduler.stats;
          log(`Cycles: ${t.cycles}  Collected: ${t.collected} (api ${t.apiCount}, crawl ${t.crawlCount})  Saved: ${t.saved}  Duplicates: ${t.duplicates}`);
          resolve();
        };
        process.once('SIGINT', stop);
        process.once('SIGTERM', stop);
      });
    });
  });

program
  .command('server')
  .description('Start the HTTP API')
  .option('-p, --port <port>', 'Port')
  .option('--schedule', 'Also run the collection scheduler', false)
  .action(async (opts: { port?: string; schedule: boolean }) => {
    const config = await loadConfig(configPath());
    startServer(config, {
      port: opts.port ? positiveInt(opts.port, config.server.port) : undefined,
      schedule: opts.schedule,
    });
  });

function withSourceOptions(cmd: Command): Command {
  return cmd
    .option('-c, --count <n>', 'Maximum number of articles')
    .option('--category <name>', 'Category stored with each article')
    .option('--no-api', 'Skip the search API source')
    .option('--no-crawl', 'Skip the aggregator crawl source');
}

function configPath(): string | undefined {
  const opts = program.opts<{ config?: string }>();
  return opts.config;
}

async function run(
  fn: (collector: Collector, config: Config) => Promise<void>,
  deps?: CollectorDeps,
): Promise<void> {
  try {
    const config = await loadConfig(configPath());
    await withCollector(config, (collector) => fn(collector, config), deps);
  } catch (err) {
    log(`✗ ${errorMessage(err)}`);
    process.exitCode = 1;
  }
}

function positiveInt(raw: string, fallback: number): number {
  const n = Number.parseInt(raw, 10);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

function count(opts: SourceFlags, config: Config): number {
  return opts.count ? positiveInt(opts.count, config.collect.default_max_count) : config.collect.default_max_count;
}

function sum(outcomes: readonly CollectionOutcome[], key: 'collected' | 'saved' | 'duplicates'): number {
  return outcomes.reduce((n, o) => n + o[key], 0);
}

function printOutcome(o: CollectionOutcome): void {
  if (o.success) {
    log(`✓ ${o.query}: collected ${o.collected} (api ${o.apiCount}, crawl ${o.crawlCount}), saved ${o.saved}, duplicates ${o.duplicates}, ${(o.elapsedMs / 1000).toFixed(2)}s`);
  } else {
    log(`✗ ${o.query}: ${o.error ?? 'nothing collected'}`);
  }
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(`✗ ${errorMessage(err)}`);
  process.exitCode = 1;
});
