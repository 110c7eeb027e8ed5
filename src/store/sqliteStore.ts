import type Database from 'better-sqlite3';
import type { CandidateRecord } from '../source/adapter.js';
import { matchesKeyword } from '../source/normalize.js';
import { DbError, errorMessage } from '../shared/errors.js';
import { nowISO } from '../shared/utils.js';
import { closeDb } from '../db/db.js';
import type {
  AggregateCounts,
  ArticleStore,
  BatchInsertOptions,
  BatchInsertResult,
  CollectionAttemptLog,
  CollectionLogRow,
  StoredArticle,
} from './types.js';

/**
 * better-sqlite3 backed store. Statements are prepared once; every write path
 * relies on the UNIQUE(canonical_link) constraint rather than a prior SELECT,
 * so concurrent writers racing on a link resolve to one row.
 */
export class SqliteArticleStore implements ArticleStore {
  private readonly insertStmt: Database.Statement;
  private readonly markDuplicateStmt: Database.Statement;
  private readonly byLinkStmt: Database.Statement;

  constructor(private readonly db: Database.Database) {
    this.insertStmt = db.prepare(
      `INSERT INTO articles
         (title, canonical_link, link, summary, pub_date, source, keyword, category, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(canonical_link) DO NOTHING`,
    );
    this.markDuplicateStmt = db.prepare(
      'UPDATE articles SET is_duplicate = 1, updated_at = ? WHERE canonical_link = ?',
    );
    this.byLinkStmt = db.prepare('SELECT * FROM articles WHERE canonical_link = ?');
  }

  private tryInsert(record: CandidateRecord): boolean {
    const now = nowISO();
    const result = this.insertStmt.run(
      record.title,
      record.canonical_link,
      record.link,
      record.summary ?? null,
      record.pub_date,
      record.source,
      record.keyword,
      record.category,
      now,
      now,
    );
    return result.changes > 0;
  }

  private markDuplicate(link: string): boolean {
    return this.markDuplicateStmt.run(nowISO(), link).changes > 0;
  }

  insertIfAbsent(record: CandidateRecord): { article: StoredArticle; wasNew: boolean } {
    try {
      const run = this.db.transaction((): boolean => {
        if (this.tryInsert(record)) return true;
        this.markDuplicate(record.canonical_link);
        return false;
      });
      const wasNew = run();
      const article = this.byLinkStmt.get(record.canonical_link) as StoredArticle | undefined;
      if (!article) {
        throw new DbError('Article vanished after insert', { canonical_link: record.canonical_link });
      }
      return { article, wasNew };
    } catch (err) {
      if (err instanceof DbError) throw err;
      throw new DbError(`Failed to save article: ${errorMessage(err)}`, {
        canonical_link: record.canonical_link,
      });
    }
  }

  insertBatchIfAbsent(
    records: readonly CandidateRecord[],
    options: BatchInsertOptions = {},
  ): BatchInsertResult {
    const known = options.knownLinks;

    const run = this.db.transaction((): BatchInsertResult => {
      let saved = 0;
      let duplicates = 0;

      for (const record of records) {
        // A known link whose row has since been removed falls through to insert.
        if (known?.has(record.canonical_link) && this.markDuplicate(record.canonical_link)) {
          duplicates++;
          continue;
        }
        if (this.tryInsert(record)) {
          saved++;
        } else {
          this.markDuplicate(record.canonical_link);
          duplicates++;
        }
      }

      return { saved, duplicates, total: records.length };
    });

    try {
      return run();
    } catch (err) {
      throw new DbError(`Batch save rolled back: ${errorMessage(err)}`, { batch_size: records.length });
    }
  }

  queryLinksSince(cutoff: string, limit: number): Set<string> {
    const rows = this.db
      .prepare(
        `SELECT canonical_link FROM articles
         WHERE created_at >= ?
         ORDER BY created_at DESC
         LIMIT ?`,
      )
      .all(cutoff, limit) as Array<{ canonical_link: string }>;
    return new Set(rows.map((r) => r.canonical_link).filter((link) => link.length > 0));
  }

  appendLog(entry: CollectionAttemptLog): void {
    try {
      this.db
        .prepare(
          `INSERT INTO collection_logs
             (run_id, source, keyword, collected, saved, duplicates, success, error_message, elapsed_ms, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          entry.run_id,
          entry.source,
          entry.keyword,
          entry.collected,
          entry.saved,
          entry.duplicates,
          entry.success ? 1 : 0,
          entry.error_message ?? null,
          Math.round(entry.elapsed_ms),
          nowISO(),
        );
    } catch (err) {
      throw new DbError(`Failed to write collection log: ${errorMessage(err)}`, { run_id: entry.run_id });
    }
  }

  aggregateCounts(): AggregateCounts {
    const row = this.db
      .prepare(
        `SELECT COUNT(*) AS total,
                COUNT(DISTINCT canonical_link) AS uniq,
                COALESCE(SUM(CASE WHEN is_duplicate = 1 THEN 1 ELSE 0 END), 0) AS duplicates
         FROM articles`,
      )
      .get() as { total: number; uniq: number; duplicates: number };
    return { total: row.total, duplicates: row.duplicates, unique: row.uniq };
  }

  ping(): boolean {
    try {
      this.db.prepare('SELECT 1').get();
      return true;
    } catch {
      return false;
    }
  }

  getArticle(id: number): StoredArticle | undefined {
    return this.db.prepare('SELECT * FROM articles WHERE id = ?').get(id) as StoredArticle | undefined;
  }

  getRecentArticles(limit: number): StoredArticle[] {
    return this.db
      .prepare('SELECT * FROM articles ORDER BY created_at DESC, id DESC LIMIT ?')
      .all(limit) as StoredArticle[];
  }

  listRecentLogs(limit: number): CollectionLogRow[] {
    return this.db
      .prepare('SELECT * FROM collection_logs ORDER BY created_at DESC, id DESC LIMIT ?')
      .all(limit) as CollectionLogRow[];
  }

  countBySource(): Array<{ source: string; count: number }> {
    return this.db
      .prepare('SELECT source, COUNT(*) AS count FROM articles GROUP BY source ORDER BY count DESC, source')
      .all() as Array<{ source: string; count: number }>;
  }

  countByKeyword(limit: number): Array<{ keyword: string; count: number }> {
    return this.db
      .prepare(
        `SELECT keyword, COUNT(*) AS count FROM articles
         GROUP BY keyword ORDER BY count DESC, keyword LIMIT ?`,
      )
      .all(limit) as Array<{ keyword: string; count: number }>;
  }

  findIrrelevant(): StoredArticle[] {
    const rows = this.db
      .prepare("SELECT * FROM articles WHERE keyword != '' AND keyword != 'latest' ORDER BY id")
      .all() as StoredArticle[];
    return rows.filter(
      (row) => !matchesKeyword({ title: row.title, summary: row.summary ?? undefined }, row.keyword),
    );
  }

  deleteArticles(ids: readonly number[]): number {
    if (ids.length === 0) return 0;
    const stmt = this.db.prepare('DELETE FROM articles WHERE id = ?');
    const run = this.db.transaction((batch: readonly number[]) => {
      let removed = 0;
      for (const id of batch) {
        removed += stmt.run(id).changes;
      }
      return removed;
    });
    return run(ids);
  }

  close(): void {
    closeDb(this.db);
  }
}
