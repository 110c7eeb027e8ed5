import type { CandidateRecord, SourceTag } from '../source/adapter.js';

/**
 * Database row shape for the articles table.
 */
export interface StoredArticle {
  id: number;
  title: string;
  canonical_link: string;
  link: string;
  summary: string | null;
  pub_date: string;
  source: SourceTag;
  keyword: string;
  category: string;
  created_at: string;
  updated_at: string;
  is_duplicate: number;
  is_processed: number;
}

/**
 * One orchestration attempt, as written. `source` is a tag or a composite
 * such as "api+crawl".
 */
export interface CollectionAttemptLog {
  run_id: string;
  source: string;
  keyword: string;
  collected: number;
  saved: number;
  duplicates: number;
  success: boolean;
  error_message?: string;
  elapsed_ms: number;
}

/**
 * Database row shape for the collection_logs table.
 */
export interface CollectionLogRow {
  id: number;
  run_id: string;
  source: string;
  keyword: string;
  collected: number;
  saved: number;
  duplicates: number;
  success: number;
  error_message: string | null;
  elapsed_ms: number;
  created_at: string;
}

export interface BatchInsertResult {
  saved: number;
  duplicates: number;
  total: number;
}

export interface AggregateCounts {
  total: number;
  /** Stored articles seen again after their first save. */
  duplicates: number;
  /** Distinct canonical links. */
  unique: number;
}

export interface BatchInsertOptions {
  /**
   * Links already known to be stored (from the recency cache). Matching
   * records skip the insert attempt and go straight to duplicate marking.
   */
  knownLinks?: ReadonlySet<string>;
}

export interface ArticleStore {
  /** Insert, or mark the existing row as duplicate. */
  insertIfAbsent(record: CandidateRecord): { article: StoredArticle; wasNew: boolean };
  /** All-or-nothing. First occurrence of a link wins within the batch. */
  insertBatchIfAbsent(records: readonly CandidateRecord[], options?: BatchInsertOptions): BatchInsertResult;
  /** Links of rows created at or after `cutoff` (SQL timestamp), at most `limit`. */
  queryLinksSince(cutoff: string, limit: number): Set<string>;
  appendLog(entry: CollectionAttemptLog): void;
  aggregateCounts(): AggregateCounts;

  ping(): boolean;
  getArticle(id: number): StoredArticle | undefined;
  getRecentArticles(limit: number): StoredArticle[];
  listRecentLogs(limit: number): CollectionLogRow[];
  countBySource(): Array<{ source: string; count: number }>;
  countByKeyword(limit: number): Array<{ keyword: string; count: number }>;
  /** Keyword-tagged rows whose title and summary lack their keyword. */
  findIrrelevant(): StoredArticle[];
  deleteArticles(ids: readonly number[]): number;
  close(): void;
}
