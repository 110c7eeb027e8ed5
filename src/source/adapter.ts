export type SourceTag = 'api' | 'crawl';

/**
 * What to collect: articles matching a keyword, or the newest articles
 * without filtering.
 */
export type QueryKind = { kind: 'keyword'; keyword: string } | { kind: 'latest' };

export const LATEST: QueryKind = { kind: 'latest' };

export function keywordQuery(keyword: string): QueryKind {
  return { kind: 'keyword', keyword };
}

/**
 * Label stored in the keyword column and in attempt logs.
 */
export function queryLabel(query: QueryKind): string {
  return query.kind === 'keyword' ? query.keyword : 'latest';
}

/**
 * Parse a user-supplied query; an empty string or "latest" means the sentinel.
 */
export function parseQuery(input: string | undefined): QueryKind {
  const trimmed = input?.trim() ?? '';
  if (!trimmed || trimmed.toLowerCase() === 'latest') return LATEST;
  return keywordQuery(trimmed);
}

/**
 * Normalized candidate produced by a source adapter. Immutable once produced.
 */
export interface CandidateRecord {
  readonly title: string;
  /** Publisher URL, canonicalized. The dedup key. */
  readonly canonical_link: string;
  readonly link: string;
  readonly summary?: string;
  /** Source-formatted publish time, stored as-is. */
  readonly pub_date: string;
  readonly source: SourceTag;
  readonly keyword: string;
  readonly category: string;
}

export interface FetchOptions {
  category?: string;
  signal?: AbortSignal;
}

/**
 * Result of one adapter fetch. A transient failure yields whatever was
 * gathered before it (often nothing) together with the reason.
 */
export interface AdapterResult {
  records: CandidateRecord[];
  error?: string;
}

export interface SourceAdapter {
  readonly tag: SourceTag;
  /**
   * Resolves with at most `limit` records. Rejects only when `options.signal`
   * is aborted.
   */
  fetch(query: QueryKind, limit: number, options?: FetchOptions): Promise<AdapterResult>;
  /** Reachability and credential check; never rejects. */
  validate(): Promise<boolean>;
  /** Abort in-flight requests. */
  close(): void;
}
