import type { ArticleStore, CollectionLogRow } from '../store/types.js';

export interface Statistics {
  total: number;
  duplicates: number;
  unique: number;
  bySource: Array<{ source: string; count: number }>;
  topKeywords: Array<{ keyword: string; count: number }>;
  recentCollections: CollectionLogRow[];
}

export function getStatistics(store: ArticleStore, opts: { topKeywords?: number; recentLogs?: number } = {}): Statistics {
  const counts = store.aggregateCounts();
  return {
    ...counts,
    bySource: store.countBySource(),
    topKeywords: store.countByKeyword(opts.topKeywords ?? 10),
    recentCollections: store.listRecentLogs(opts.recentLogs ?? 5),
  };
}
