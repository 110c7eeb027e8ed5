import type { CandidateRecord, QueryKind } from './adapter.js';

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&nbsp;': ' ',
};

/**
 * Strip HTML tags (search APIs wrap matches in <b>) and decode common entities.
 */
export function cleanHtml(html: string | undefined | null): string {
  if (!html) return '';
  let text = html.replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, '');
  text = text.replace(/<[^>]+>/g, '');
  text = text.replace(/&(amp|lt|gt|quot|#39|apos|nbsp);/g, (entity) => ENTITIES[entity] ?? entity);
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Case-insensitive substring match against title or summary.
 */
export function matchesKeyword(record: Pick<CandidateRecord, 'title' | 'summary'>, keyword: string): boolean {
  const needle = keyword.toLowerCase();
  return (
    record.title.toLowerCase().includes(needle) ||
    (record.summary ?? '').toLowerCase().includes(needle)
  );
}

/**
 * The contract every adapter result passes through before it leaves the
 * adapter: no empty titles or links, keyword present when one was asked for,
 * never more than `limit` records. Failing records are dropped, not reported.
 */
export function finalizeRecords(
  records: readonly CandidateRecord[],
  query: QueryKind,
  limit: number,
): CandidateRecord[] {
  const out: CandidateRecord[] = [];
  for (const record of records) {
    if (out.length >= limit) break;
    if (!record.title.trim() || !record.canonical_link.trim()) continue;
    if (query.kind === 'keyword' && !matchesKeyword(record, query.keyword)) continue;
    out.push(record);
  }
  return out;
}
