import type { CandidateRecord } from './adapter.js';

const TRACKING_PREFIXES = ['utm_', 'fbclid', 'gclid', 'mc_', 'mkt_', 'ref_src'];

/**
 * Canonicalize a publisher URL so the same article compares equal:
 * - Lowercase scheme + host, strip www.
 * - Drop tracking params (utm_*, fbclid, gclid, ...) and sort the rest
 * - Drop the hash and trailing slashes
 *
 * Strings that do not parse as URLs are only trimmed.
 */
export function canonicalizeLink(raw: string): string {
  const trimmed = raw.trim();
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return trimmed;
  }

  const host = url.hostname.toLowerCase().replace(/^www\./, '');

  const stale = [...url.searchParams.keys()].filter((key) =>
    TRACKING_PREFIXES.some((p) => key.toLowerCase().startsWith(p)),
  );
  for (const key of stale) {
    url.searchParams.delete(key);
  }
  url.searchParams.sort();

  let pathname = url.pathname;
  while (pathname.endsWith('/')) {
    pathname = pathname.slice(0, -1);
  }

  const search = url.searchParams.toString();
  return `${url.protocol.toLowerCase()}//${host}${url.port ? ':' + url.port : ''}${pathname}${search ? '?' + search : ''}`;
}

/**
 * First-seen-wins merge of several candidate lists. Lists are concatenated in
 * the order given and intra-list order is kept; later records whose canonical
 * link was already seen are dropped.
 */
export function mergeCandidates(lists: ReadonlyArray<readonly CandidateRecord[]>): {
  merged: CandidateRecord[];
  dropped: number;
} {
  const seen = new Set<string>();
  const merged: CandidateRecord[] = [];
  let dropped = 0;

  for (const list of lists) {
    for (const record of list) {
      if (seen.has(record.canonical_link)) {
        dropped++;
        continue;
      }
      seen.add(record.canonical_link);
      merged.push(record);
    }
  }

  return { merged, dropped };
}
