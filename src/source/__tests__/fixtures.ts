import type { CandidateRecord } from '../adapter.js';

export function makeRecord(overrides: Partial<CandidateRecord> = {}): CandidateRecord {
  return {
    title: 'Test article title',
    canonical_link: 'https://example.com/a',
    link: 'https://example.com/a',
    summary: 'Test summary',
    pub_date: 'Mon, 01 Jan 2024 00:00:00 GMT',
    source: 'api',
    keyword: 'latest',
    category: 'general',
    ...overrides,
  };
}
