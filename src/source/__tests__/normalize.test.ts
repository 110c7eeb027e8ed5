import { describe, it, expect } from 'vitest';
import { cleanHtml, matchesKeyword, finalizeRecords } from '../normalize.js';
import { LATEST, keywordQuery, parseQuery, queryLabel } from '../adapter.js';
import { makeRecord } from './fixtures.js';

describe('cleanHtml', () => {
  it('strips tags and decodes entities', () => {
    expect(cleanHtml('<b>서울</b> 날씨 &amp; 교통')).toBe('서울 날씨 & 교통');
    expect(cleanHtml('&quot;quoted&quot; &#39;single&#39; &lt;tag&gt;')).toBe('"quoted" \'single\' <tag>');
  });

  it('drops script and style blocks', () => {
    expect(cleanHtml('<style>p{}</style>Hello<script>alert(1)</script>')).toBe('Hello');
  });

  it('collapses whitespace', () => {
    expect(cleanHtml('  a \n\n b&nbsp;c ')).toBe('a b c');
  });

  it('returns empty string for missing input', () => {
    expect(cleanHtml(null)).toBe('');
    expect(cleanHtml(undefined)).toBe('');
  });
});

describe('matchesKeyword', () => {
  it('matches title or summary, case-insensitively', () => {
    expect(matchesKeyword({ title: 'OpenAI news', summary: undefined }, 'openai')).toBe(true);
    expect(matchesKeyword({ title: 'Weather', summary: 'Rain in 서울 today' }, '서울')).toBe(true);
    expect(matchesKeyword({ title: 'Weather', summary: 'Rain' }, '서울')).toBe(false);
  });
});

describe('finalizeRecords', () => {
  it('drops records without title or link', () => {
    const records = [
      makeRecord({ title: '   ' }),
      makeRecord({ canonical_link: '' }),
      makeRecord({ canonical_link: 'https://example.com/ok' }),
    ];
    const out = finalizeRecords(records, LATEST, 10);
    expect(out.map((r) => r.canonical_link)).toEqual(['https://example.com/ok']);
  });

  it('drops records missing the keyword', () => {
    const records = [
      makeRecord({ title: '경제 뉴스', summary: undefined, canonical_link: 'https://x.com/1' }),
      makeRecord({ title: '스포츠 소식', summary: '경제 효과', canonical_link: 'https://x.com/2' }),
      makeRecord({ title: '날씨', summary: '맑음', canonical_link: 'https://x.com/3' }),
    ];
    const out = finalizeRecords(records, keywordQuery('경제'), 10);
    expect(out.map((r) => r.canonical_link)).toEqual(['https://x.com/1', 'https://x.com/2']);
  });

  it('caps the result at the limit', () => {
    const records = [1, 2, 3].map((n) => makeRecord({ canonical_link: `https://x.com/${n}` }));
    expect(finalizeRecords(records, LATEST, 2)).toHaveLength(2);
    expect(finalizeRecords(records, LATEST, 0)).toHaveLength(0);
  });
});

describe('parseQuery', () => {
  it('maps empty input and "latest" to the latest sentinel', () => {
    expect(parseQuery(undefined)).toEqual(LATEST);
    expect(parseQuery('  ')).toEqual(LATEST);
    expect(parseQuery('LATEST')).toEqual(LATEST);
  });

  it('trims keywords', () => {
    expect(parseQuery(' 경제 ')).toEqual({ kind: 'keyword', keyword: '경제' });
  });

  it('labels queries', () => {
    expect(queryLabel(LATEST)).toBe('latest');
    expect(queryLabel(keywordQuery('AI'))).toBe('AI');
  });
});
