import { describe, expect, it } from 'vitest';
import type { SiteConfig } from '../config';
import type { JobRecord } from '../extraction/types';
import { BaseParser, getParser, HttpSiteParser, registerParser } from './index';
import { buildSearchUrl, withPageParam } from './http-parser';

class FixtureParser extends HttpSiteParser {
  readonly requested: string[] = [];

  constructor(site: SiteConfig, private readonly pages: Record<string, string>) {
    super(site);
  }

  protected async fetchPage(url: string): Promise<string> {
    this.requested.push(url);
    const html = this.pages[url];
    if (html === undefined) throw new Error(`Request failed with status code 404`);
    return html;
  }
}

function listing(...titles: string[]): string {
  const items = titles.map((t, i) => `<li><a class="title" href="/jobs/${encodeURIComponent(t)}-${i}">${t}</a></li>`);
  return `<ul class="results">${items.join('')}</ul>`;
}

const site: SiteConfig = {
  name: 'board',
  enabled: true,
  urlTemplate: 'https://jobs.example.com/search?q={keyword}',
  jobList: 'ul.results > li',
  extraction: { strategy: 'simple', title: 'a.title' },
  pagination: { param: 'page', maxPages: 3 },
  pageDelayMs: 0,
};

const base = 'https://jobs.example.com/search?q=%EB%B0%B1%EC%97%94%EB%93%9C';

describe('URL helpers', () => {
  it('substitutes the URL-encoded keyword', () => {
    expect(buildSearchUrl(site.urlTemplate, '백엔드')).toBe(base);
    expect(buildSearchUrl('https://jobs.example.com/{keyword}/list?k={keyword}', 'a b'))
      .toBe('https://jobs.example.com/a%20b/list?k=a%20b');
  });

  it('appends the page parameter with the right separator', () => {
    expect(withPageParam('https://jobs.example.com/list', 'p', 2)).toBe('https://jobs.example.com/list?p=2');
    expect(withPageParam(base, 'page', 1)).toBe(`${base}&page=1`);
  });
});

describe('HttpSiteParser', () => {
  it('walks pages until one has no listings', async () => {
    const parser = new FixtureParser(site, {
      [`${base}&page=1`]: listing('백엔드 개발자', '데이터 엔지니어'),
      [`${base}&page=2`]: listing('QA 엔지니어'),
      [`${base}&page=3`]: '<p>결과 없음</p>',
    });

    const records = await parser.search('백엔드');
    expect(records.map(r => r.title)).toEqual(['백엔드 개발자', '데이터 엔지니어', 'QA 엔지니어']);
    expect(parser.requested).toHaveLength(3);
  });

  it('stops early on an empty page', async () => {
    const parser = new FixtureParser(site, {
      [`${base}&page=1`]: '<p>결과 없음</p>',
      [`${base}&page=2`]: listing('QA 엔지니어'),
    });

    expect(await parser.search('백엔드')).toEqual([]);
    expect(parser.requested).toEqual([`${base}&page=1`]);
  });

  it('fetches a single page without pagination', async () => {
    const single: SiteConfig = { ...site, pagination: undefined };
    const parser = new FixtureParser(single, { [base]: listing('백엔드 개발자') });

    const records = await parser.search('백엔드');
    expect(records).toEqual([{
      title: '백엔드 개발자',
      company: 'Unknown',
      link: `https://jobs.example.com/jobs/${encodeURIComponent('백엔드 개발자')}-0`,
      source: 'board',
    }]);
    expect(parser.requested).toEqual([base]);
  });

  it('propagates a failure on the first page', async () => {
    const parser = new FixtureParser(site, {});
    await expect(parser.search('백엔드')).rejects.toThrow('status code 404');
  });

  it('keeps earlier pages when a later page fails', async () => {
    const parser = new FixtureParser(site, { [`${base}&page=1`]: listing('백엔드 개발자') });
    const records = await parser.search('백엔드');
    expect(records.map(r => r.title)).toEqual(['백엔드 개발자']);
    expect(parser.requested).toEqual([`${base}&page=1`, `${base}&page=2`]);
  });
});

describe('getParser', () => {
  it('returns an HTTP parser for enabled sites only', () => {
    expect(getParser(site)).toBeInstanceOf(HttpSiteParser);
    expect(getParser(site)?.source).toBe('board');
    expect(getParser({ ...site, enabled: false })).toBeNull();
  });

  it('prefers a registered parser for the site name', () => {
    class StaticParser extends BaseParser {
      async search(): Promise<JobRecord[]> {
        return [];
      }
    }
    registerParser('static-board', StaticParser);
    expect(getParser({ ...site, name: 'static-board' })).toBeInstanceOf(StaticParser);
  });

  it('ignores built-in object property names', () => {
    for (const name of ['constructor', 'toString', '__proto__']) {
      const parser = getParser({ ...site, name });
      expect(parser).toBeInstanceOf(HttpSiteParser);
      expect(parser?.source).toBe(name);
    }
  });
});
