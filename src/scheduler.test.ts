import { describe, expect, it, vi } from 'vitest';
import { parseConfig, type ScheduleConfig, type SiteConfig } from './config';
import type { JobRecord } from './extraction/types';
import type { MatchResult } from './matching/matcher';
import type { Notifier } from './notifier';
import { BaseParser } from './parsers';
import {
  dedupeByLink,
  describeSchedule,
  formatReport,
  isWithinWindow,
  minutesOfDay,
  runExclusive,
  runSearchCycle,
  shouldRunAt,
  type SearchReport,
} from './scheduler';

const seoul = { intervalMinutes: 60, timezone: 'Asia/Seoul' } satisfies ScheduleConfig;

// Asia/Seoul is UTC+9 all year.
function kst(hhmm: string, seconds = 0): Date {
  const [h, m] = hhmm.split(':').map(Number);
  return new Date(Date.UTC(2026, 2, 5, h - 9, m, seconds));
}

describe('clock helpers', () => {
  it('reads the time of day in the configured zone', () => {
    expect(minutesOfDay(new Date('2026-03-05T00:30:00Z'), 'Asia/Seoul')).toBe(9 * 60 + 30);
    expect(minutesOfDay(new Date('2026-03-05T15:00:00Z'), 'Asia/Seoul')).toBe(0);
  });

  it('handles plain and overnight windows inclusively', () => {
    expect(isWithinWindow(9 * 60, '09:00', '18:00')).toBe(true);
    expect(isWithinWindow(18 * 60, '09:00', '18:00')).toBe(true);
    expect(isWithinWindow(18 * 60 + 1, '09:00', '18:00')).toBe(false);
    expect(isWithinWindow(23 * 60, '22:00', '06:00')).toBe(true);
    expect(isWithinWindow(5 * 60, '22:00', '06:00')).toBe(true);
    expect(isWithinWindow(12 * 60, '22:00', '06:00')).toBe(false);
  });
});

describe('shouldRunAt', () => {
  it('runs on a plain interval', () => {
    expect(shouldRunAt(kst('10:00'), seoul, null)).toBe(true);
    expect(shouldRunAt(kst('10:00'), seoul, kst('09:30'))).toBe(false);
    expect(shouldRunAt(kst('10:00'), seoul, kst('09:00', 30))).toBe(true);
  });

  it('runs once at each listed time', () => {
    const schedule = { ...seoul, times: ['09:30', '18:00'] };
    expect(shouldRunAt(kst('09:30'), schedule, null)).toBe(true);
    expect(shouldRunAt(kst('09:30', 40), schedule, kst('09:30'))).toBe(false);
    expect(shouldRunAt(kst('09:31'), schedule, kst('09:30'))).toBe(false);
    expect(shouldRunAt(kst('18:00'), schedule, kst('09:30'))).toBe(true);
  });

  it('runs inside a window at the configured interval', () => {
    const schedule = { ...seoul, startTime: '09:00', endTime: '18:00', intervalMinutes: 30 };
    expect(shouldRunAt(kst('08:59'), schedule, null)).toBe(false);
    expect(shouldRunAt(kst('09:00'), schedule, null)).toBe(true);
    expect(shouldRunAt(kst('09:20'), schedule, kst('09:00'))).toBe(false);
    expect(shouldRunAt(kst('09:30'), schedule, kst('09:00'))).toBe(true);
    expect(shouldRunAt(kst('18:30'), schedule, kst('17:30'))).toBe(false);
  });

  it('supports windows that wrap past midnight', () => {
    const schedule = { ...seoul, startTime: '22:00', endTime: '06:00' };
    expect(shouldRunAt(kst('23:00'), schedule, null)).toBe(true);
    expect(shouldRunAt(kst('12:00'), schedule, null)).toBe(false);
  });

  it('leaves timing to a cron expression', () => {
    expect(shouldRunAt(kst('03:17'), { ...seoul, cronExpression: '17 3 * * *' }, kst('03:16'))).toBe(true);
  });
});

describe('describeSchedule', () => {
  it('names the active mode', () => {
    expect(describeSchedule({ ...seoul, cronExpression: '0 9 * * 1-5' })).toBe('cron: 0 9 * * 1-5 (Asia/Seoul)');
    expect(describeSchedule({ ...seoul, times: ['09:00', '13:00'] })).toBe('at 09:00, 13:00 (Asia/Seoul)');
    expect(describeSchedule({ ...seoul, startTime: '09:00', endTime: '18:00' })).toBe('09:00-18:00 every 60 min (Asia/Seoul)');
    expect(describeSchedule(seoul)).toBe('every 60 min');
  });
});

function job(title: string, link: string, source = 'alpha'): JobRecord {
  return { title, company: '가나다 테크', link, source };
}

describe('dedupeByLink', () => {
  it('keeps the first record for each link', () => {
    const records = [job('A', 'https://a.example.com/1'), job('B', 'https://a.example.com/1'), job('C', 'https://a.example.com/2')];
    expect(dedupeByLink(records).map(r => r.title)).toEqual(['A', 'C']);
  });
});

class FakeParser extends BaseParser {
  constructor(site: SiteConfig, private readonly results: Record<string, JobRecord[] | Error>) {
    super(site);
  }

  async search(keyword: string): Promise<JobRecord[]> {
    const found = this.results[keyword] ?? [];
    if (found instanceof Error) throw found;
    return found;
  }
}

describe('runSearchCycle', () => {
  const site = (name: string, enabled = true) => ({
    name,
    enabled,
    urlTemplate: `https://${name}.example.com/search?q={keyword}`,
    jobList: 'li',
    extraction: { strategy: 'simple', title: 'a' },
  });

  const config = parseConfig({
    jobKeywords: ['백엔드 개발자', '데이터 엔지니어'],
    excludeKeywords: ['인턴'],
    sites: [site('alpha'), site('beta'), site('gamma', false), { name: 'broken', urlTemplate: 'https://x.example.com' }],
  });

  const responses: Record<string, Record<string, JobRecord[] | Error>> = {
    alpha: {
      '백엔드 개발자': [job('백엔드 개발자 채용', 'https://alpha.example.com/1'), job('Python 백엔드 인턴', 'https://alpha.example.com/2')],
      '데이터 엔지니어': [job('백엔드 개발자 채용', 'https://alpha.example.com/1'), job('데이터 분석가', 'https://alpha.example.com/3')],
    },
    beta: {
      '백엔드 개발자': new Error('timeout'),
      '데이터 엔지니어': new Error('timeout'),
    },
  };

  function deps(notifier: Notifier) {
    const seen = new Set<string>();
    return {
      notifiers: [notifier],
      getParser: (s: SiteConfig) => (s.enabled ? new FakeParser(s, responses[s.name] ?? {}) : null),
      takeUnseen: (results: readonly MatchResult[]) => results.filter(r => {
        if (seen.has(r.record.link)) return false;
        seen.add(r.record.link);
        return true;
      }),
      keywordDelayMs: 0,
    };
  }

  it('collects, matches and notifies new postings once', async () => {
    const notify = vi.fn(async (_results: readonly MatchResult[]) => {});
    const cycleDeps = deps({ name: 'memory', notify });

    const report = await runSearchCycle(config, cycleDeps);

    expect(report.sites).toEqual([
      { site: 'alpha', fetched: 4, error: null },
      { site: 'beta', fetched: 0, error: '백엔드 개발자: timeout; 데이터 엔지니어: timeout' },
    ]);
    expect(report.invalidSites).toEqual(['broken']);
    expect(report.totalFetched).toBe(4);
    expect(report.unique).toBe(3);
    expect(report.matched).toBe(2);
    expect(report.newJobs.map(r => r.record.title)).toEqual(['백엔드 개발자 채용', '데이터 분석가']);
    expect(report.delivered).toEqual(['memory']);
    expect(notify).toHaveBeenCalledTimes(1);

    const again = await runSearchCycle(config, cycleDeps);
    expect(again.matched).toBe(2);
    expect(again.newJobs).toEqual([]);
    expect(again.delivered).toEqual([]);
    expect(notify).toHaveBeenCalledTimes(1);
  });
});

describe('formatReport', () => {
  it('summarizes sites and totals', () => {
    const report: SearchReport = {
      sites: [
        { site: 'alpha', fetched: 4, error: null },
        { site: 'beta', fetched: 0, error: 'x: timeout' },
      ],
      invalidSites: ['broken'],
      totalFetched: 4,
      unique: 3,
      matched: 2,
      newJobs: [],
      delivered: ['terminal'],
      failedChannels: [],
      durationMs: 1500,
    };

    expect(formatReport(report).split('\n')).toEqual([
      '📋 *Search Report*',
      '',
      '✅ *alpha*',
      '   Fetched: 4',
      '❌ *beta*',
      '   Fetched: 0',
      '   Error: x: timeout',
      '⚠️ *broken* skipped: invalid configuration',
      '',
      '📊 *Total:*',
      '   Fetched: 4',
      '   Unique: 3',
      '   Matched: 2',
      '   New: 0',
      '',
      '📬 Sent via: terminal',
      '',
      '⏱ Duration: 1\\.5s',
    ]);
  });

  it('escapes site names and error messages', () => {
    const report: SearchReport = {
      sites: [{ site: 'job_board', fetched: 0, error: 'backend_dev: connect ECONNREFUSED 10.0.0.1:443' }],
      invalidSites: ['*draft*'],
      totalFetched: 0,
      unique: 0,
      matched: 0,
      newJobs: [],
      delivered: [],
      failedChannels: ['telegram'],
      durationMs: 2000,
    };

    const lines = formatReport(report).split('\n');
    expect(lines.slice(2, 6)).toEqual([
      '❌ *job\\_board*',
      '   Fetched: 0',
      '   Error: backend\\_dev: connect ECONNREFUSED 10\\.0\\.0\\.1:443',
      '⚠️ *\\*draft\\** skipped: invalid configuration',
    ]);
    expect(lines.slice(-4)).toEqual(['', '⚠️ Failed: telegram', '', '⏱ Duration: 2\\.0s']);
  });
});

describe('runExclusive', () => {
  const empty: SearchReport = {
    sites: [], invalidSites: [], totalFetched: 0, unique: 0, matched: 0,
    newJobs: [], delivered: [], failedChannels: [], durationMs: 0,
  };

  it('skips a cycle while another is running', async () => {
    let finish: (report: SearchReport) => void = () => {};
    const first = runExclusive(() => new Promise<SearchReport>(resolve => { finish = resolve; }));

    await expect(runExclusive(async () => empty)).resolves.toBeNull();

    finish(empty);
    await expect(first).resolves.toBe(empty);
    await expect(runExclusive(async () => empty)).resolves.toBe(empty);
  });

  it('logs and swallows a failing cycle', async () => {
    await expect(runExclusive(async () => { throw new Error('boom'); })).resolves.toBeNull();
  });
});
