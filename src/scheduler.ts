import cron from 'node-cron';
import type { AppConfig, ScheduleConfig, SiteConfig } from './config';
import { takeUnseen as takeUnseenFromLedger } from './db/database';
import type { JobRecord } from './extraction/types';
import { createLogger } from './logger';
import { matchRecords, type MatchResult } from './matching/matcher';
import { notifyAll, type Notifier } from './notifier';
import { escapeMarkdown } from './notifier/format';
import { getParser as defaultGetParser, type BaseParser } from './parsers';

const log = createLogger('Scheduler');

const DEFAULT_KEYWORD_DELAY_MS = 1000;
const EVERY_MINUTE = '* * * * *';

let task: ReturnType<typeof cron.schedule> | null = null;
let lastRun: Date | null = null;
let running = false;

export interface SiteReport {
  site: string;
  fetched: number;
  error: string | null;
}

export interface SearchReport {
  sites: SiteReport[];
  invalidSites: string[];
  totalFetched: number;
  unique: number;
  matched: number;
  newJobs: MatchResult[];
  delivered: string[];
  failedChannels: string[];
  durationMs: number;
}

export interface CycleDeps {
  notifiers: readonly Notifier[];
  getParser?: (site: SiteConfig) => BaseParser | null;
  takeUnseen?: (results: readonly MatchResult[]) => MatchResult[];
  keywordDelayMs?: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

async function collectFromSite(
  site: SiteConfig,
  keywords: readonly string[],
  getParser: (site: SiteConfig) => BaseParser | null,
  delayMs: number,
): Promise<{ records: JobRecord[]; report: SiteReport }> {
  const report: SiteReport = { site: site.name, fetched: 0, error: null };
  const records: JobRecord[] = [];

  const parser = getParser(site);
  if (!parser) {
    report.error = 'No parser available';
    log.warn(`No parser found for site: ${site.name}`);
    return { records, report };
  }

  const errors: string[] = [];
  for (let i = 0; i < keywords.length; i++) {
    const keyword = keywords[i];
    try {
      const found = await parser.search(keyword);
      records.push(...found);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      errors.push(`${keyword}: ${msg}`);
      log.error(`Error fetching from ${site.name} with keyword "${keyword}"`, err);
    }
    if (i < keywords.length - 1) await sleep(delayMs);
  }

  report.fetched = records.length;
  if (errors.length > 0) report.error = errors.join('; ');
  log.info(`[${site.name}] fetched: ${report.fetched}${report.error ? ' (with errors)' : ''}`);
  return { records, report };
}

/** First occurrence of each link wins. */
export function dedupeByLink(records: readonly JobRecord[]): JobRecord[] {
  const seen = new Set<string>();
  return records.filter(record => {
    if (!record.link || seen.has(record.link)) return false;
    seen.add(record.link);
    return true;
  });
}

export async function runSearchCycle(config: AppConfig, deps: CycleDeps): Promise<SearchReport> {
  const startTime = Date.now();
  const getParser = deps.getParser ?? defaultGetParser;
  const takeUnseen = deps.takeUnseen ?? takeUnseenFromLedger;
  const delayMs = deps.keywordDelayMs ?? DEFAULT_KEYWORD_DELAY_MS;
  log.info('=== Search cycle started ===');

  // Sites are independent; keywords within one site run in order.
  const enabledSites = config.sites.filter(s => s.enabled);
  const collected = await Promise.all(
    enabledSites.map(site => collectFromSite(site, config.jobKeywords, getParser, delayMs))
  );

  const all = collected.flatMap(c => c.records);
  const unique = dedupeByLink(all);
  const matched = matchRecords(
    unique,
    { include: config.jobKeywords, exclude: config.excludeKeywords },
    { threshold: config.similarityThreshold },
  );
  const newJobs = takeUnseen(matched);

  if (newJobs.length > 0) {
    log.info(`Found ${newJobs.length} new matching jobs!`);
  } else {
    log.info('No new matching jobs found.');
  }
  const outcome = await notifyAll(deps.notifiers, newJobs);

  const report: SearchReport = {
    sites: collected.map(c => c.report),
    invalidSites: config.invalidSites.map(s => s.name),
    totalFetched: all.length,
    unique: unique.length,
    matched: matched.length,
    newJobs,
    delivered: outcome.delivered,
    failedChannels: outcome.failed,
    durationMs: Date.now() - startTime,
  };

  log.info(`=== Search cycle complete in ${(report.durationMs / 1000).toFixed(1)}s ===`);
  return report;
}

/** Telegram MarkdownV2; every interpolated value is escaped. */
export function formatReport(report: SearchReport): string {
  const lines: string[] = ['📋 *Search Report*\n'];

  for (const site of report.sites) {
    const status = site.error ? '❌' : '✅';
    lines.push(`${status} *${escapeMarkdown(site.site)}*`);
    lines.push(`   Fetched: ${site.fetched}`);
    if (site.error) {
      lines.push(`   Error: ${escapeMarkdown(site.error)}`);
    }
  }

  for (const name of report.invalidSites) {
    lines.push(`⚠️ *${escapeMarkdown(name)}* skipped: invalid configuration`);
  }

  lines.push('');
  lines.push(`📊 *Total:*`);
  lines.push(`   Fetched: ${report.totalFetched}`);
  lines.push(`   Unique: ${report.unique}`);
  lines.push(`   Matched: ${report.matched}`);
  lines.push(`   New: ${report.newJobs.length}`);

  if (report.delivered.length > 0 || report.failedChannels.length > 0) {
    lines.push('');
    if (report.delivered.length > 0) {
      lines.push(`📬 Sent via: ${escapeMarkdown(report.delivered.join(', '))}`);
    }
    if (report.failedChannels.length > 0) {
      lines.push(`⚠️ Failed: ${escapeMarkdown(report.failedChannels.join(', '))}`);
    }
  }

  lines.push('');
  lines.push(`⏱ Duration: ${escapeMarkdown((report.durationMs / 1000).toFixed(1))}s`);

  return lines.join('\n');
}

function parseClock(value: string): number {
  const [hour, minute] = value.split(':').map(Number);
  return hour * 60 + minute;
}

/** Minutes since midnight of `now` in `timeZone`. */
export function minutesOfDay(now: Date, timeZone: string): number {
  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(now);
  const hour = Number(parts.find(p => p.type === 'hour')?.value ?? 0);
  const minute = Number(parts.find(p => p.type === 'minute')?.value ?? 0);
  return hour * 60 + minute;
}

/** Inclusive at both ends; a window whose end is before its start wraps past midnight. */
export function isWithinWindow(minute: number, start: string, end: string): boolean {
  const from = parseClock(start);
  const to = parseClock(end);
  return from <= to ? minute >= from && minute <= to : minute >= from || minute <= to;
}

function elapsedMinutes(now: Date, since: Date): number {
  return Math.floor(now.getTime() / 60000) - Math.floor(since.getTime() / 60000);
}

/**
 * Whether a cycle is due at `now`. A cron expression decides on its own, so
 * every tick it produces is due. Otherwise the first matching mode applies:
 * listed times, a daily window with an interval, or the plain interval.
 */
export function shouldRunAt(now: Date, schedule: ScheduleConfig, previous: Date | null): boolean {
  if (schedule.cronExpression) return true;

  const minute = minutesOfDay(now, schedule.timezone);
  if (schedule.times && schedule.times.length > 0) {
    const listed = schedule.times.some(t => parseClock(t) === minute);
    return listed && (previous === null || elapsedMinutes(now, previous) >= 1);
  }

  if (schedule.startTime && schedule.endTime) {
    if (!isWithinWindow(minute, schedule.startTime, schedule.endTime)) return false;
  }

  return previous === null || elapsedMinutes(now, previous) >= schedule.intervalMinutes;
}

export function describeSchedule(schedule: ScheduleConfig): string {
  if (schedule.cronExpression) return `cron: ${schedule.cronExpression} (${schedule.timezone})`;
  if (schedule.times && schedule.times.length > 0) return `at ${schedule.times.join(', ')} (${schedule.timezone})`;
  if (schedule.startTime && schedule.endTime) {
    return `${schedule.startTime}-${schedule.endTime} every ${schedule.intervalMinutes} min (${schedule.timezone})`;
  }
  return `every ${schedule.intervalMinutes} min`;
}

/**
 * Runs `cycle` unless another one is still in progress, in which case it
 * resolves to null. Errors are logged, never thrown.
 */
export async function runExclusive(cycle: () => Promise<SearchReport>): Promise<SearchReport | null> {
  if (running) {
    log.warn('Previous search cycle still running, skipping');
    return null;
  }

  running = true;
  lastRun = new Date();
  try {
    return await cycle();
  } catch (err) {
    log.error('Search cycle failed', err);
    return null;
  } finally {
    running = false;
  }
}

export function startScheduler(schedule: ScheduleConfig, cycle: () => Promise<SearchReport>): boolean {
  const expression = schedule.cronExpression ?? EVERY_MINUTE;

  if (!cron.validate(expression)) {
    log.error(`Invalid cron expression: ${expression}`);
    return false;
  }

  task = cron.schedule(expression, async () => {
    if (!shouldRunAt(new Date(), schedule, lastRun)) return;
    await runExclusive(cycle);
  }, { timezone: schedule.timezone });

  log.info(`Scheduler started: ${describeSchedule(schedule)}`);
  return true;
}

export function stopScheduler(): void {
  if (task) {
    task.stop();
    task = null;
    log.info('Scheduler stopped');
  }
}
