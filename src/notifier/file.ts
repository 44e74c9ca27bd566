import * as fs from 'fs';
import * as path from 'path';
import type { NotificationsConfig } from '../config';
import type { MatchResult } from '../matching/matcher';
import { createLogger } from '../logger';
import { formatJobBlock, formatTimestamp, RULE, type Notifier } from './format';

const log = createLogger('FileNotifier');

export type FileOptions = NotificationsConfig['file'];

interface SavedJob {
  title: string;
  company: string;
  link: string;
  source: string;
  detail: string | null;
  similarity: number;
  matchedKeyword: string | null;
  matchedKeywords: string[];
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function outputFileName(date: Date, format: FileOptions['format']): string {
  const stamp = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `job_postings_${stamp}.${format}`;
}

function toSavedJob({ record, score, bestKeyword, matchedKeywords }: MatchResult): SavedJob {
  return {
    title: record.title,
    company: record.company,
    link: record.link,
    source: record.source,
    detail: record.detail ?? null,
    similarity: score,
    matchedKeyword: bestKeyword ?? null,
    matchedKeywords,
  };
}

export function renderJson(results: readonly MatchResult[], date: Date): string {
  const payload = {
    timestamp: date.toISOString(),
    count: results.length,
    jobs: results.map(toSavedJob),
  };
  return JSON.stringify(payload, null, 2);
}

export function renderText(results: readonly MatchResult[], date: Date): string {
  const lines = [
    RULE,
    `New job postings found! (${results.length} items)`,
    `Generated at: ${formatTimestamp(date)}`,
    RULE,
    '',
  ];
  results.forEach((result, i) => {
    lines.push(...formatJobBlock(result, i + 1), '');
  });
  lines.push(RULE, '');
  return lines.join('\n');
}

export class FileNotifier implements Notifier {
  readonly name = 'file';
  private lastFile: string | null = null;

  constructor(
    private readonly options: FileOptions,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** Path of the most recently written file. */
  get lastWritten(): string | null {
    return this.lastFile;
  }

  async notify(results: readonly MatchResult[]): Promise<void> {
    if (results.length === 0) return;

    const date = this.now();
    const { outputDir, format } = this.options;
    fs.mkdirSync(outputDir, { recursive: true });

    const filename = path.join(outputDir, outputFileName(date, format));
    const content = format === 'json' ? renderJson(results, date) : renderText(results, date);
    await fs.promises.writeFile(filename, content, 'utf-8');

    this.lastFile = filename;
    log.info(`Job postings saved to ${filename}`);
  }
}
