import type { MatchResult } from '../matching/matcher';

export const RULE = '='.repeat(80);

export interface Notifier {
  readonly name: string;
  notify(results: readonly MatchResult[]): Promise<void>;
}

export function formatPercent(score: number): string {
  return `${(score * 100).toFixed(2)}%`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Lines describing one result, numbered from 1. A detail longer than
 * `detailLimit` characters is cut and marked with an ellipsis.
 */
export function formatJobBlock(result: MatchResult, index: number, detailLimit?: number): string[] {
  const { record } = result;
  const lines = [
    `[${index}] ${record.title}`,
    `    Company: ${record.company}`,
    `    Link: ${record.link}`,
    `    Source: ${record.source}`,
    `    Similarity: ${formatPercent(result.score)}`,
    `    Matched Keyword: ${result.bestKeyword ?? 'N/A'}`,
  ];

  if (record.detail) {
    const chars = Array.from(record.detail);
    const detail = detailLimit !== undefined && chars.length > detailLimit
      ? `${chars.slice(0, detailLimit).join('')}...`
      : record.detail;
    lines.push(`    Detail: ${detail}`);
  }
  return lines;
}

export function escapeMarkdown(text: string): string {
  return text.replace(/([_*[\]()~`>#+\-=|{}.!\\])/g, '\\$1');
}
