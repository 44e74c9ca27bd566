import type { JobRecord } from '../extraction/types';
import { createLogger } from '../logger';
import { compact, keywordSimilarity } from './similarity';

const log = createLogger('Matcher');

export const TITLE_WEIGHT = 1.5;
export const DEFAULT_THRESHOLD = 0.3;

export interface KeywordSet {
  include: readonly string[];
  exclude: readonly string[];
}

export interface MatchOptions {
  threshold: number;
}

export interface MatchResult {
  record: JobRecord;
  score: number;
  matched: boolean;
  rejected: boolean;
  /** Include keywords whose own score cleared the threshold, in keyword order. */
  matchedKeywords: string[];
  bestKeyword?: string;
}

export function findExcludedTerm(record: JobRecord, exclude: readonly string[]): string | undefined {
  const title = compact(record.title);
  const detail = compact(record.detail ?? '');
  return exclude.find(term => {
    const packed = compact(term);
    return packed.length > 0 && (title.includes(packed) || detail.includes(packed));
  });
}

/** A title hit outweighs the same hit in the detail text; the result is capped at 1. */
export function keywordScore(record: JobRecord, keyword: string): number {
  const title = keywordSimilarity(record.title, keyword);
  const detail = record.detail ? keywordSimilarity(record.detail, keyword) : 0;
  return Math.min(1, Math.max(title * TITLE_WEIGHT, detail));
}

export function scoreRecord(record: JobRecord, keywords: KeywordSet, { threshold }: MatchOptions): MatchResult {
  if (findExcludedTerm(record, keywords.exclude) !== undefined) {
    return { record, score: 0, matched: false, rejected: true, matchedKeywords: [] };
  }

  let score = 0;
  let bestKeyword: string | undefined;
  const matchedKeywords: string[] = [];

  for (const keyword of keywords.include) {
    if (!keyword.trim()) continue;
    const value = keywordScore(record, keyword);
    if (value > 0 && value >= threshold) matchedKeywords.push(keyword);
    if (value > score) {
      score = value;
      bestKeyword = keyword;
    }
  }

  const result: MatchResult = { record, score, matched: score >= threshold && score > 0, rejected: false, matchedKeywords };
  if (bestKeyword !== undefined) result.bestKeyword = bestKeyword;
  return result;
}

/** Matched results only, best score first; equal scores keep their input order. */
export function matchRecords(records: readonly JobRecord[], keywords: KeywordSet, options: MatchOptions): MatchResult[] {
  const results = records.map(record => scoreRecord(record, keywords, options));
  const matched = results.filter(result => result.matched);
  const rejected = results.filter(result => result.rejected).length;

  matched.sort((a, b) => b.score - a.score);
  log.info(`Matched ${matched.length} out of ${records.length} jobs (${rejected} excluded)`);
  return matched;
}
