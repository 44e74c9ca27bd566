import * as cheerio from 'cheerio';
import { BaseParser } from './base-parser';
import { countContainers, extractRecords } from '../extraction/extractor';
import type { JobRecord } from '../extraction/types';
import { createLogger } from '../logger';

const log = createLogger('HttpParser');

const KEYWORD_PLACEHOLDER = '{keyword}';
const DEFAULT_DELAY_MS = 1000;

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function buildSearchUrl(template: string, keyword: string): string {
  return template.split(KEYWORD_PLACEHOLDER).join(encodeURIComponent(keyword));
}

export function withPageParam(url: string, param: string, page: number): string {
  const separator = url.includes('?') ? '&' : '?';
  return `${url}${separator}${param}=${page}`;
}

/**
 * Fetches server-rendered listing pages and runs the site's extraction
 * rules over them. A failure on the first page propagates; a failure on a
 * later page ends pagination with what was collected so far.
 */
export class HttpSiteParser extends BaseParser {
  async search(keyword: string): Promise<JobRecord[]> {
    const url = buildSearchUrl(this.site.urlTemplate, keyword);
    const { pagination } = this.site;
    const maxPages = pagination ? pagination.maxPages : 1;
    const delayMs = this.site.pageDelayMs ?? DEFAULT_DELAY_MS;
    const records: JobRecord[] = [];

    for (let page = 1; page <= maxPages; page++) {
      const target = pagination ? withPageParam(url, pagination.param, page) : url;

      let html: string;
      try {
        log.debug(`[${this.source}] Fetching page ${page}/${maxPages}: ${target}`);
        html = await this.fetchPage(target);
      } catch (err) {
        if (page === 1) throw err;
        log.error(`[${this.source}] Failed to fetch page ${page}`, err);
        break;
      }

      const $ = cheerio.load(html);
      if (countContainers($, this.site) === 0) {
        log.info(`[${this.source}] Page ${page}: no listings, stopping`);
        break;
      }

      const found = extractRecords($, this.site);
      records.push(...found);
      log.info(`[${this.source}] Page ${page}: ${found.length} jobs for "${keyword}"`);

      if (page < maxPages) await sleep(delayMs);
    }

    return records;
  }
}
