import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { createLogger } from '../logger';
import { nodesOf, resolveLink, safeFind, visibleText } from './dom';
import { extractField } from './field-extractor';
import { filterLinks, toLinkFilterRule } from './link-filter';
import type { FieldRule, JobRecord, SimpleExtraction, SiteExtractionConfig, StructuredExtraction } from './types';

const log = createLogger('Extractor');

const DEFAULT_TITLE_RULE: FieldRule = { linkIndex: 0 };
const DEFAULT_COMPANY_RULE: FieldRule = { linkIndex: 1, maxLength: 50 };
const UNKNOWN_COMPANY = 'Unknown';

interface RawFields {
  title?: string;
  company?: string;
  href?: string;
  detail?: string;
}

function firstMatch(container: cheerio.Cheerio<Element>, selector: string | undefined): cheerio.Cheerio<Element> | undefined {
  const found = safeFind(container, selector);
  return found && found.length > 0 ? found.first() : undefined;
}

function textAt(container: cheerio.Cheerio<Element>, selector: string | undefined): string | undefined {
  const node = firstMatch(container, selector);
  return node ? visibleText(node) || undefined : undefined;
}

function extractSimple(container: cheerio.Cheerio<Element>, extraction: SimpleExtraction): RawFields {
  return {
    title: textAt(container, extraction.title),
    company: textAt(container, extraction.company),
    href: firstMatch(container, extraction.link || extraction.title)?.attr('href'),
    detail: textAt(container, extraction.detail),
  };
}

function extractStructured(container: cheerio.Cheerio<Element>, extraction: StructuredExtraction): RawFields {
  // Every field indexes into the same candidate list, so positions agree across fields.
  const candidates = filterLinks(container, toLinkFilterRule(extraction.linkFilter, extraction.linkFilterCondition));
  const titleRule = extraction.title ?? DEFAULT_TITLE_RULE;
  const linkIndex = extraction.link?.linkIndex ?? titleRule.linkIndex;
  const linkNode = linkIndex >= 0 && linkIndex < candidates.length ? candidates[linkIndex] : undefined;

  let detail: string | undefined;
  if (typeof extraction.detail === 'string') {
    detail = textAt(container, extraction.detail);
  } else if (extraction.detail) {
    detail = extractField(candidates, extraction.detail);
  }

  return {
    title: extractField(candidates, titleRule),
    company: extractField(candidates, extraction.company ?? DEFAULT_COMPANY_RULE),
    href: linkNode?.attr(extraction.link?.attribute ?? 'href'),
    detail,
  };
}

/** One listing container to a record; undefined when title or link is missing. */
export function extractRecord(container: cheerio.Cheerio<Element>, site: SiteExtractionConfig): JobRecord | undefined {
  const fields = site.extraction.strategy === 'structured'
    ? extractStructured(container, site.extraction)
    : extractSimple(container, site.extraction);

  const link = fields.href ? resolveLink(fields.href, site) : '';
  if (!fields.title || !link) return undefined;

  const record: JobRecord = {
    title: fields.title,
    company: fields.company || UNKNOWN_COMPANY,
    link,
    source: site.name,
  };
  if (fields.detail) record.detail = fields.detail;
  return record;
}

export function countContainers(document: string | cheerio.CheerioAPI, site: SiteExtractionConfig): number {
  const $ = typeof document === 'string' ? cheerio.load(document) : document;
  try {
    return $.root().find(site.jobList).length;
  } catch {
    return 0;
  }
}

export function extractRecords(document: string | cheerio.CheerioAPI, site: SiteExtractionConfig): JobRecord[] {
  const $ = typeof document === 'string' ? cheerio.load(document) : document;

  let containers: cheerio.Cheerio<Element>;
  try {
    containers = $.root().find(site.jobList);
  } catch (err) {
    log.warn(`[${site.name}] jobList selector "${site.jobList}" could not be parsed`, err);
    return [];
  }

  const records: JobRecord[] = [];
  let dropped = 0;
  for (const container of nodesOf(containers)) {
    try {
      const record = extractRecord(container, site);
      if (record) {
        records.push(record);
      } else {
        dropped++;
      }
    } catch (err) {
      dropped++;
      log.debug(`[${site.name}] listing skipped`, err);
    }
  }

  if (dropped > 0) {
    log.debug(`[${site.name}] ${dropped} of ${containers.length} listings had no title or link`);
  }
  return records;
}
