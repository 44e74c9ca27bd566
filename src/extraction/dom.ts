import type { Cheerio } from 'cheerio';
import { isTag, isText, type AnyNode, type Element } from 'domhandler';
import type { SiteExtractionConfig } from './types';

const HIDDEN_TAGS = new Set(['script', 'style', 'noscript', 'template']);

function collectText(node: AnyNode, parts: string[]): void {
  if (isText(node)) {
    parts.push(node.data);
    return;
  }
  if (isTag(node) && !HIDDEN_TAGS.has(node.name)) {
    for (const child of node.children) collectText(child, parts);
  }
}

/** Text a reader would see, whitespace runs collapsed to a single space. */
export function visibleText(node: Cheerio<Element>): string {
  const parts: string[] = [];
  for (const el of node.toArray()) collectText(el, parts);
  return parts.join('').replace(/\s+/g, ' ').trim();
}

/**
 * Descendants of `node` matching `selector`, or undefined when the selector
 * is empty or cannot be parsed.
 */
export function safeFind(node: Cheerio<Element>, selector: string | undefined): Cheerio<Element> | undefined {
  if (!selector || !selector.trim()) return undefined;
  try {
    return node.find(selector);
  } catch {
    return undefined;
  }
}

/** Splits a selection into single-node selections, in document order. */
export function nodesOf(selection: Cheerio<Element>): Cheerio<Element>[] {
  const nodes: Cheerio<Element>[] = [];
  for (let i = 0; i < selection.length; i++) {
    nodes.push(selection.eq(i));
  }
  return nodes;
}

function originOf(template: string | undefined): string | undefined {
  if (!template) return undefined;
  try {
    return new URL(template).origin;
  } catch {
    return undefined;
  }
}

export function resolveLink(href: string, site: Pick<SiteExtractionConfig, 'baseUrl' | 'urlTemplate'>): string {
  const link = href.trim();
  if (!link || /^https?:\/\//i.test(link)) return link;
  if (link.startsWith('//')) return `https:${link}`;

  const base = site.baseUrl || originOf(site.urlTemplate);
  if (!base) return link;
  return `${base.replace(/\/+$/, '')}/${link.replace(/^\/+/, '')}`;
}
