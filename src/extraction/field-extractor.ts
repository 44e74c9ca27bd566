import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { nodesOf, safeFind, visibleText } from './dom';
import type { FieldRule } from './types';

function classContains(node: Cheerio<Element>, pattern: string): boolean {
  return (node.attr('class') ?? '').includes(pattern);
}

/**
 * Source node for a field: the candidate at `linkIndex`, narrowed to a
 * descendant when `descendantSelector` is set. With `classPattern`, the first
 * descendant whose class contains the pattern wins; otherwise only a unique
 * descendant match is accepted.
 */
export function resolveFieldNode(candidates: readonly Cheerio<Element>[], rule: FieldRule): Cheerio<Element> | undefined {
  const { linkIndex } = rule;
  if (!Number.isInteger(linkIndex) || linkIndex < 0 || linkIndex >= candidates.length) return undefined;

  const candidate = candidates[linkIndex];
  if (!rule.descendantSelector) return candidate;

  const found = safeFind(candidate, rule.descendantSelector);
  if (!found || found.length === 0) return undefined;

  const matches = nodesOf(found);
  if (!rule.classPattern) return matches[0];

  const { classPattern } = rule;
  const patterned = matches.find(node => classContains(node, classPattern));
  if (patterned) return patterned;
  return matches.length === 1 ? matches[0] : undefined;
}

function truncate(text: string, maxLength: number | undefined): string {
  if (maxLength === undefined || maxLength < 0) return text;
  const chars = Array.from(text);
  return chars.length > maxLength ? chars.slice(0, maxLength).join('').trimEnd() : text;
}

export function extractField(candidates: readonly Cheerio<Element>[], rule: FieldRule): string | undefined {
  const node = resolveFieldNode(candidates, rule);
  if (!node) return undefined;

  const text = visibleText(node);
  if (!text) return undefined;
  return truncate(text, rule.maxLength);
}
