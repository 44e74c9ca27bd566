import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { safeFind, visibleText } from './dom';
import { CONDITION_NAMES, type AttributeMatch, type ConditionName, type ConditionValue, type FilterConditions } from './types';

export type ConditionEvaluator = (node: Cheerio<Element>, value: ConditionValue) => boolean;

function asAttributeMatch(value: ConditionValue): AttributeMatch {
  return typeof value === 'string' ? { name: value } : value;
}

function hasAttribute(node: Cheerio<Element>, value: ConditionValue): boolean {
  const { name, value: expected } = asAttributeMatch(value);
  if (!name) return false;
  const actual = node.attr(name);
  if (actual === undefined) return false;
  return expected === undefined || actual === expected;
}

function hasChild(node: Cheerio<Element>, value: ConditionValue): boolean | undefined {
  if (typeof value !== 'string') return undefined;
  const found = safeFind(node, value);
  return found ? found.length > 0 : undefined;
}

function containsText(node: Cheerio<Element>, value: ConditionValue): boolean | undefined {
  if (typeof value !== 'string' || !value) return undefined;
  return visibleText(node).includes(value);
}

// A malformed value (undefined above) fails the condition in both polarities.
export const CONDITION_EVALUATORS: Record<ConditionName, ConditionEvaluator> = {
  has_child: (node, value) => hasChild(node, value) === true,
  not_has_child: (node, value) => hasChild(node, value) === false,
  has_attribute: hasAttribute,
  not_has_attribute: (node, value) => Boolean(asAttributeMatch(value).name) && !hasAttribute(node, value),
  has_text: (node, value) => containsText(node, value) === true,
  not_has_text: (node, value) => containsText(node, value) === false,
};

export function evaluateCondition(node: Cheerio<Element>, name: ConditionName, value: ConditionValue): boolean {
  return CONDITION_EVALUATORS[name](node, value);
}

/** Logical AND over every condition present; no conditions means unconstrained. */
export function matchesConditions(node: Cheerio<Element>, conditions: FilterConditions | undefined): boolean {
  if (!conditions) return true;
  for (const name of CONDITION_NAMES) {
    const value = conditions[name];
    if (value === undefined) continue;
    if (!evaluateCondition(node, name, value)) return false;
  }
  return true;
}
