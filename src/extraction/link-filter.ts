import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { createLogger } from '../logger';
import { nodesOf, safeFind } from './dom';
import { matchesConditions } from './predicates';
import type { FilterConditions, LinkFilterRule } from './types';

const log = createLogger('LinkFilter');

const DEFAULT_LINK_SELECTOR = 'a';

const warnedPresets = new Set<string>();

/** Condition presets accepted under the deprecated `linkFilterCondition` key. */
export const LEGACY_CONDITION_PRESETS: Record<string, FilterConditions> = {
  has_typography: { has_child: 'span[data-sentry-element="Typography"]' },
  not_logo: { not_has_attribute: { name: 'data-sentry-component', value: 'CompanyLogo' } },
};

/**
 * Normalizes the two accepted forms of a link filter into a rule. A bare
 * selector may carry a legacy preset name; rules ignore it.
 */
export function toLinkFilterRule(filter: string | LinkFilterRule, legacyCondition?: string): LinkFilterRule {
  if (typeof filter !== 'string') return filter;

  if (!legacyCondition) return { selector: filter };

  const conditions = LEGACY_CONDITION_PRESETS[legacyCondition];
  if (!warnedPresets.has(legacyCondition)) {
    warnedPresets.add(legacyCondition);
    if (conditions) {
      log.warn(`"linkFilterCondition" is deprecated; use linkFilter.conditions instead (preset "${legacyCondition}")`);
    } else {
      log.warn(`Unknown linkFilterCondition "${legacyCondition}" ignored`);
    }
  }
  return conditions ? { selector: filter, conditions } : { selector: filter };
}

/**
 * Candidate nodes inside `container`: the base selector narrows the search,
 * then every condition must hold. Document order is preserved; an
 * unparseable base selector yields no candidates.
 */
export function filterLinks(container: Cheerio<Element>, filter: string | LinkFilterRule): Cheerio<Element>[] {
  const rule = typeof filter === 'string' ? { selector: filter } : filter;
  const base = safeFind(container, rule.selector || DEFAULT_LINK_SELECTOR);
  if (!base) return [];

  return nodesOf(base).filter(node => matchesConditions(node, rule.conditions));
}
