export const CONDITION_NAMES = [
  'has_child',
  'not_has_child',
  'has_attribute',
  'not_has_attribute',
  'has_text',
  'not_has_text',
] as const;

export type ConditionName = (typeof CONDITION_NAMES)[number];

/** `{ name }` checks presence only; `{ name, value }` also requires an exact value. */
export interface AttributeMatch {
  name: string;
  value?: string;
}

export type ConditionValue = string | AttributeMatch;

export type FilterConditions = Partial<Record<ConditionName, ConditionValue>>;

export interface LinkFilterRule {
  /** Base selector applied inside the container. Defaults to `a`. */
  selector?: string;
  conditions?: FilterConditions;
}

export interface FieldRule {
  /** 0-based position in the filtered candidate list. */
  linkIndex: number;
  descendantSelector?: string;
  /** Substring of the `class` attribute; generated class names carry volatile suffixes. */
  classPattern?: string;
  maxLength?: number;
}

export interface LinkRule {
  linkIndex?: number;
  attribute?: string;
}

export interface SimpleExtraction {
  strategy: 'simple';
  title: string;
  company?: string;
  /** Defaults to the title selector. */
  link?: string;
  detail?: string;
}

export interface StructuredExtraction {
  strategy: 'structured';
  linkFilter: string | LinkFilterRule;
  /** @deprecated preset names from older configs; prefer `linkFilter.conditions`. */
  linkFilterCondition?: string;
  title?: FieldRule;
  company?: FieldRule;
  link?: LinkRule;
  /** A field rule, or a direct selector relative to the container. */
  detail?: FieldRule | string;
}

export type ExtractionConfig = SimpleExtraction | StructuredExtraction;

export interface SiteExtractionConfig {
  name: string;
  baseUrl?: string;
  urlTemplate?: string;
  /** Selector for the container node of each listing. */
  jobList: string;
  extraction: ExtractionConfig;
}

export interface JobRecord {
  title: string;
  company: string;
  link: string;
  detail?: string;
  source: string;
}
