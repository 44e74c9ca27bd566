import type { SiteConfig } from '../config';
import { BaseParser } from './base-parser';
import { HttpSiteParser } from './http-parser';

export { BaseParser } from './base-parser';
export { HttpSiteParser } from './http-parser';

type ParserConstructor = new (site: SiteConfig) => BaseParser;

const parserRegistry = new Map<string, ParserConstructor>();

/**
 * Register a dedicated parser for one site name.
 * Sites without one use HttpSiteParser.
 */
export function registerParser(name: string, ctor: ParserConstructor): void {
  parserRegistry.set(name, ctor);
}

export function getParser(site: SiteConfig): BaseParser | null {
  if (!site.enabled) return null;
  const Ctor = parserRegistry.get(site.name) ?? HttpSiteParser;
  return new Ctor(site);
}
