import { isTag } from 'domhandler';
import type { Element } from 'domhandler';
import type pino from 'pino';
import { BYLINE_SELECTORS, HEADING_TAGS } from '../selectors';
import { collectVisibleText, findElements, findFirstElement, getAttribute, normalizeWhitespace } from '../domUtils';
import type { ExtractedMetadata } from '../types/extraction';
import { getMeta } from './documentHead';
import type { DocumentHead } from './documentHead';
import { detectLanguage } from './languageDetector';

export interface MetadataContext {
  head: DocumentHead;
  /** Selected candidate in the normalized tree, still attached to its ancestors */
  winner: Element;
  /** Cleaned copy of the winner */
  content: Element;
  /** Visible text of the cleaned content */
  text: string;
  languageHint?: string;
}

export interface MetadataStrategy {
  readonly source: string;
  extract(context: MetadataContext): string | undefined;
}

export type StrategyOutcome =
  | { kind: 'found'; value: string; source: string }
  | { kind: 'missing' };

const MAX_BYLINE_LENGTH = 100;

/** Runs strategies in order and stops at the first non-empty value. */
export function firstSuccess(
  strategies: readonly MetadataStrategy[],
  context: MetadataContext
): StrategyOutcome {
  for (const strategy of strategies) {
    const value = strategy.extract(context)?.trim();
    if (value) return { kind: 'found', value, source: strategy.source };
  }
  return { kind: 'missing' };
}

const fromMeta = (
  source: string,
  attribute: Parameters<typeof getMeta>[1],
  ...names: string[]
): MetadataStrategy => ({
  source,
  extract: ({ head }) => names.map(name => getMeta(head, attribute, name)).find(Boolean),
});

const fromJsonLd = (source: string, read: (node: Record<string, unknown>) => string | undefined): MetadataStrategy => ({
  source,
  extract: ({ head }) => head.jsonLd.map(read).find(Boolean),
});

function jsonLdPersonName(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) {
    const names = value.map(jsonLdPersonName).filter((name): name is string => Boolean(name));
    return names.length > 0 ? names.join(', ') : undefined;
  }
  if (typeof value === 'object' && value !== null && 'name' in value && typeof value.name === 'string') {
    return value.name;
  }
  return undefined;
}

function topHeading(root: Element): string | undefined {
  const headings = findElements(root, element => HEADING_TAGS.has(element.name));
  let top: Element | undefined;
  for (const heading of headings) {
    if (!top || heading.name < top.name) top = heading;
  }
  return top ? collectVisibleText(top) : undefined;
}

function bylineText(root: Element): string | undefined {
  const byline = findFirstElement(root, element => matchesByline(element));
  if (!byline) return undefined;
  const text = collectVisibleText(byline).replace(/^by\s+/i, '');
  return text.length > 0 && text.length <= MAX_BYLINE_LENGTH ? text : undefined;
}

const BYLINE_CLASSES = BYLINE_SELECTORS.split(',')
  .map(selector => selector.trim())
  .filter(selector => selector.startsWith('.'))
  .map(selector => selector.slice(1));

function matchesByline(element: Element): boolean {
  if (getAttribute(element, 'rel')?.toLowerCase() === 'author') return true;
  if (getAttribute(element, 'itemprop')?.toLowerCase() === 'author') return true;
  const classes = (getAttribute(element, 'class') ?? '').toLowerCase().split(/\s+/);
  return classes.some(name => BYLINE_CLASSES.includes(name));
}

function langAttributeChain(winner: Element): string | undefined {
  let current: Element | null = winner;
  while (current) {
    const lang = getAttribute(current, 'lang') ?? getAttribute(current, 'xml:lang');
    if (lang?.trim()) return lang.trim();
    current = current.parent && isTag(current.parent) ? current.parent : null;
  }
  return undefined;
}

function firstListValue(value: string | undefined): string | undefined {
  return value?.split(',')[0]?.trim();
}

export const TITLE_STRATEGIES: readonly MetadataStrategy[] = [
  { source: 'title-tag', extract: ({ head }) => head.title },
  fromMeta('og:title', 'property', 'og:title'),
  fromMeta('twitter:title', 'name', 'twitter:title'),
  { source: 'top-heading', extract: ({ content }) => topHeading(content) },
];

export const AUTHOR_STRATEGIES: readonly MetadataStrategy[] = [
  fromMeta('meta-author', 'name', 'author'),
  fromMeta('article:author', 'property', 'article:author'),
  fromJsonLd('json-ld', node => jsonLdPersonName(node.author)),
  { source: 'byline', extract: ({ winner }) => bylineText(winner) },
];

export const DATE_STRATEGIES: readonly MetadataStrategy[] = [
  fromMeta('article:published_time', 'property', 'article:published_time'),
  fromMeta('itemprop', 'itemprop', 'datePublished'),
  fromMeta('meta-date', 'name', 'date', 'pubdate', 'publishdate', 'dc.date.issued'),
  fromJsonLd('json-ld', node => (typeof node.datePublished === 'string' ? node.datePublished : undefined)),
  {
    source: 'time-element',
    extract: ({ winner }) => {
      const time = findFirstElement(winner, element => element.name === 'time' && Boolean(getAttribute(element, 'datetime')?.trim()));
      return time ? getAttribute(time, 'datetime') : undefined;
    },
  },
];

export const LANGUAGE_STRATEGIES: readonly MetadataStrategy[] = [
  { source: 'lang-attribute', extract: ({ winner, head }) => langAttributeChain(winner) ?? head.htmlLang },
  {
    source: 'content-language',
    extract: ({ head }) => firstListValue(getMeta(head, 'http-equiv', 'content-language')),
  },
  { source: 'og:locale', extract: ({ head }) => getMeta(head, 'property', 'og:locale')?.replace('_', '-') },
  { source: 'hint', extract: ({ languageHint }) => languageHint },
  { source: 'heuristic', extract: ({ text }) => detectLanguage(text) },
];

const FIELDS = [
  { field: 'title', label: 'title', strategies: TITLE_STRATEGIES },
  { field: 'author', label: 'author', strategies: AUTHOR_STRATEGIES },
  { field: 'datePublished', label: 'publication date', strategies: DATE_STRATEGIES },
  { field: 'language', label: 'language', strategies: LANGUAGE_STRATEGIES },
] as const;

export interface MetadataExtraction {
  metadata: ExtractedMetadata;
  warnings: string[];
}

export function extractMetadata(context: MetadataContext, logger?: pino.Logger): MetadataExtraction {
  const metadata: ExtractedMetadata = {};
  const warnings: string[] = [];
  const sources: Record<string, string> = {};

  for (const { field, label, strategies } of FIELDS) {
    const outcome = firstSuccess(strategies, context);
    if (outcome.kind === 'found') {
      metadata[field] = normalizeWhitespace(outcome.value);
      sources[field] = outcome.source;
    } else {
      warnings.push(`No ${label} found`);
    }
  }

  logger?.debug({ event: 'metadata_extracted', sources, missing: warnings.length }, 'Extracted metadata');
  return { metadata, warnings };
}
