import type * as cheerio from 'cheerio';
import { isTag } from 'domhandler';
import type { Element } from 'domhandler';
import type pino from 'pino';
import { HEADING_TAGS, MEDIA_TAGS, URL_ATTRIBUTES } from './selectors';
import { loadDetachedCopy } from './documentParser';
import { findElements, getAttribute, hasVisibleText } from './domUtils';
import { getClassWeight } from './scoringRules';
import { sanitizeContent } from './contentSanitizer';
import type { ExtractionOptions } from './types/extraction';
import { isAbsoluteUrl, isFragmentOnly, isHttpUrl, resolveBaseUrl, resolveUrl } from '../../utils/urlValidator';

export interface CleanerContext {
  /** URL the document was fetched from */
  requestUrl?: string;
  /** `<base href>` of the source document, read before normalization */
  baseHref?: string;
}

export interface CleanedContent {
  $: cheerio.CheerioAPI;
  root: Element;
  warnings: string[];
}

// Parents in which a bare <code> is a block of its own rather than inline
const CODE_BLOCK_PARENTS: ReadonlySet<string> = new Set([
  'article',
  'blockquote',
  'body',
  'div',
  'figure',
  'main',
  'section',
]);

/**
 * Cleans a detached copy of the selected candidate. The scored tree is left
 * untouched; every step is switched by its own option.
 */
export function cleanContent(
  winner: Element,
  options: ExtractionOptions,
  context: CleanerContext = {},
  logger?: pino.Logger
): CleanedContent {
  const { $, root } = loadDetachedCopy(winner);
  const warnings: string[] = [];

  const removedNoise = options.stripNestedNoise ? stripNestedNoise($, root) : 0;
  const removedMedia = options.includeImages ? 0 : removeMedia($, root);
  const removedCode = options.includeCode ? 0 : removeCode($, root);
  const sanitized = sanitizeContent($, root);

  if (options.resolveUrls) {
    warnings.push(...resolveRelativeUrls(root, context));
  }
  const headingShift = options.normalizeHeadings ? normalizeHeadingLevels(root) : 0;

  logger?.debug(
    {
      event: 'content_cleaned',
      removedNoise,
      removedMedia,
      removedCode,
      ...sanitized,
      headingShift,
      warnings: warnings.length,
    },
    'Cleaned selected content'
  );

  return { $, root, warnings };
}

function removeAll($: cheerio.CheerioAPI, elements: readonly Element[]): number {
  for (const element of elements) {
    $(element).remove();
  }
  return elements.length;
}

/** Second noise pass, scoped to the winner: negative class/id weight or a nested footer. */
export function stripNestedNoise($: cheerio.CheerioAPI, root: Element): number {
  const doomed = findElements(
    root,
    element => element !== root && (element.name === 'footer' || getClassWeight(element) < 0)
  );
  return removeAll($, doomed);
}

export function removeMedia($: cheerio.CheerioAPI, root: Element): number {
  let removed = removeAll(
    $,
    findElements(root, element => element !== root && MEDIA_TAGS.has(element.name))
  );
  removed += removeAll(
    $,
    findElements(root, element => element !== root && element.name === 'figure' && !hasVisibleText(element))
  );
  return removed;
}

export function removeCode($: cheerio.CheerioAPI, root: Element): number {
  return removeAll(
    $,
    findElements(root, element => {
      if (element === root) return false;
      if (element.name === 'pre') return true;
      if (element.name !== 'code') return false;
      const parent = element.parent;
      return parent !== null && isTag(parent) && CODE_BLOCK_PARENTS.has(parent.name);
    })
  );
}

/**
 * Rewrites relative href/src/poster values to absolute URLs. Values that
 * cannot be resolved are kept as they are and reported.
 */
export function resolveRelativeUrls(root: Element, context: CleanerContext): string[] {
  const warnings = new Set<string>();
  const base = resolveBaseUrl(context.baseHref, context.requestUrl);
  let unresolvedRelative = 0;

  for (const element of findElements(root, () => true)) {
    for (const { tag, attribute } of URL_ATTRIBUTES) {
      if (element.name !== tag) continue;
      const raw = getAttribute(element, attribute);
      const value = raw?.trim();
      if (!value || isFragmentOnly(value)) continue;

      if (isAbsoluteUrl(value)) {
        if (/^https?:/i.test(value) && !isHttpUrl(value)) {
          warnings.add(`Malformed URL left unchanged: ${value}`);
        }
        continue;
      }

      if (!base) {
        unresolvedRelative += 1;
        continue;
      }

      const resolved = resolveUrl(value, base);
      if (resolved.ok) {
        element.attribs[attribute] = resolved.url;
      } else {
        warnings.add(`Malformed URL left unchanged: ${value}`);
      }
    }
  }

  const result = Array.from(warnings);
  if (unresolvedRelative > 0) {
    result.push(`${unresolvedRelative} relative URL(s) left unresolved: no base URL`);
  }
  return result;
}

/** Shifts headings so the highest level present becomes h1. Returns the shift applied. */
export function normalizeHeadingLevels(root: Element): number {
  const headings = findElements(root, element => HEADING_TAGS.has(element.name));
  if (headings.length === 0) return 0;

  const highest = headings.reduce(
    (min, heading) => Math.min(min, Number(heading.name.slice(1))),
    Number.POSITIVE_INFINITY
  );
  const shift = highest - 1;
  if (shift <= 0) return 0;

  for (const heading of headings) {
    heading.name = `h${Number(heading.name.slice(1)) - shift}`;
  }
  return shift;
}
