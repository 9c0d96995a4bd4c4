import type * as cheerio from 'cheerio';
import { normalizeWhitespace } from '../domUtils';

export type MetaAttribute = 'name' | 'property' | 'itemprop' | 'http-equiv';

/**
 * What metadata extraction needs from the source document, captured before
 * the normalizer strips scripts (JSON-LD lives in `<script>` tags).
 */
export interface DocumentHead {
  title?: string;
  htmlLang?: string;
  baseHref?: string;
  /** Keyed `${attribute}:${lower-cased value}`; the first tag wins */
  meta: ReadonlyMap<string, string>;
  jsonLd: readonly Record<string, unknown>[];
}

const META_ATTRIBUTES: readonly MetaAttribute[] = ['name', 'property', 'itemprop', 'http-equiv'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Flattens top-level arrays and `@graph` containers into plain objects. */
export function flattenJsonLd(value: unknown): Record<string, unknown>[] {
  const flattened: Record<string, unknown>[] = [];
  const queue: unknown[] = [value];

  while (queue.length > 0) {
    const item = queue.shift();
    if (Array.isArray(item)) {
      queue.push(...item);
    } else if (isRecord(item)) {
      flattened.push(item);
      if (Array.isArray(item['@graph'])) queue.push(...item['@graph']);
    }
  }
  return flattened;
}

export function snapshotDocumentHead($: cheerio.CheerioAPI): DocumentHead {
  const meta = new Map<string, string>();
  $('meta').each((_, element) => {
    const content = normalizeWhitespace(element.attribs.content ?? '');
    if (!content) return;
    for (const attribute of META_ATTRIBUTES) {
      const value = element.attribs[attribute]?.trim().toLowerCase();
      if (!value) continue;
      const key = `${attribute}:${value}`;
      if (!meta.has(key)) meta.set(key, content);
    }
  });

  const jsonLd: Record<string, unknown>[] = [];
  $('script[type="application/ld+json"]').each((_, element) => {
    jsonLd.push(...flattenJsonLd(parseJson($(element).text())));
  });

  const title = normalizeWhitespace($('head title').first().text() || $('title').first().text());
  const htmlLang = $('html').attr('lang')?.trim();
  const baseHref = $('base[href]').first().attr('href')?.trim();

  return {
    title: title || undefined,
    htmlLang: htmlLang || undefined,
    baseHref: baseHref || undefined,
    meta,
    jsonLd,
  };
}

export function getMeta(head: DocumentHead, attribute: MetaAttribute, value: string): string | undefined {
  return head.meta.get(`${attribute}:${value.toLowerCase()}`);
}
