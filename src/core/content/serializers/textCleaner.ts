import * as cheerio from 'cheerio';
import { EXCERPT_LENGTH } from '../../../config/constants';
import { collectVisibleText, normalizeWhitespace } from '../domUtils';

/** Visible text of an HTML fragment, block boundaries as single spaces. */
export function extractVisibleText(html: string): string {
  if (!html) return '';
  const $ = cheerio.load(html);
  return collectVisibleText($.root()[0]);
}

/**
 * Markdown reduced to what a reader sees: link and image targets, fences,
 * heading and list markers, emphasis and escapes are dropped.
 */
export function markdownToPlainText(markdown: string): string {
  const text = markdown
    .replace(/^(`{3,}|~{3,}).*$/gm, ' ')
    .replace(/!\[([^\]]*)\]\([^)]*\)/g, '$1')
    .replace(/\[([^\]]*)\]\([^)]*\)/g, '$1')
    .replace(/<[^>]+>/g, ' ')
    .replace(/^\s{0,3}(?:#{1,6}|>+|[-*+]|\d+[.)])\s+/gm, '')
    .replace(/(\*\*|__|~~|\*|`)/g, '')
    .replace(/\\([\\`*_{}[\]()#+\-.!|>~])/g, '$1')
    .replace(/\|/g, ' ');
  return normalizeWhitespace(text);
}

/**
 * Leading text up to `maxLength` characters, cut back to the last word
 * boundary. The result is always a prefix of `text`; a first word longer
 * than the limit is kept whole.
 */
export function buildExcerpt(text: string, maxLength: number = EXCERPT_LENGTH): string {
  if (text.length <= maxLength) return text;

  if (/\s/.test(text.charAt(maxLength))) {
    return text.slice(0, maxLength).trimEnd();
  }

  const head = text.slice(0, maxLength);
  const boundary = head.search(/\s\S*$/);
  if (boundary > 0) {
    return head.slice(0, boundary).trimEnd();
  }

  const firstWord = text.match(/^\S+/);
  return firstWord ? firstWord[0] : head;
}
