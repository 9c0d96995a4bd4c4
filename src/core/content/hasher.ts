import { createHash } from 'crypto';
import type { ExtractionOptions } from './types/extraction';

export function sha256Hex(input: string): string {
  return createHash('sha256').update(input, 'utf8').digest('hex');
}

/**
 * JSON with object keys sorted at every level, so that two equal values
 * always serialize to the same string. Undefined properties are dropped.
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map(item => stableStringify(item)).join(',')}]`;
  }
  const entries = Object.entries(value)
    .filter(([, item]) => item !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`);
  return `{${entries.join(',')}}`;
}

/** Strips a leading BOM and unifies line endings before hashing. */
export function normalizeHtmlForFingerprint(html: string): string {
  return html.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');
}

/**
 * Cache key for one extraction: sha256 over the normalized HTML and the
 * canonical options. The base URL is part of the key because it changes
 * resolved links in the output.
 */
export function computeFingerprint(html: string, options: ExtractionOptions, url?: string): string {
  const canonical = stableStringify({ options, url: url ?? null });
  return sha256Hex(`${normalizeHtmlForFingerprint(html)}\u0000${canonical}`);
}
