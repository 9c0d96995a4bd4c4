export function isHttpUrl(input: string): boolean {
  try {
    const u = new URL(input);
    return u.protocol === 'http:' || u.protocol === 'https:';
  } catch {
    return false;
  }
}

export function isAbsoluteUrl(input: string): boolean {
  return /^[a-z][a-z\d+.-]*:/i.test(input);
}

export function isFragmentOnly(input: string): boolean {
  return input.startsWith('#');
}

export type UrlResolution = { ok: true; url: string } | { ok: false; reason: string };

/**
 * Resolves `value` against `base`. Protocol-relative and root-relative values
 * resolve the same way a browser would; anything `URL` rejects is reported
 * back instead of thrown.
 */
export function resolveUrl(value: string, base: string): UrlResolution {
  try {
    return { ok: true, url: new URL(value, base).toString() };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * The base used for relative links: a document `<base href>` resolved
 * against the request URL, else the request URL itself.
 */
export function resolveBaseUrl(baseHref: string | undefined, requestUrl: string | undefined): string | undefined {
  const href = baseHref?.trim();
  if (href) {
    if (isAbsoluteUrl(href)) {
      const resolved = resolveUrl(href, href);
      if (resolved.ok) return resolved.url;
    } else if (requestUrl) {
      const resolved = resolveUrl(href, requestUrl);
      if (resolved.ok) return resolved.url;
    }
  }

  if (requestUrl && isAbsoluteUrl(requestUrl) && resolveUrl(requestUrl, requestUrl).ok) {
    return requestUrl;
  }
  return undefined;
}
