// Tag sets and CSS selectors shared by the normalizer, scorer and cleaner

export const HEADING_TAGS: ReadonlySet<string> = new Set(['h1', 'h2', 'h3', 'h4', 'h5', 'h6']);

export const HEADING_SELECTORS = 'h1, h2, h3, h4, h5, h6';

// Removed wherever they appear, head included
export const NON_CONTENT_TAGS: ReadonlySet<string> = new Set([
  'script',
  'style',
  'noscript',
  'iframe',
  'nav',
  'aside',
  'form',
  'template',
  'object',
  'embed',
  'dialog',
  'button',
  'input',
  'select',
  'textarea',
  'frame',
  'frameset',
  'noframes',
  'marquee',
]);

export const NON_CONTENT_ROLE_SELECTORS =
  '[role="navigation"], [role="banner"], [role="contentinfo"], [role="complementary"], [role="dialog"], [role="alertdialog"], [role="search"], [role="menu"], [role="menubar"]';

export const HIDDEN_SELECTORS = '[hidden], [aria-hidden="true"]';

// Elements that carry content without text; never dropped as "empty"
export const MEDIA_TAGS: ReadonlySet<string> = new Set([
  'img',
  'video',
  'picture',
  'audio',
  'source',
  'svg',
  'canvas',
]);

export const STRUCTURAL_LEAF_TAGS: ReadonlySet<string> = new Set(['br', 'hr', 'td', 'th']);

// Text inside these keeps its original whitespace
export const PREFORMATTED_TAGS: ReadonlySet<string> = new Set(['pre', 'code', 'textarea']);

export const WRAPPER_TAGS: ReadonlySet<string> = new Set(['div']);

export const CANDIDATE_TAGS: ReadonlySet<string> = new Set([
  'article',
  'main',
  'section',
  'div',
  'td',
  'p',
  'pre',
  'blockquote',
]);

// Elements whose boundaries separate words when text is flattened
export const BLOCK_TAGS: ReadonlySet<string> = new Set([
  'address',
  'article',
  'aside',
  'blockquote',
  'body',
  'br',
  'dd',
  'details',
  'div',
  'dl',
  'dt',
  'figcaption',
  'figure',
  'footer',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'header',
  'hr',
  'li',
  'main',
  'ol',
  'p',
  'pre',
  'section',
  'summary',
  'table',
  'tbody',
  'td',
  'tfoot',
  'th',
  'thead',
  'tr',
  'ul',
]);

export const IMAGE_SELECTORS = 'img, picture, video, audio, source, svg, canvas';

export const BYLINE_SELECTORS =
  '[rel="author"], [itemprop="author"], .byline, .author, .post-author, .entry-author';

export const URL_ATTRIBUTES: ReadonlyArray<{ tag: string; attribute: string }> = [
  { tag: 'a', attribute: 'href' },
  { tag: 'img', attribute: 'src' },
  { tag: 'source', attribute: 'src' },
  { tag: 'video', attribute: 'src' },
  { tag: 'video', attribute: 'poster' },
  { tag: 'audio', attribute: 'src' },
];
