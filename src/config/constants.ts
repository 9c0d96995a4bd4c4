import { PACKAGE_VERSION } from '../utils/version';

export const APP_NAME = 'page-distill';
export const APP_VERSION = PACKAGE_VERSION;

export const EXCERPT_LENGTH = 200;

export const DEFAULT_EXTRACTION_OPTIONS = {
  minWordCount: 150,
  includeImages: true,
  includeCode: true,
  maxOutputChars: 1_000_000,
  safeMarkdown: true,
  stripNestedNoise: true,
  resolveUrls: true,
  normalizeHeadings: true,
} as const;

// Tunable scoring constants; only the qualitative behavior is load-bearing
export const SCORING = {
  DENSITY_DIVISOR: 10,
  DENSITY_CAP: 20,
  LENGTH_BONUS_STEP: 100,
  LENGTH_BONUS_CAP: 3,
  LONG_PARAGRAPH_CHARS: 25,
  PARAGRAPH_BONUS: 3,
  COMMA_BONUS: 1,
  LINK_DENSITY_THRESHOLD: 0.33,
  LINK_DENSITY_PENALTY: 0.1,
  PARENT_DAMPING: 0.5,
  GRANDPARENT_DAMPING: 0.25,
  MIN_SCORE_FLOOR: 10,
} as const;

export const MCP_TOOL_DESCRIPTIONS = {
  EXTRACT_ARTICLE:
    'Extract the main readable content from a raw HTML document. Scores candidate containers by text density, link density and structural hints, selects the article root, removes boilerplate and returns sanitized HTML, GitHub-flavored Markdown, excerpt, word count and metadata (title, author, publication date, language). Pass the page URL as `url` so relative links and images resolve to absolute URLs. Results are deterministic and cached by a fingerprint of the HTML and options. Warnings report low content, missing metadata and unresolvable links without failing the call.',
} as const;
