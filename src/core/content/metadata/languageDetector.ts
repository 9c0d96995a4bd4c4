import stopwordData from './stopwords.json';

const STOPWORDS: ReadonlyMap<string, ReadonlySet<string>> = new Map(
  Object.entries(stopwordData).map(([language, words]) => [language, new Set(words)])
);

const MIN_STOPWORD_HITS = 3;
const KANA_SHARE = 0.1;
const SCRIPT_SHARE = 0.5;

const KANA_PATTERN = /[\p{Script=Hiragana}\p{Script=Katakana}]/gu;

// Checked in order; Han comes after kana so Japanese is not read as Chinese
const SCRIPT_LANGUAGES: ReadonlyArray<{ language: string; pattern: RegExp }> = [
  { language: 'ko', pattern: /\p{Script=Hangul}/gu },
  { language: 'zh', pattern: /\p{Script=Han}/gu },
  { language: 'ru', pattern: /\p{Script=Cyrillic}/gu },
  { language: 'ar', pattern: /\p{Script=Arabic}/gu },
  { language: 'he', pattern: /\p{Script=Hebrew}/gu },
  { language: 'el', pattern: /\p{Script=Greek}/gu },
  { language: 'th', pattern: /\p{Script=Thai}/gu },
  { language: 'hi', pattern: /\p{Script=Devanagari}/gu },
];

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

export function detectByScript(text: string): string | undefined {
  const letters = countMatches(text, /\p{L}/gu);
  if (letters === 0) return undefined;

  if (countMatches(text, KANA_PATTERN) / letters >= KANA_SHARE) return 'ja';
  for (const { language, pattern } of SCRIPT_LANGUAGES) {
    if (countMatches(text, pattern) / letters >= SCRIPT_SHARE) return language;
  }
  return undefined;
}

/**
 * Counts stopword hits per language. A language wins only with enough hits
 * and strictly more than any other, so short or mixed text stays undetected.
 */
export function detectByStopwords(text: string): string | undefined {
  const tokens = text.toLowerCase().split(/[^\p{L}]+/u).filter(Boolean);
  let best: { language: string; hits: number } | undefined;
  let runnerUp = 0;

  for (const [language, words] of STOPWORDS) {
    let hits = 0;
    for (const token of tokens) {
      if (words.has(token)) hits += 1;
    }
    if (!best || hits > best.hits) {
      runnerUp = best?.hits ?? 0;
      best = { language, hits };
    } else if (hits > runnerUp) {
      runnerUp = hits;
    }
  }

  if (!best || best.hits < MIN_STOPWORD_HITS || best.hits === runnerUp) return undefined;
  return best.language;
}

export function detectLanguage(text: string): string | undefined {
  return detectByScript(text) ?? detectByStopwords(text);
}
