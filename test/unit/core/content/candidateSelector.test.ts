import { describe, test, expect } from '@jest/globals';
import { parseHtml } from '../../../../src/core/content/documentParser';
import { scoreCandidates } from '../../../../src/core/content/candidateScorer';
import {
  compareCandidates,
  pickBestCandidate,
  selectCandidate,
} from '../../../../src/core/content/candidateSelector';
import type { CandidateScore } from '../../../../src/core/content/types/extraction';

function score(overrides: Partial<CandidateScore>): CandidateScore {
  return {
    total: 0,
    base: 0,
    textDensity: 0,
    linkDensity: 0,
    tagBonus: 0,
    classWeight: 0,
    paragraphBonus: 0,
    commaBonus: 0,
    propagated: 0,
    textLength: 0,
    wordCount: 0,
    order: 0,
    ...overrides,
  };
}

const words = (count: number): string => Array.from({ length: count }, (_, i) => `word${i}`).join(' ');

describe('compareCandidates', () => {
  test('higher total wins', () => {
    expect(compareCandidates(score({ total: 10 }), score({ total: 20 }))).toBeGreaterThan(0);
    expect(compareCandidates(score({ total: 20 }), score({ total: 10 }))).toBeLessThan(0);
  });

  test('ties fall back to text length, then document order', () => {
    expect(
      compareCandidates(score({ total: 5, textLength: 100 }), score({ total: 5, textLength: 50 }))
    ).toBeLessThan(0);
    expect(
      compareCandidates(score({ total: 5, textLength: 50, order: 2 }), score({ total: 5, textLength: 50, order: 7 }))
    ).toBeLessThan(0);
  });
});

describe('pickBestCandidate', () => {
  test('returns undefined for an empty table', () => {
    expect(pickBestCandidate(new Map())).toBeUndefined();
  });

  test('prefers the earlier of two equal candidates', () => {
    const $ = parseHtml('<div id="a"></div><div id="b"></div>');
    const table = new Map([
      [$('#b')[0], score({ total: 12, textLength: 30, order: 4 })],
      [$('#a')[0], score({ total: 12, textLength: 30, order: 2 })],
    ]);
    expect(pickBestCandidate(table)?.element).toBe($('#a')[0]);
  });
});

describe('selectCandidate', () => {
  const articleHtml = `<body><article><p>${words(60)}</p></article></body>`;

  test('selects the best candidate when it clears the floor and the word minimum', () => {
    const $ = parseHtml(articleHtml);
    const root = $.root()[0];
    const selection = selectCandidate(root, scoreCandidates($('body')[0]), { minWordCount: 50 });

    expect(selection?.reason).toBe('best-candidate');
    expect(selection?.element.name).toBe('article');
    expect(selection?.wordCount).toBe(60);
    expect(selection?.warnings).toEqual([]);
  });

  test('falls back to the body when it has enough words', () => {
    const $ = parseHtml('<body><span>one two three four five</span></body>');
    const selection = selectCandidate($.root()[0], scoreCandidates($('body')[0]), { minWordCount: 3 });

    expect(selection?.reason).toBe('body-fallback');
    expect(selection?.element.name).toBe('body');
    expect(selection?.wordCount).toBe(5);
    expect(selection?.score).toBeUndefined();
  });

  test('returns the best effort with a warning when everything is short', () => {
    const $ = parseHtml(articleHtml);
    const selection = selectCandidate($.root()[0], scoreCandidates($('body')[0]), { minWordCount: 1000 });

    expect(selection?.reason).toBe('low-content');
    expect(selection?.element.name).toBe('article');
    expect(selection?.warnings).toEqual(['Low content: 60 words found (minimum 1000)']);
  });

  test('returns undefined when there is neither a candidate nor a body', () => {
    const $ = parseHtml('<span>x</span>');
    expect(selectCandidate($('span')[0], new Map(), { minWordCount: 1 })).toBeUndefined();
  });

  test('a minimum of zero accepts any candidate above the floor', () => {
    const $ = parseHtml(`<body><article><p>${words(3)}, with commas, and more commas</p></article></body>`);
    const selection = selectCandidate($.root()[0], scoreCandidates($('body')[0]), { minWordCount: 0 });
    expect(selection?.reason).toBe('best-candidate');
  });
});
