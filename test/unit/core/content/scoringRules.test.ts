import { describe, test, expect } from '@jest/globals';
import { parseHtml } from '../../../../src/core/content/documentParser';
import {
  SCORING_RULES,
  getClassWeight,
  getSemanticBonus,
  getTagBonus,
  scoreClassAndId,
} from '../../../../src/core/content/scoringRules';

describe('scoringRules', () => {
  test('sums every matching positive rule once', () => {
    expect(scoreClassAndId('article-content main')).toEqual({
      weight: 75,
      matched: ['article', 'content', 'main'],
    });
  });

  test('sums negative rules', () => {
    expect(scoreClassAndId('sidebar ad-slot')).toEqual({ weight: -50, matched: ['sidebar', 'ad'] });
  });

  test('short tokens only match on word boundaries', () => {
    expect(scoreClassAndId('header').weight).toBe(0);
    expect(scoreClassAndId('domain').weight).toBe(0);
    expect(scoreClassAndId('canvas').weight).toBe(0);
    expect(scoreClassAndId('navigation').weight).toBe(-25);
    expect(scoreClassAndId('site_nav').weight).toBe(-25);
  });

  test('empty class/id scores zero', () => {
    expect(scoreClassAndId('')).toEqual({ weight: 0, matched: [] });
  });

  test('positive and negative matches cancel out', () => {
    const $ = parseHtml('<div class="post" id="comments"></div>');
    expect(getClassWeight($('div')[0])).toBe(0);
  });

  test('accepts a custom rule table', () => {
    const rules = [{ name: 'recipe', pattern: /recipe/, delta: 40 }];
    expect(scoreClassAndId('recipe-card article', rules)).toEqual({ weight: 40, matched: ['recipe'] });
  });

  test('rule names are unique', () => {
    const names = SCORING_RULES.map(rule => rule.name);
    expect(new Set(names).size).toBe(names.length);
  });

  test('tag bonus favours semantic containers', () => {
    expect(getTagBonus('article')).toBe(25);
    expect(getTagBonus('main')).toBe(20);
    expect(getTagBonus('div')).toBe(0);
    expect(getTagBonus('constructor')).toBe(0);
  });

  test('role="main" earns the main bonus', () => {
    const $ = parseHtml(
      '<div role="main"></div><section role=" MAIN "></section><article role="main"></article><div role="note"></div>'
    );
    expect(getSemanticBonus($('div')[0])).toBe(20);
    expect(getSemanticBonus($('section')[0])).toBe(20);
    expect(getSemanticBonus($('article')[0])).toBe(25);
    expect(getSemanticBonus($('div')[1])).toBe(0);
  });
});
