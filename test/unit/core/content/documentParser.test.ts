import { describe, test, expect } from '@jest/globals';
import {
  assertTreeInvariants,
  getBody,
  getDocumentRoot,
  loadDetachedCopy,
  parseHtml,
} from '../../../../src/core/content/documentParser';
import { TreeInvariantError } from '../../../../src/core/content/errors';

describe('documentParser', () => {
  test('parseHtml always yields a body, even for fragments', () => {
    const $ = parseHtml('just text');
    expect(getBody($)?.name).toBe('body');
    expect($('body').text()).toBe('just text');
  });

  test('parseHtml accepts malformed markup', () => {
    const $ = parseHtml('<div><p>unclosed<span>tags</div>');
    expect($('p').text()).toBe('unclosedtags');
  });

  test('assertTreeInvariants accepts a parsed tree', () => {
    const $ = parseHtml('<article><p>ok</p></article>');
    expect(() => assertTreeInvariants(getDocumentRoot($))).not.toThrow();
  });

  test('assertTreeInvariants rejects a child whose parent link is wrong', () => {
    const $ = parseHtml('<article><p>ok</p></article>');
    const paragraph = $('p')[0];
    paragraph.parent = $('body')[0];
    expect(() => assertTreeInvariants(getDocumentRoot($))).toThrow(TreeInvariantError);
  });

  test('assertTreeInvariants rejects a cycle', () => {
    const $ = parseHtml('<article><p>ok</p></article>');
    const article = $('article')[0];
    const paragraph = $('p')[0];
    paragraph.children.push(article);
    expect(() => assertTreeInvariants(getDocumentRoot($))).toThrow(
      'Document tree invariant violated'
    );
  });

  test('loadDetachedCopy mutations do not reach the source tree', () => {
    const $ = parseHtml('<article><p>one</p><p>two</p></article>');
    const copy = loadDetachedCopy($('article')[0]);
    copy.$('p').first().remove();

    expect(copy.$('p')).toHaveLength(1);
    expect($('p')).toHaveLength(2);
    expect(copy.root.name).toBe('article');
    expect(copy.root.parent?.type).toBe('root');
  });
});
