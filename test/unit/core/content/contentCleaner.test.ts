import { describe, test, expect } from '@jest/globals';
import { parseHtml } from '../../../../src/core/content/documentParser';
import { cleanContent, normalizeHeadingLevels } from '../../../../src/core/content/contentCleaner';
import { createExtractionOptions } from '../../../../src/core/content/types/extraction';

const WINNER =
  '<article><p>Intro text here.</p><div class="share-links">Share this</div><footer>Foot</footer>' +
  '<img src="/a.png"><pre><code class="language-js">let x = 1;</code></pre>' +
  '<h3>Sub</h3><h4>Subsub</h4><a href="/next">Next</a></article>';

describe('cleanContent', () => {
  test('cleans a copy and leaves the scored tree untouched', () => {
    const source = parseHtml(WINNER);
    const cleaned = cleanContent(source('article')[0], createExtractionOptions(), {
      requestUrl: 'https://example.com/blog/post',
    });
    const { $ } = cleaned;

    expect(cleaned.root.name).toBe('article');
    expect($('.share-links')).toHaveLength(0);
    expect($('footer')).toHaveLength(0);
    expect($('img').attr('src')).toBe('https://example.com/a.png');
    expect($('a').attr('href')).toBe('https://example.com/next');
    expect($('h1').text()).toBe('Sub');
    expect($('h2').text()).toBe('Subsub');
    expect($('pre code').text()).toBe('let x = 1;');
    expect(cleaned.warnings).toEqual([]);

    expect(source('footer')).toHaveLength(1);
    expect(source('h3')).toHaveLength(1);
    expect(source('img').attr('src')).toBe('/a.png');
  });

  test('drops media and code blocks when they are excluded', () => {
    const source = parseHtml(
      '<article><p>Text</p><figure><img src="/a.png"></figure>' +
        '<figure><img src="/b.png"><figcaption>Caption</figcaption></figure>' +
        '<p>Use <code>npm</code> inline</p><code>block()</code><pre>more()</pre></article>'
    );
    const { $ } = cleanContent(
      source('article')[0],
      createExtractionOptions({ includeImages: false, includeCode: false }),
      { requestUrl: 'https://example.com/' }
    );

    expect($('img')).toHaveLength(0);
    expect($('figure')).toHaveLength(1);
    expect($('figcaption').text()).toBe('Caption');
    expect($('pre')).toHaveLength(0);
    expect($('code')).toHaveLength(1);
    expect($('p code').text()).toBe('npm');
  });

  test('reports relative URLs it cannot resolve without a base', () => {
    const source = parseHtml(
      '<div><a href="/a">A</a><img src="photo.png"><a href="#top">Top</a><a href="https://example.com/x">X</a></div>'
    );
    const cleaned = cleanContent(source('div')[0], createExtractionOptions());

    expect(cleaned.warnings).toEqual(['2 relative URL(s) left unresolved: no base URL']);
    expect(cleaned.$('img').attr('src')).toBe('photo.png');
  });

  test('resolves against the document base href', () => {
    const source = parseHtml('<div><img src="photo.png"><a href="#top">Top</a></div>');
    const { $ } = cleanContent(source('div')[0], createExtractionOptions(), {
      requestUrl: 'https://example.com/a/b',
      baseHref: '/static/',
    });

    expect($('img').attr('src')).toBe('https://example.com/static/photo.png');
    expect($('a').attr('href')).toBe('#top');
  });

  test('leaves malformed absolute URLs unchanged and warns once', () => {
    const source = parseHtml(
      '<div><a href="http://exa mple.com/">Bad</a><a href="http://exa mple.com/">Again</a></div>'
    );
    const cleaned = cleanContent(source('div')[0], createExtractionOptions(), {
      requestUrl: 'https://example.com/',
    });

    expect(cleaned.warnings).toEqual(['Malformed URL left unchanged: http://exa mple.com/']);
    expect(cleaned.$('a').first().attr('href')).toBe('http://exa mple.com/');
  });

  test('individual steps can be switched off', () => {
    const source = parseHtml(WINNER);
    const { $, warnings } = cleanContent(
      source('article')[0],
      createExtractionOptions({ stripNestedNoise: false, resolveUrls: false, normalizeHeadings: false })
    );

    expect($('footer')).toHaveLength(1);
    expect($('img').attr('src')).toBe('/a.png');
    expect($('h3')).toHaveLength(1);
    expect(warnings).toEqual([]);
  });
});

describe('normalizeHeadingLevels', () => {
  test('shifts so the highest heading becomes h1', () => {
    const $ = parseHtml('<section><h2>A</h2><h4>B</h4></section>');
    expect(normalizeHeadingLevels($('section')[0])).toBe(1);
    expect($('h1').text()).toBe('A');
    expect($('h3').text()).toBe('B');
  });

  test('leaves documents that already use h1 alone', () => {
    const $ = parseHtml('<section><h1>A</h1><h3>B</h3></section>');
    expect(normalizeHeadingLevels($('section')[0])).toBe(0);
    expect($('h3').text()).toBe('B');
  });
});
