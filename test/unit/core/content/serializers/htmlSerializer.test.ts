import { describe, test, expect } from '@jest/globals';
import { parseHtml } from '../../../../../src/core/content/documentParser';
import { sanitizeArticleHtml, serializeHtml } from '../../../../../src/core/content/serializers/htmlSerializer';

describe('sanitizeArticleHtml', () => {
  test('drops event handlers and inline styles', () => {
    expect(sanitizeArticleHtml('<p style="color:red" onclick="x()">Hi <b>there</b></p>')).toBe('<p>Hi <b>there</b></p>');
  });

  test('drops scripts with their contents', () => {
    expect(sanitizeArticleHtml('<div><script>alert(1)</script>ok</div>')).toBe('<div>ok</div>');
  });

  test('drops javascript: and data: links', () => {
    expect(sanitizeArticleHtml('<a href="javascript:alert(1)">bad</a>')).toBe('<a>bad</a>');
    expect(sanitizeArticleHtml('<a href="data:text/html,hi">x</a>')).toBe('<a>x</a>');
  });

  test('keeps data: images', () => {
    expect(sanitizeArticleHtml('<img src="data:image/png;base64,AAAA" alt="x">')).toBe(
      '<img src="data:image/png;base64,AAAA" alt="x" />'
    );
  });

  test('keeps code language classes', () => {
    const html = '<pre class="language-js"><code class="language-js">x</code></pre>';
    expect(sanitizeArticleHtml(html)).toBe(html);
  });
});

describe('serializeHtml', () => {
  test('serializes the root element itself', () => {
    const $ = parseHtml('<article id="main"><p>x</p></article>');
    expect(serializeHtml($, $('article')[0])).toBe('<article id="main"><p>x</p></article>');
  });
});
