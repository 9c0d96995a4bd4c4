import { describe, test, expect } from '@jest/globals';
import { MarkdownConverter } from '../../../../../src/core/content/serializers/markdownConverter';

describe('MarkdownConverter', () => {
  const converter = new MarkdownConverter();

  test('renders ATX headings on a single line', () => {
    expect(converter.convertToMarkdown('<h1>Title <em>here</em></h1><p>Para</p>')).toBe('# Title *here*\n\nPara');
  });

  test('fences code with the declared language', () => {
    expect(converter.convertToMarkdown('<pre><code class="language-ts">const a = 1;\n</code></pre>')).toBe(
      '```ts\nconst a = 1;\n```'
    );
    expect(converter.convertToMarkdown('<pre class="lang-python">print(1)</pre>')).toBe('```python\nprint(1)\n```');
  });

  test('uses a fence longer than any backtick run in the code', () => {
    expect(converter.convertToMarkdown('<pre>a ``` b</pre>')).toBe('````\na ``` b\n````');
  });

  test('renders GFM tables and strikethrough', () => {
    const markdown = converter.convertToMarkdown(
      '<table><thead><tr><th>A</th><th>B</th></tr></thead><tbody><tr><td>1</td><td>2</td></tr></tbody></table>'
    );
    expect(markdown.split('\n')).toEqual(['| A | B |', '| --- | --- |', '| 1 | 2 |']);
    expect(converter.convertToMarkdown('<p><del>old</del> new</p>')).toBe('~old~ new');
  });

  test('renders links, images and lists', () => {
    expect(converter.convertToMarkdown('<p><a href="https://example.com/">Example</a></p>')).toBe(
      '[Example](https://example.com/)'
    );
    expect(converter.convertToMarkdown('<img src="https://example.com/a.png" alt="Alt">')).toBe(
      '![Alt](https://example.com/a.png)'
    );
    expect(converter.convertToMarkdown('<ul><li>One</li><li>Two</li></ul>')).toMatch(/^-\s+One\n-\s+Two$/);
  });

  test('prefixes every blockquote line', () => {
    expect(converter.convertToMarkdown('<blockquote><p>Quoted</p><p>Two</p></blockquote>')).toBe(
      '> Quoted\n> \n> Two'
    );
  });

  test('is deterministic', () => {
    const html = '<h2>A</h2><p>Some <strong>text</strong>, with <code>code</code>.</p><ol><li>x</li></ol>';
    expect(converter.convertToMarkdown(html)).toBe(converter.convertToMarkdown(html));
  });

  test('returns an empty string for empty input', () => {
    expect(converter.convertToMarkdown('')).toBe('');
  });
});
