import { describe, test, expect, jest, afterEach } from '@jest/globals';
import { readFileSync } from 'fs';
import { join } from 'path';
import { handleExtractArticle } from '../../../src/handlers/extractArticle';
import * as extractor from '../../../src/core/content/htmlContentExtractor';
import { createChildLogger } from '../../../src/utils/logger';
import type { HandlerContext } from '../../../src/mcp/mcpServer';

const ARTICLE = readFileSync(join(__dirname, '../../fixtures/article.html'), 'utf8');
const PAGE_URL = 'https://example.com/garden/tomatoes';

describe('Extract Article Handler', () => {
  const logger = createChildLogger('test');
  const noCache = { cache: null };

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('returns every result field as JSON by default', async () => {
    const result = await handleExtractArticle({ html: ARTICLE, url: PAGE_URL, minWordCount: 50 }, logger, undefined, noCache);
    const parsed = JSON.parse(result.content[0].text);

    expect(result.isError).toBeUndefined();
    expect(parsed.success).toBe(true);
    expect(parsed.error).toBeNull();
    expect(parsed.title).toBe('Growing Tomatoes on a Balcony');
    expect(parsed.author).toBe('Robin Gardener');
    expect(parsed.date_published).toBe('2024-04-02T08:30:00Z');
    expect(parsed.language).toBe('en');
    expect(parsed.url).toBe(PAGE_URL);
    expect(parsed.warnings).toEqual([]);
    expect(parsed.content).toContain('src="https://example.com/images/balcony-tomatoes.jpg"');
    expect(parsed.content).not.toContain('Related one');
    expect(parsed.content).not.toContain('Copyright notice');
  });

  test('returns the Markdown body when asked for markdown', async () => {
    const result = await handleExtractArticle(
      { html: ARTICLE, url: PAGE_URL, format: 'markdown', minWordCount: 50 },
      logger,
      undefined,
      noCache
    );
    const lines = result.content[0].text.split('\n');

    expect(lines[0]).toBe('# Growing Tomatoes on a Balcony');
    expect(lines).toContain('## Containers and soil');
    expect(result.content[0].text).toContain('[our feeding guide](https://example.com/guides/feeding)');
  });

  test('returns a short summary when asked for text', async () => {
    const result = await handleExtractArticle(
      { html: ARTICLE, format: 'text', minWordCount: 50 },
      logger,
      undefined,
      noCache
    );
    const lines = result.content[0].text.split('\n');

    expect(lines[0]).toBe('Title: Growing Tomatoes on a Balcony');
    expect(lines[1]).toBe('Author: Robin Gardener');
    expect(lines[2]).toMatch(/^Words: \d+$/);
    expect(lines[3]).toBe('');
    expect(lines[4].startsWith('Growing Tomatoes on a Balcony By Robin Gardener Tomatoes need')).toBe(true);
  });

  test('passes option overrides through to the extractor', async () => {
    const result = await handleExtractArticle(
      { html: ARTICLE, url: PAGE_URL, includeImages: false, minWordCount: 50 },
      logger,
      undefined,
      noCache
    );
    const parsed = JSON.parse(result.content[0].text);
    expect(parsed.content).not.toContain('<img');
  });

  test('reports progress', async () => {
    const sendProgress = jest.fn<HandlerContext['sendProgress']>().mockResolvedValue(undefined);
    await handleExtractArticle({ html: ARTICLE, minWordCount: 50 }, logger, { progressToken: 't', sendProgress }, noCache);

    expect(sendProgress).toHaveBeenNthCalledWith(1, 0, 100, 'Extracting article...');
    expect(sendProgress).toHaveBeenNthCalledWith(2, 100, 100, 'Extraction complete');
  });

  test('rejects input without html', async () => {
    await expect(handleExtractArticle({ url: PAGE_URL }, logger, undefined, noCache)).rejects.toThrow(
      'Validation error: html'
    );
  });

  test('rejects an unknown format', async () => {
    await expect(
      handleExtractArticle({ html: ARTICLE, format: 'pdf' }, logger, undefined, noCache)
    ).rejects.toThrow('Validation error: format');
  });

  describe('when extraction fails', () => {
    const failure = {
      url: '',
      title: '',
      content: '',
      markdown: '',
      excerpt: '',
      wordCount: 0,
      success: false,
      error: 'No content candidates found in document',
      warnings: [],
    };

    test('flags the JSON result as an error', async () => {
      jest.spyOn(extractor, 'extractArticle').mockResolvedValue(failure);
      const result = await handleExtractArticle({ html: '<p>x</p>' }, logger, undefined, noCache);

      expect(result.isError).toBe(true);
      expect(JSON.parse(result.content[0].text).error).toBe('No content candidates found in document');
    });

    test('throws for non-JSON formats', async () => {
      jest.spyOn(extractor, 'extractArticle').mockResolvedValue(failure);
      await expect(
        handleExtractArticle({ html: '<p>x</p>', format: 'markdown' }, logger, undefined, noCache)
      ).rejects.toThrow('Content extraction failed: No content candidates found in document');
    });
  });
});
