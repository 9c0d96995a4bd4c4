import { describe, test, expect } from '@jest/globals';
import { parseHtml } from '../../../../src/core/content/documentParser';
import { isUsableImageSource, sanitizeContent } from '../../../../src/core/content/contentSanitizer';

describe('isUsableImageSource', () => {
  test.each([
    'https://cdn.example.com/photo.jpg',
    'data:image/png;base64,AAAA',
    '//cdn.example.com/photo.jpg',
    '/images/a.png',
    './a.png',
    '../x.webp',
    'photo.jpg',
  ])('accepts %s', src => {
    expect(isUsableImageSource(src)).toBe(true);
  });

  test.each([
    'https://example.com/pixel.gif',
    'https://example.com/1x1.png',
    'https://tracking.example.com/img.png',
    'https://analytics.example.com/a.jpg',
    'x.gif',
    'image',
    'readme.txt',
    '   ',
  ])('rejects %s', src => {
    expect(isUsableImageSource(src)).toBe(false);
  });

  test('rejects a missing source', () => {
    expect(isUsableImageSource(undefined)).toBe(false);
  });
});

describe('sanitizeContent', () => {
  test('promotes lazy sources and removes beacons, empty links and empty blocks', () => {
    const $ = parseHtml(
      '<div id="root"><p><img data-src="/lazy.png"></p><p><img src="https://example.com/spacer.gif"></p><a href="/x"></a><a href="/y">Y</a><li> </li><div><p></p></div></div>'
    );

    const stats = sanitizeContent($, $('#root')[0]);

    expect(stats).toEqual({ promotedSources: 1, removedImages: 1, removedLinks: 1, removedBlocks: 4 });
    expect($('img')).toHaveLength(1);
    expect($('img').attr('src')).toBe('/lazy.png');
    expect($('a')).toHaveLength(1);
    expect($('a').text()).toBe('Y');
    expect($('#root p')).toHaveLength(1);
    expect($('li')).toHaveLength(0);
  });

  test('keeps links that wrap an image', () => {
    const $ = parseHtml('<div id="root"><a href="/full.jpg"><img src="/thumb.jpg"></a></div>');
    sanitizeContent($, $('#root')[0]);
    expect($('a img')).toHaveLength(1);
  });

  test('never removes the root, even when it is empty', () => {
    const $ = parseHtml('<div id="root"></div>');
    sanitizeContent($, $('#root')[0]);
    expect($('#root')).toHaveLength(1);
  });
});
