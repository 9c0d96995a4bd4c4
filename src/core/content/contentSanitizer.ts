import type * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { MEDIA_TAGS } from './selectors';
import { findElements, findFirstElement, getAttribute, hasVisibleText } from './domUtils';

export interface SanitizeStats {
  promotedSources: number;
  removedImages: number;
  removedLinks: number;
  removedBlocks: number;
}

const LAZY_SOURCE_ATTRIBUTES = ['data-src', 'data-lazy-src', 'data-original'] as const;

const TRACKING_FILENAMES = [
  '/pixel.gif',
  '/pixel.png',
  '/1x1.gif',
  '/1x1.png',
  '/spacer.gif',
  '/spacer.png',
  '/blank.gif',
  '/blank.png',
];

const TRACKING_HOST_PREFIXES = ['tracking.', 'analytics.', 'metrics.'];

const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  'jpg',
  'jpeg',
  'png',
  'gif',
  'webp',
  'svg',
  'bmp',
  'avif',
  'apng',
  'tiff',
  'jfif',
]);

const EMPTY_BLOCK_TAGS: ReadonlySet<string> = new Set(['p', 'li', 'div']);

export function isUsableImageSource(src: string | undefined): boolean {
  const value = src?.trim();
  if (!value) return false;

  const lower = value.toLowerCase();
  if (TRACKING_FILENAMES.some(pattern => lower.includes(pattern))) return false;

  const schemeEnd = lower.indexOf('://');
  if (schemeEnd !== -1) {
    const hostStart = schemeEnd + 3;
    const pathStart = lower.indexOf('/', hostStart);
    const host = lower.slice(hostStart, pathStart === -1 ? undefined : pathStart);
    if (TRACKING_HOST_PREFIXES.some(prefix => host.startsWith(prefix))) return false;
  }

  if (/^(data:|http|\/\/|\/|\.\/|\.\.\/)/.test(lower)) return true;

  // Bare filenames need an image extension and a basename longer than one
  // character; "t.gif" style beacons fail this
  const filename = lower.split('/').pop() ?? '';
  const dot = filename.lastIndexOf('.');
  if (dot === -1) return false;
  const extension = filename.slice(dot + 1);
  return IMAGE_EXTENSIONS.has(extension) && filename.slice(0, dot).trim().length >= 2;
}

function hasContent(element: Element): boolean {
  return (
    hasVisibleText(element) ||
    findFirstElement(element, node => node !== element && MEDIA_TAGS.has(node.name)) !== undefined
  );
}

/**
 * Removes nodes that would render as nothing: beacon images, links with no
 * text or image, and `p`/`li`/`div` left empty. `root` itself is kept.
 */
export function sanitizeContent($: cheerio.CheerioAPI, root: Element): SanitizeStats {
  const stats: SanitizeStats = {
    promotedSources: 0,
    removedImages: 0,
    removedLinks: 0,
    removedBlocks: 0,
  };

  for (const image of findElements(root, element => element.name === 'img')) {
    if (!getAttribute(image, 'src')?.trim()) {
      const lazy = LAZY_SOURCE_ATTRIBUTES.map(name => getAttribute(image, name)?.trim()).find(Boolean);
      if (lazy) {
        image.attribs.src = lazy;
        stats.promotedSources += 1;
      }
    }
    if (!isUsableImageSource(getAttribute(image, 'src')) && image !== root) {
      $(image).remove();
      stats.removedImages += 1;
    }
  }

  for (const link of findElements(root, element => element.name === 'a')) {
    if (link !== root && !hasContent(link)) {
      $(link).remove();
      stats.removedLinks += 1;
    }
  }

  const blocks = findElements(root, element => EMPTY_BLOCK_TAGS.has(element.name));
  for (let i = blocks.length - 1; i >= 0; i--) {
    const block = blocks[i];
    if (block !== root && !hasContent(block)) {
      $(block).remove();
      stats.removedBlocks += 1;
    }
  }

  return stats;
}
