import type * as cheerio from 'cheerio';
import { isComment, isDocument, isTag, isText } from 'domhandler';
import type { AnyNode, Element, Text } from 'domhandler';
import type pino from 'pino';
import {
  HIDDEN_SELECTORS,
  MEDIA_TAGS,
  NON_CONTENT_ROLE_SELECTORS,
  NON_CONTENT_TAGS,
  PREFORMATTED_TAGS,
  STRUCTURAL_LEAF_TAGS,
  WRAPPER_TAGS,
} from './selectors';
import { getBody, getDocumentRoot } from './documentParser';
import { normalizeWhitespace, walkElements } from './domUtils';

export interface NormalizationStats {
  removedElements: number;
  removedComments: number;
  mergedTextNodes: number;
  collapsedWrappers: number;
  droppedEmpty: number;
}

const PROTECTED_TAGS: ReadonlySet<string> = new Set(['html', 'head', 'body', 'title']);

/**
 * Strips non-content markup and normalizes the tree in place. Anything not
 * positively identified as noise is kept.
 */
export function normalizeTree($: cheerio.CheerioAPI, logger?: pino.Logger): NormalizationStats {
  const stats: NormalizationStats = {
    removedElements: 0,
    removedComments: 0,
    mergedTextNodes: 0,
    collapsedWrappers: 0,
    droppedEmpty: 0,
  };

  const root = getDocumentRoot($);
  removeNonContent($, root, stats);

  const body = getBody($);
  if (body) {
    normalizeAttributes(body);
    collapseWrappers($, body, stats);
  }

  normalizeText($, root, stats);

  if (body) {
    dropEmptyElements($, body, stats);
  }

  logger?.debug({ event: 'tree_normalized', ...stats }, 'Normalized document tree');
  return stats;
}

function removeNonContent($: cheerio.CheerioAPI, root: AnyNode, stats: NormalizationStats): void {
  const doomed: AnyNode[] = [];
  const stack: AnyNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;
    if (isComment(node)) {
      doomed.push(node);
      stats.removedComments += 1;
      continue;
    }
    if (isTag(node) && NON_CONTENT_TAGS.has(node.name)) {
      doomed.push(node);
      stats.removedElements += 1;
      continue;
    }
    if (isTag(node) || isDocument(node)) {
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push(node.children[i]);
      }
    }
  }

  for (const node of doomed) {
    $(node).remove();
  }

  $(`${NON_CONTENT_ROLE_SELECTORS}, ${HIDDEN_SELECTORS}`).each((_, element) => {
    if (PROTECTED_TAGS.has(element.name) || !element.parent) return;
    $(element).remove();
    stats.removedElements += 1;
  });
}

function normalizeAttributes(body: Element): void {
  walkElements(body, element => {
    for (const name of Object.keys(element.attribs)) {
      if (name.startsWith('on') || name === 'style') {
        delete element.attribs[name];
      } else if (name === 'class' || name === 'id') {
        element.attribs[name] = normalizeWhitespace(element.attribs[name]);
      }
    }
  });
}

/**
 * `<div><div><div>…</div></div></div>` becomes a single div. The innermost
 * wrapper survives; it inherits attributes it lacks and the union of classes.
 */
function collapseWrappers($: cheerio.CheerioAPI, body: Element, stats: NormalizationStats): void {
  const stack: Element[] = [body];

  while (stack.length > 0) {
    let element = stack.pop();
    if (element === undefined) break;

    let inner = WRAPPER_TAGS.has(element.name) ? soleWrapperChild(element) : undefined;
    while (inner) {
      mergeAttributes(element, inner);
      $(element).replaceWith(inner);
      stats.collapsedWrappers += 1;
      element = inner;
      inner = soleWrapperChild(element);
    }

    for (let i = element.children.length - 1; i >= 0; i--) {
      const child = element.children[i];
      if (isTag(child)) stack.push(child);
    }
  }
}

function soleWrapperChild(element: Element): Element | undefined {
  let sole: Element | undefined;
  for (const child of element.children) {
    if (isText(child)) {
      if (/\S/.test(child.data)) return undefined;
      continue;
    }
    if (!isTag(child)) continue;
    if (sole) return undefined;
    sole = child;
  }
  return sole && WRAPPER_TAGS.has(sole.name) ? sole : undefined;
}

function mergeAttributes(outer: Element, inner: Element): void {
  for (const [name, value] of Object.entries(outer.attribs)) {
    if (name === 'class') {
      const classes = new Set(`${value} ${inner.attribs.class ?? ''}`.split(' ').filter(Boolean));
      inner.attribs.class = Array.from(classes).join(' ');
    } else if (!(name in inner.attribs)) {
      inner.attribs[name] = value;
    }
  }
}

function normalizeText($: cheerio.CheerioAPI, root: AnyNode, stats: NormalizationStats): void {
  const stack: Array<{ node: AnyNode; preformatted: boolean }> = [{ node: root, preformatted: false }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (frame === undefined) break;
    const { node } = frame;
    if (!isTag(node) && !isDocument(node)) continue;

    const preformatted = frame.preformatted || (isTag(node) && PREFORMATTED_TAGS.has(node.name));
    const merged: Text[] = [];
    let previousText: Text | undefined;

    for (const child of node.children) {
      if (isText(child)) {
        if (previousText) {
          previousText.data += child.data;
          merged.push(child);
          continue;
        }
        previousText = child;
        continue;
      }
      previousText = undefined;
    }

    for (const child of merged) {
      $(child).remove();
      stats.mergedTextNodes += 1;
    }

    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (isText(child)) {
        if (!preformatted) child.data = child.data.replace(/\s+/g, ' ');
      } else {
        stack.push({ node: child, preformatted });
      }
    }
  }
}

/**
 * Removes elements left without text or media, children before parents so
 * emptiness cascades upwards. Table cells and line breaks are never removed
 * on their own but do not make a parent worth keeping.
 */
function dropEmptyElements($: cheerio.CheerioAPI, body: Element, stats: NormalizationStats): void {
  const ordered: Element[] = [];
  walkElements(body, element => ordered.push(element));

  const contentful = new Set<Element>();
  for (let i = ordered.length - 1; i >= 0; i--) {
    const element = ordered[i];
    if (MEDIA_TAGS.has(element.name) || hasContentfulChild(element, contentful)) {
      contentful.add(element);
      continue;
    }
    if (element === body || STRUCTURAL_LEAF_TAGS.has(element.name)) continue;
    $(element).remove();
    stats.droppedEmpty += 1;
  }
}

function hasContentfulChild(element: Element, contentful: ReadonlySet<Element>): boolean {
  return element.children.some(
    child => (isText(child) && /\S/.test(child.data)) || (isTag(child) && contentful.has(child))
  );
}
