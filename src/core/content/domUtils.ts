import { isDocument, isTag, isText } from 'domhandler';
import type { AnyNode, Element } from 'domhandler';
import { BLOCK_TAGS } from './selectors';

const SKIPPED_TEXT_TAGS: ReadonlySet<string> = new Set(['script', 'style', 'noscript', 'template']);
const BLOCK_BOUNDARY = Symbol('block-boundary');

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function countWords(text: string): number {
  let count = 0;
  for (const token of text.split(/\s+/)) {
    if (/[\p{L}\p{N}]/u.test(token)) count += 1;
  }
  return count;
}

/**
 * Pre-order walk over element descendants (root included when it is an
 * element). Iterative, so nesting depth is bounded only by memory.
 */
export function walkElements(root: AnyNode, visit: (element: Element) => void): void {
  const stack: AnyNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;
    if (isTag(node)) visit(node);
    if (isTag(node) || isDocument(node)) {
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push(node.children[i]);
      }
    }
  }
}

export function findElements(root: AnyNode, predicate: (element: Element) => boolean): Element[] {
  const found: Element[] = [];
  walkElements(root, element => {
    if (predicate(element)) found.push(element);
  });
  return found;
}

export function findFirstElement(
  root: AnyNode,
  predicate: (element: Element) => boolean
): Element | undefined {
  const stack: AnyNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;
    if (isTag(node) && predicate(node)) return node;
    if (isTag(node) || isDocument(node)) {
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push(node.children[i]);
      }
    }
  }
  return undefined;
}

/**
 * Flattens a subtree to the text a reader would see: block boundaries become
 * spaces, whitespace runs collapse to one space, and script-like content is
 * skipped.
 */
export function collectVisibleText(root: AnyNode): string {
  const parts: string[] = [];
  const stack: Array<AnyNode | typeof BLOCK_BOUNDARY> = [root];

  while (stack.length > 0) {
    const item = stack.pop();
    if (item === undefined) break;
    if (item === BLOCK_BOUNDARY) {
      parts.push(' ');
      continue;
    }
    if (isText(item)) {
      parts.push(item.data);
      continue;
    }
    if (isTag(item)) {
      if (SKIPPED_TEXT_TAGS.has(item.name)) continue;
      if (BLOCK_TAGS.has(item.name)) {
        parts.push(' ');
        stack.push(BLOCK_BOUNDARY);
      }
    }
    if (isTag(item) || isDocument(item)) {
      for (let i = item.children.length - 1; i >= 0; i--) {
        stack.push(item.children[i]);
      }
    }
  }

  return normalizeWhitespace(parts.join(''));
}

export function hasVisibleText(root: AnyNode): boolean {
  return findTextNode(root, text => /\S/.test(text)) !== undefined;
}

function findTextNode(root: AnyNode, predicate: (text: string) => boolean): string | undefined {
  const stack: AnyNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;
    if (isText(node) && predicate(node.data)) return node.data;
    if (isTag(node) && SKIPPED_TEXT_TAGS.has(node.name)) continue;
    if (isTag(node) || isDocument(node)) {
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push(node.children[i]);
      }
    }
  }
  return undefined;
}

/** Lower-cased `class` and `id` joined, the string the class/id rules match against. */
export function getClassAndId(element: Element): string {
  const className = element.attribs.class ?? '';
  const id = element.attribs.id ?? '';
  return `${className} ${id}`.trim().toLowerCase();
}

export function getAttribute(element: Element, name: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(element.attribs, name)
    ? element.attribs[name]
    : undefined;
}

export function isElementNamed(node: AnyNode | null, names: ReadonlySet<string>): node is Element {
  return node !== null && isTag(node) && names.has(node.name);
}
