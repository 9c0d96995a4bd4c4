import type * as cheerio from 'cheerio';
import { isDocument, isTag, isText } from 'domhandler';
import type { AnyNode, Element } from 'domhandler';

export function countTextCharacters(root: AnyNode): number {
  let total = 0;
  const stack: AnyNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;
    if (isText(node)) total += node.data.length;
    if (isTag(node) || isDocument(node)) {
      for (const child of node.children) stack.push(child);
    }
  }
  return total;
}

function cutAtWordBoundary(text: string, limit: number): string {
  if (limit <= 0) return '';
  if (text.length <= limit) return text;
  if (/\s/.test(text.charAt(limit))) return text.slice(0, limit);
  const head = text.slice(0, limit);
  const boundary = head.search(/\s\S*$/);
  return boundary > 0 ? head.slice(0, boundary) : '';
}

/**
 * Keeps the first `budget` text characters of `root` in document order and
 * removes everything after the cut. Elements before the cut survive even
 * when they carry no text. Returns whether anything was removed.
 */
export function trimTreeToTextBudget($: cheerio.CheerioAPI, root: Element, budget: number): boolean {
  const doomed: AnyNode[] = [];
  let remaining = Math.max(0, budget);
  let exhausted = false;
  const stack: AnyNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;

    if (exhausted) {
      doomed.push(node);
      continue;
    }

    if (isText(node)) {
      if (node.data.length > remaining) {
        node.data = cutAtWordBoundary(node.data, remaining);
        exhausted = true;
      } else {
        remaining -= node.data.length;
      }
      continue;
    }

    if (isTag(node)) {
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push(node.children[i]);
      }
    }
  }

  for (const node of doomed) {
    $(node).remove();
  }
  return exhausted;
}
