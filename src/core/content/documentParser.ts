import * as cheerio from 'cheerio';
import { cloneNode, isDocument, isTag } from 'domhandler';
import type { AnyNode, Document, Element } from 'domhandler';
import { TreeInvariantError } from './errors';

/**
 * Parses raw HTML into a domhandler tree. parse5 (behind cheerio) always
 * produces html/head/body, whatever the input looks like.
 */
export function parseHtml(html: string): cheerio.CheerioAPI {
  return cheerio.load(html);
}

/** Wraps a pre-parsed tree so the pipeline can query and mutate it. */
export function loadDocument(root: Document): cheerio.CheerioAPI {
  return cheerio.load(root);
}

/**
 * Deep-copies `element` under a fresh document root. Mutations through the
 * returned API never reach the original tree.
 */
export function loadDetachedCopy(element: Element): { $: cheerio.CheerioAPI; root: Element } {
  const root = cloneNode(element, true);
  return { $: cheerio.load(root), root };
}

export function getDocumentRoot($: cheerio.CheerioAPI): Document {
  const root = $.root()[0];
  if (!root || !isDocument(root)) {
    throw new TreeInvariantError('cheerio root is not a document node');
  }
  return root;
}

export function getBody($: cheerio.CheerioAPI): Element | undefined {
  return $('body').first()[0];
}

/**
 * Verifies the parser contract: the tree is acyclic and each child's parent
 * pointer refers back to the node whose `children` list holds it.
 */
export function assertTreeInvariants(root: AnyNode): void {
  const seen = new Set<AnyNode>();
  const stack: AnyNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;
    if (seen.has(node)) {
      throw new TreeInvariantError(`node <${describeNode(node)}> is reachable twice (cycle or shared child)`);
    }
    seen.add(node);

    if (!isTag(node) && !isDocument(node)) continue;
    for (const child of node.children) {
      if (child.parent !== node) {
        throw new TreeInvariantError(
          `child <${describeNode(child)}> of <${describeNode(node)}> has a different parent`
        );
      }
      stack.push(child);
    }
  }
}

function describeNode(node: AnyNode): string {
  if (isTag(node)) return node.name;
  if (isDocument(node)) return '#document';
  return `#${node.type}`;
}
