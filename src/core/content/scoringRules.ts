import type { Element } from 'domhandler';
import { getClassAndId } from './domUtils';

export interface ScoringRule {
  readonly name: string;
  readonly pattern: RegExp;
  readonly delta: number;
}

export interface ClassWeight {
  weight: number;
  matched: string[];
}

const POSITIVE_DELTA = 25;
const NEGATIVE_DELTA = -25;

// Short words only count as whole tokens of the class/id string, so that
// "header" is not an ad and "domain" is not main content
const token = (alternatives: string): RegExp =>
  new RegExp(`(?:^|[\\s_-])(?:${alternatives})(?:$|[\\s_-])`);

export const TAG_BONUS: ReadonlyMap<string, number> = new Map([
  ['article', 25],
  ['main', 20],
  ['section', 8],
  ['pre', 3],
  ['blockquote', 3],
]);

export const SCORING_RULES: readonly ScoringRule[] = [
  { name: 'article', pattern: /article/, delta: POSITIVE_DELTA },
  { name: 'content', pattern: /content/, delta: POSITIVE_DELTA },
  { name: 'main', pattern: token('main'), delta: POSITIVE_DELTA },
  { name: 'entry', pattern: /entry/, delta: POSITIVE_DELTA },
  { name: 'post', pattern: token('post|posts'), delta: POSITIVE_DELTA },
  { name: 'story', pattern: /story/, delta: POSITIVE_DELTA },
  { name: 'body', pattern: token('body'), delta: POSITIVE_DELTA },
  { name: 'text', pattern: token('text'), delta: POSITIVE_DELTA },
  { name: 'prose', pattern: /prose/, delta: POSITIVE_DELTA },

  { name: 'comment', pattern: /comment/, delta: NEGATIVE_DELTA },
  { name: 'sidebar', pattern: /sidebar/, delta: NEGATIVE_DELTA },
  { name: 'footer', pattern: /footer/, delta: NEGATIVE_DELTA },
  { name: 'ad', pattern: token('ad|ads|advert\\w*'), delta: NEGATIVE_DELTA },
  { name: 'banner', pattern: /banner/, delta: NEGATIVE_DELTA },
  { name: 'sponsor', pattern: /sponsor/, delta: NEGATIVE_DELTA },
  { name: 'promo', pattern: /promo/, delta: NEGATIVE_DELTA },
  { name: 'related', pattern: /related/, delta: NEGATIVE_DELTA },
  { name: 'share', pattern: /share/, delta: NEGATIVE_DELTA },
  { name: 'social', pattern: /social/, delta: NEGATIVE_DELTA },
  { name: 'menu', pattern: token('menu'), delta: NEGATIVE_DELTA },
  { name: 'nav', pattern: token('nav|navbar|navigation'), delta: NEGATIVE_DELTA },
  { name: 'widget', pattern: /widget/, delta: NEGATIVE_DELTA },
  { name: 'cookie', pattern: /cookie/, delta: NEGATIVE_DELTA },
  { name: 'popup', pattern: /popup/, delta: NEGATIVE_DELTA },
  { name: 'modal', pattern: /modal/, delta: NEGATIVE_DELTA },
  { name: 'breadcrumb', pattern: /breadcrumb/, delta: NEGATIVE_DELTA },
  { name: 'newsletter', pattern: /newsletter/, delta: NEGATIVE_DELTA },
  { name: 'subscribe', pattern: /subscribe/, delta: NEGATIVE_DELTA },
  { name: 'masthead', pattern: /masthead/, delta: NEGATIVE_DELTA },
];

/** Sums the deltas of every rule matching `classAndId`; each rule counts once. */
export function scoreClassAndId(
  classAndId: string,
  rules: readonly ScoringRule[] = SCORING_RULES
): ClassWeight {
  const result: ClassWeight = { weight: 0, matched: [] };
  if (!classAndId) return result;

  for (const rule of rules) {
    if (rule.pattern.test(classAndId)) {
      result.weight += rule.delta;
      result.matched.push(rule.name);
    }
  }
  return result;
}

export function getClassWeight(element: Element): number {
  return scoreClassAndId(getClassAndId(element)).weight;
}

export function getTagBonus(tagName: string): number {
  return TAG_BONUS.get(tagName) ?? 0;
}

/** Tag bonus, with `role="main"` earning the same bonus as a `<main>` element. */
export function getSemanticBonus(element: Element): number {
  const tagBonus = getTagBonus(element.name);
  if (element.attribs.role?.trim().toLowerCase() !== 'main') return tagBonus;
  return Math.max(tagBonus, getTagBonus('main'));
}
