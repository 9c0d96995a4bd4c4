import { isTag, isText } from 'domhandler';
import type { AnyNode, Element } from 'domhandler';
import type pino from 'pino';
import { SCORING } from '../../config/constants';
import { CANDIDATE_TAGS } from './selectors';
import { countWords, walkElements } from './domUtils';
import { getClassWeight, getSemanticBonus } from './scoringRules';
import type { CandidateScore, ScoreTable } from './types/extraction';

/** Raw per-subtree measurements, gathered bottom-up before any scoring. */
export interface SubtreeStats {
  textLength: number;
  anchorTextLength: number;
  elementCount: number;
  commaCount: number;
  wordCount: number;
  longParagraphs: number;
}

const IGNORED_SUBTREES: ReadonlySet<string> = new Set(['script', 'style', 'noscript', 'template']);
const PROPAGATION_STOP: ReadonlySet<string> = new Set(['body', 'html']);
const COMMA_PATTERN = /[,，、]/g;

/**
 * Measures every element under `root` in one post-order pass. Elements are
 * collected in document order, then visited in reverse so each child's stats
 * exist before its parent reads them.
 */
export function measureSubtrees(root: AnyNode): Map<Element, SubtreeStats> {
  const ordered: Element[] = [];
  walkElements(root, element => ordered.push(element));

  const stats = new Map<Element, SubtreeStats>();
  for (let i = ordered.length - 1; i >= 0; i--) {
    const element = ordered[i];
    const current: SubtreeStats = {
      textLength: 0,
      anchorTextLength: 0,
      elementCount: 1,
      commaCount: 0,
      wordCount: 0,
      longParagraphs: 0,
    };

    if (!IGNORED_SUBTREES.has(element.name)) {
      for (const child of element.children) {
        if (isText(child)) {
          current.textLength += child.data.length;
          current.commaCount += child.data.match(COMMA_PATTERN)?.length ?? 0;
          current.wordCount += countWords(child.data);
        } else if (isTag(child)) {
          const childStats = stats.get(child);
          if (!childStats) continue;
          current.textLength += childStats.textLength;
          current.anchorTextLength += childStats.anchorTextLength;
          current.elementCount += childStats.elementCount;
          current.commaCount += childStats.commaCount;
          current.wordCount += childStats.wordCount;
          current.longParagraphs += childStats.longParagraphs;
        }
      }
    }

    if (element.name === 'a') {
      current.anchorTextLength = current.textLength;
    }
    if (element.name === 'p' && current.textLength > SCORING.LONG_PARAGRAPH_CHARS) {
      current.longParagraphs += 1;
    }
    stats.set(element, current);
  }

  return stats;
}

export function computeBaseScore(element: Element, measured: SubtreeStats, order: number): CandidateScore {
  const tagBonus = getSemanticBonus(element);
  const classWeight = getClassWeight(element);
  const textDensity = measured.textLength / Math.max(1, measured.elementCount);
  const linkDensity = measured.anchorTextLength / Math.max(1, measured.textLength);
  const paragraphBonus = SCORING.PARAGRAPH_BONUS * measured.longParagraphs;
  const commaBonus = SCORING.COMMA_BONUS * measured.commaCount;

  let base = 0;
  if (measured.textLength > 0) {
    const densityTerm = Math.min(textDensity / SCORING.DENSITY_DIVISOR, SCORING.DENSITY_CAP);
    const lengthBonus = Math.min(
      Math.floor(measured.textLength / SCORING.LENGTH_BONUS_STEP),
      SCORING.LENGTH_BONUS_CAP
    );
    const positive =
      tagBonus + densityTerm + lengthBonus + paragraphBonus + commaBonus + Math.max(0, classWeight);

    let linkFactor = 1 - linkDensity;
    if (linkDensity > SCORING.LINK_DENSITY_THRESHOLD) {
      linkFactor *= SCORING.LINK_DENSITY_PENALTY;
    }
    base = positive * linkFactor + Math.min(0, classWeight);
  }

  return {
    total: base,
    base,
    textDensity,
    linkDensity,
    tagBonus,
    classWeight,
    paragraphBonus,
    commaBonus,
    propagated: 0,
    textLength: measured.textLength,
    wordCount: measured.wordCount,
    order,
  };
}

/**
 * Scores every candidate container under `root` and propagates each base
 * score to the two nearest candidate ancestors. The returned table is not
 * mutated afterwards.
 */
export function scoreCandidates(root: AnyNode, logger?: pino.Logger): ScoreTable {
  const measured = measureSubtrees(root);
  const scores = new Map<Element, CandidateScore>();

  let order = 0;
  walkElements(root, element => {
    const position = order++;
    if (!CANDIDATE_TAGS.has(element.name)) return;
    const elementStats = measured.get(element);
    if (!elementStats) return;
    scores.set(element, computeBaseScore(element, elementStats, position));
  });

  for (const [element, score] of scores) {
    if (score.base === 0) continue;
    const [parent, grandparent] = nearestCandidateAncestors(element, scores);
    if (parent) addPropagated(parent, score.base * SCORING.PARENT_DAMPING);
    if (grandparent) addPropagated(grandparent, score.base * SCORING.GRANDPARENT_DAMPING);
  }

  logger?.debug({ event: 'candidates_scored', candidates: scores.size }, 'Scored candidates');
  return scores;

  function addPropagated(target: CandidateScore, amount: number): void {
    target.propagated += amount;
    target.total = target.base + target.propagated;
  }
}

function nearestCandidateAncestors(
  element: Element,
  scores: ReadonlyMap<Element, CandidateScore>
): CandidateScore[] {
  const found: CandidateScore[] = [];
  let current = element.parent;
  while (current && isTag(current) && !PROPAGATION_STOP.has(current.name) && found.length < 2) {
    const score = scores.get(current);
    if (score) found.push(score);
    current = current.parent;
  }
  return found;
}
