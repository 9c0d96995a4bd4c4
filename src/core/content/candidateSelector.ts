import type { AnyNode, Element } from 'domhandler';
import type pino from 'pino';
import { SCORING } from '../../config/constants';
import { collectVisibleText, countWords, findFirstElement } from './domUtils';
import type { CandidateScore, ExtractionOptions, ScoreTable } from './types/extraction';

export type SelectionReason = 'best-candidate' | 'body-fallback' | 'low-content';

export interface CandidateSelection {
  element: Element;
  reason: SelectionReason;
  /** Absent when the body was used without ever being scored */
  score?: Readonly<CandidateScore>;
  wordCount: number;
  warnings: string[];
}

/**
 * Orders candidates best first: higher total, then more text, then earlier
 * in the document. Never returns 0 for two distinct candidates.
 */
export function compareCandidates(a: Readonly<CandidateScore>, b: Readonly<CandidateScore>): number {
  if (a.total !== b.total) return b.total - a.total;
  if (a.textLength !== b.textLength) return b.textLength - a.textLength;
  return a.order - b.order;
}

export function pickBestCandidate(
  scores: ScoreTable
): { element: Element; score: Readonly<CandidateScore> } | undefined {
  let best: { element: Element; score: Readonly<CandidateScore> } | undefined;
  for (const [element, score] of scores) {
    if (!best || compareCandidates(score, best.score) < 0) {
      best = { element, score };
    }
  }
  return best;
}

/**
 * Picks the article root. A weak winner falls back to `<body>` once; if the
 * body is also too short the best effort is returned with a low-content
 * warning. Returns undefined only when there is nothing to select at all.
 */
export function selectCandidate(
  root: AnyNode,
  scores: ScoreTable,
  options: Pick<ExtractionOptions, 'minWordCount'>,
  logger?: pino.Logger
): CandidateSelection | undefined {
  const best = pickBestCandidate(scores);

  if (
    best &&
    best.score.total >= SCORING.MIN_SCORE_FLOOR &&
    best.score.wordCount >= options.minWordCount
  ) {
    logger?.debug(
      {
        event: 'candidate_selected',
        tag: best.element.name,
        total: best.score.total,
        wordCount: best.score.wordCount,
      },
      'Selected best candidate'
    );
    return {
      element: best.element,
      reason: 'best-candidate',
      score: best.score,
      wordCount: best.score.wordCount,
      warnings: [],
    };
  }

  const body = findFirstElement(root, element => element.name === 'body');
  const bodyWords = body ? countWords(collectVisibleText(body)) : 0;

  if (body && bodyWords >= options.minWordCount) {
    logger?.debug(
      { event: 'candidate_selected', tag: 'body', wordCount: bodyWords, bestTotal: best?.score.total },
      'Falling back to document body'
    );
    return { element: body, reason: 'body-fallback', score: scores.get(body), wordCount: bodyWords, warnings: [] };
  }

  const fallback = best?.element ?? body;
  if (!fallback) {
    logger?.warn({ event: 'no_candidate' }, 'Document has neither candidates nor a body');
    return undefined;
  }

  const wordCount = Math.max(bodyWords, best?.score.wordCount ?? 0);
  const warning = `Low content: ${wordCount} words found (minimum ${options.minWordCount})`;
  logger?.info({ event: 'low_content', wordCount, minWordCount: options.minWordCount }, warning);

  return {
    element: fallback,
    reason: 'low-content',
    score: best?.score,
    wordCount,
    warnings: [warning],
  };
}
