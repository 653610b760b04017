// ═══════════════════════════════════════════════════════════════════════════════
// EVALUATION MATCHING — Strict and Relaxed Gold/Prediction Alignment
// ═══════════════════════════════════════════════════════════════════════════════
//
// Matching is greedy in gold order: each gold entity takes its best remaining
// prediction and both leave the candidate pool. This is not a maximum-weight
// bipartite matching; a different gold order can produce different pairs.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type {
  EvalEntity,
  GoldEntity,
  Located,
  Match,
  MatchMode,
  MatchOptions,
  MatchReason,
  MatchResult,
  MatchScore,
  PredEntity,
  RelaxedMatchResult,
  SpanMetrics,
} from './types.js';

export const DEFAULT_OVERLAP_THRESHOLD = 0.5;

type Span = Pick<Located<EvalEntity>, 'start' | 'end'>;

// ─────────────────────────────────────────────────────────────────────────────────
// SPAN METRICS
// ─────────────────────────────────────────────────────────────────────────────────

export function computeSpanMetrics(a: Span, b: Span): SpanMetrics {
  const intersection = Math.max(0, Math.min(a.end, b.end) - Math.max(a.start, b.start));
  const lenA = a.end - a.start;
  const lenB = b.end - b.start;

  const union = lenA + lenB - intersection;
  const iou = union > 0 ? intersection / union : 0;

  const minLen = Math.min(lenA, lenB);
  const minCov = minLen > 0 ? intersection / minLen : 0;

  const isContainment =
    intersection > 0 &&
    ((a.start >= b.start && a.end <= b.end) || (b.start >= a.start && b.end <= a.end));

  return { iou, minCov, intersection, isContainment };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PAIR PREDICATES
// ─────────────────────────────────────────────────────────────────────────────────

export function strictMatch(gold: Located<GoldEntity>, pred: Located<PredEntity>): boolean {
  return gold.start === pred.start && gold.end === pred.end && gold.type === pred.type;
}

/**
 * Criteria tried per mode, in order. Proper containment is reported before
 * IoU so a contained prediction is attributed to containment even when its
 * IoU also clears the threshold.
 */
const MODE_CRITERIA: Readonly<Record<MatchMode, readonly MatchReason[]>> = {
  iou: ['iou'],
  iou_or_min_cov: ['iou', 'min_cov'],
  iou_or_containment: ['containment', 'iou'],
  iou_or_min_cov_or_containment: ['containment', 'iou', 'min_cov'],
};

function satisfies(
  reason: MatchReason,
  metrics: SpanMetrics,
  identical: boolean,
  threshold: number
): boolean {
  switch (reason) {
    case 'iou':
      return metrics.iou >= threshold;
    case 'min_cov':
      return metrics.minCov >= threshold;
    case 'containment':
      return metrics.isContainment && !identical;
  }
}

export function relaxedMatch(
  gold: Located<GoldEntity>,
  pred: Located<PredEntity>,
  overlapThreshold: number = DEFAULT_OVERLAP_THRESHOLD,
  matchMode: MatchMode = 'iou'
): RelaxedMatchResult {
  if (gold.type !== pred.type) return { matched: false, reason: null };

  const metrics = computeSpanMetrics(pred, gold);
  const identical = pred.start === gold.start && pred.end === gold.end;

  for (const reason of MODE_CRITERIA[matchMode]) {
    if (satisfies(reason, metrics, identical, overlapThreshold)) {
      return { matched: true, reason };
    }
  }
  return { matched: false, reason: null };
}

export function computeMatchScore(gold: Located<GoldEntity>, pred: Located<PredEntity>): MatchScore {
  const metrics = computeSpanMetrics(pred, gold);
  return {
    primaryScore: Math.max(metrics.iou, metrics.minCov),
    intersection: metrics.intersection,
    startDistance: Math.abs(pred.start - gold.start),
  };
}

/**
 * Lexicographic (primary desc, intersection desc, distance asc).
 */
function isBetterScore(candidate: MatchScore, best: MatchScore): boolean {
  if (candidate.primaryScore !== best.primaryScore) {
    return candidate.primaryScore > best.primaryScore;
  }
  if (candidate.intersection !== best.intersection) {
    return candidate.intersection > best.intersection;
  }
  return candidate.startDistance < best.startDistance;
}

// ─────────────────────────────────────────────────────────────────────────────────
// MATCHING
// ─────────────────────────────────────────────────────────────────────────────────

interface Candidate {
  readonly index: number;
  readonly reason: MatchReason | null;
  readonly score: MatchScore | null;
}

/**
 * One-to-one matching of gold against predictions. Strict mode takes the first
 * exact hit; relaxed mode keeps the best-scoring satisfying prediction, earlier
 * predictions winning exact ties.
 */
export function matchEntities(
  gold: readonly Located<GoldEntity>[],
  pred: readonly Located<PredEntity>[],
  options: MatchOptions = {}
): MatchResult {
  const relaxed = options.relaxed ?? false;
  const threshold = options.overlapThreshold ?? DEFAULT_OVERLAP_THRESHOLD;
  const mode: MatchMode = options.matchMode ?? 'iou';

  const taken = new Set<number>();
  const matched: Match[] = [];
  const unmatchedGold: Located<GoldEntity>[] = [];

  for (const g of gold) {
    let best: Candidate | null = null;

    for (let index = 0; index < pred.length; index++) {
      const p = pred[index];
      if (p === undefined || taken.has(index)) continue;

      if (!relaxed) {
        if (strictMatch(g, p)) {
          best = { index, reason: null, score: null };
          break;
        }
        continue;
      }

      const result = relaxedMatch(g, p, threshold, mode);
      if (!result.matched) continue;

      const score = computeMatchScore(g, p);
      if (best === null || best.score === null || isBetterScore(score, best.score)) {
        best = { index, reason: result.reason, score };
      }
    }

    const bestPred = best === null ? undefined : pred[best.index];
    if (best === null || bestPred === undefined) {
      unmatchedGold.push(g);
      continue;
    }

    taken.add(best.index);
    matched.push({
      gold: g,
      pred: bestPred,
      matchType: relaxed ? 'relaxed' : 'strict',
      matchReason: best.reason,
    });
  }

  const unmatchedPred = pred.filter((_, index) => !taken.has(index));
  return { matched, unmatchedGold, unmatchedPred };
}
