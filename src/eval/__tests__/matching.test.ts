// ═══════════════════════════════════════════════════════════════════════════════
// MATCHING TESTS — Span Metrics, Match Modes, Greedy Alignment
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import {
  computeMatchScore,
  computeSpanMetrics,
  matchEntities,
  relaxedMatch,
  strictMatch,
} from '../matching.js';
import type { GoldEntity, Located, PredEntity } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// FIXTURES
// ─────────────────────────────────────────────────────────────────────────────────

function gold(start: number, end: number, type = 'SYMPTOM'): Located<GoldEntity> {
  return { start, end, text: '', type, assertion: null, notes: null };
}

function pred(start: number, end: number, type = 'SYMPTOM'): Located<PredEntity> {
  return { start, end, text: '', type, assertion: null, score: 0.9, evidence: null };
}

// ─────────────────────────────────────────────────────────────────────────────────
// SPAN METRICS
// ─────────────────────────────────────────────────────────────────────────────────

describe('computeSpanMetrics', () => {
  it('should compute IoU, min coverage and containment', () => {
    const metrics = computeSpanMetrics({ start: 0, end: 8 }, { start: 0, end: 15 });
    expect(metrics.intersection).toBe(8);
    expect(metrics.iou).toBeCloseTo(8 / 15, 10);
    expect(metrics.minCov).toBe(1);
    expect(metrics.isContainment).toBe(true);
  });

  it('should report zero overlap for disjoint spans', () => {
    const metrics = computeSpanMetrics({ start: 0, end: 5 }, { start: 5, end: 9 });
    expect(metrics).toEqual({ iou: 0, minCov: 0, intersection: 0, isContainment: false });
  });

  it('should score partial overlap without containment', () => {
    const metrics = computeSpanMetrics({ start: 5, end: 20 }, { start: 0, end: 10 });
    expect(metrics.intersection).toBe(5);
    expect(metrics.iou).toBe(0.25);
    expect(metrics.minCov).toBe(0.5);
    expect(metrics.isContainment).toBe(false);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// PAIR PREDICATES
// ─────────────────────────────────────────────────────────────────────────────────

describe('strictMatch', () => {
  it('should require identical offsets and type', () => {
    expect(strictMatch(gold(3, 9), pred(3, 9))).toBe(true);
    expect(strictMatch(gold(3, 9), pred(3, 10))).toBe(false);
    expect(strictMatch(gold(3, 9), pred(3, 9, 'PROBLEM'))).toBe(false);
  });

  it('should agree with relaxed matching on identical spans', () => {
    expect(relaxedMatch(gold(3, 9), pred(3, 9), 1.0, 'iou')).toEqual({ matched: true, reason: 'iou' });
    expect(relaxedMatch(gold(3, 9), pred(3, 9), 0.5, 'iou_or_min_cov_or_containment')).toEqual({
      matched: true,
      reason: 'iou',
    });
  });
});

describe('relaxedMatch', () => {
  it('should attribute a contained prediction to containment in containment modes', () => {
    expect(relaxedMatch(gold(0, 15), pred(0, 8), 0.5, 'iou_or_containment')).toEqual({
      matched: true,
      reason: 'containment',
    });
    expect(relaxedMatch(gold(0, 15), pred(0, 8), 0.5, 'iou_or_min_cov_or_containment')).toEqual({
      matched: true,
      reason: 'containment',
    });
  });

  it('should attribute the same pair to IoU in IoU-only modes', () => {
    expect(relaxedMatch(gold(0, 15), pred(0, 8), 0.5, 'iou')).toEqual({ matched: true, reason: 'iou' });
    expect(relaxedMatch(gold(0, 15), pred(0, 8), 0.5, 'iou_or_min_cov')).toEqual({
      matched: true,
      reason: 'iou',
    });
  });

  it('should match any containment regardless of length ratio', () => {
    expect(relaxedMatch(gold(0, 100), pred(10, 12), 0.5, 'iou_or_min_cov_or_containment')).toEqual({
      matched: true,
      reason: 'containment',
    });
    expect(relaxedMatch(gold(10, 12), pred(0, 100), 0.5, 'iou_or_containment')).toEqual({
      matched: true,
      reason: 'containment',
    });
    expect(relaxedMatch(gold(0, 100), pred(10, 12), 0.5, 'iou')).toEqual({ matched: false, reason: null });
    expect(relaxedMatch(gold(0, 100), pred(10, 12), 0.5, 'iou_or_min_cov')).toEqual({
      matched: true,
      reason: 'min_cov',
    });
  });

  it('should fall back to min coverage for partial overlap', () => {
    expect(relaxedMatch(gold(0, 10), pred(5, 20), 0.5, 'iou_or_min_cov')).toEqual({
      matched: true,
      reason: 'min_cov',
    });
    expect(relaxedMatch(gold(0, 10), pred(5, 20), 0.5, 'iou')).toEqual({ matched: false, reason: null });
    expect(relaxedMatch(gold(0, 10), pred(5, 20), 0.5, 'iou_or_containment')).toEqual({
      matched: false,
      reason: null,
    });
  });

  it('should never match across types', () => {
    expect(relaxedMatch(gold(0, 10), pred(0, 10, 'TEST'), 0.5, 'iou_or_min_cov_or_containment')).toEqual({
      matched: false,
      reason: null,
    });
  });

  it('should default to IoU with a 0.5 threshold', () => {
    expect(relaxedMatch(gold(0, 10), pred(0, 5))).toEqual({ matched: true, reason: 'iou' });
    expect(relaxedMatch(gold(0, 10), pred(0, 4))).toEqual({ matched: false, reason: null });
  });
});

describe('computeMatchScore', () => {
  it('should combine the best ratio, intersection and start distance', () => {
    expect(computeMatchScore(gold(0, 10), pred(2, 10))).toEqual({
      primaryScore: 1,
      intersection: 8,
      startDistance: 2,
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// MATCHING
// ─────────────────────────────────────────────────────────────────────────────────

describe('matchEntities', () => {
  it('should pair exact spans in strict mode', () => {
    const result = matchEntities([gold(0, 5), gold(10, 15)], [pred(10, 15), pred(0, 5), pred(20, 25)]);

    expect(result.matched).toHaveLength(2);
    expect(result.matched.map(m => [m.gold.start, m.pred.start])).toEqual([[0, 0], [10, 10]]);
    expect(result.matched.every(m => m.matchType === 'strict' && m.matchReason === null)).toBe(true);
    expect(result.unmatchedGold).toEqual([]);
    expect(result.unmatchedPred).toEqual([pred(20, 25)]);
  });

  it('should not count overlap as a strict match', () => {
    const result = matchEntities([gold(0, 15)], [pred(0, 8)]);
    expect(result.matched).toEqual([]);
    expect(result.unmatchedGold).toEqual([gold(0, 15)]);
    expect(result.unmatchedPred).toEqual([pred(0, 8)]);
  });

  it('should prefer the larger intersection when primary scores tie', () => {
    const result = matchEntities([gold(0, 10)], [pred(0, 6), pred(2, 10)], { relaxed: true });

    expect(result.matched).toHaveLength(1);
    expect(result.matched[0]?.pred.start).toBe(2);
    expect(result.matched[0]?.matchType).toBe('relaxed');
    expect(result.unmatchedPred).toEqual([pred(0, 6)]);
  });

  it('should prefer the closer start when score and intersection tie', () => {
    const result = matchEntities([gold(5, 10)], [pred(0, 10), pred(5, 15)], { relaxed: true });
    expect(result.matched[0]?.pred.start).toBe(5);
  });

  it('should keep the earlier prediction on a full tie', () => {
    const first = { ...pred(0, 10), score: 0.5 };
    const second = { ...pred(0, 10), score: 0.7 };
    const result = matchEntities([gold(0, 10)], [first, second], { relaxed: true });
    expect(result.matched[0]?.pred.score).toBe(0.5);
  });

  it('should match one-to-one, greedily in gold order', () => {
    const shorter = gold(0, 8);
    const exact = gold(0, 10);

    const forward = matchEntities([shorter, exact], [pred(0, 10)], { relaxed: true });
    expect(forward.matched[0]?.gold).toBe(shorter);
    expect(forward.unmatchedGold).toEqual([exact]);

    const reversed = matchEntities([exact, shorter], [pred(0, 10)], { relaxed: true });
    expect(reversed.matched[0]?.gold).toBe(exact);
    expect(reversed.unmatchedGold).toEqual([shorter]);
  });

  it('should record the reason of each relaxed match', () => {
    const result = matchEntities([gold(0, 15), gold(20, 30)], [pred(0, 8), pred(25, 40)], {
      relaxed: true,
      matchMode: 'iou_or_min_cov_or_containment',
    });
    expect(result.matched.map(m => m.matchReason)).toEqual(['containment', 'min_cov']);
  });
});
