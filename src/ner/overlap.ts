// ═══════════════════════════════════════════════════════════════════════════════
// OVERLAP RESOLUTION — Two Independent Strategies
// ═══════════════════════════════════════════════════════════════════════════════
//
// LengthScoreOverlapResolver:     lexicon matcher: longer span wins, score breaks ties
// ConfidenceSweepOverlapResolver: canonical matcher: left-to-right, confidence first
//
// The two produce different outputs on the same input and are kept separate.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { spanLength, type ScoredSpan } from '../types/entities.js';

export interface OverlapResolver {
  readonly name: string;
  resolve<T extends ScoredSpan>(spans: readonly T[]): T[];
}

export function overlapLength(a: ScoredSpan, b: ScoredSpan): number {
  return Math.max(0, Math.min(a.end, b.end) - Math.max(a.start, b.start));
}

/**
 * Overlap covers more than half of the shorter span.
 */
export function overlapsSignificantly(a: ScoredSpan, b: ScoredSpan): boolean {
  const overlap = overlapLength(a, b);
  return overlap > 0 && overlap > 0.5 * Math.min(spanLength(a), spanLength(b));
}

// ─────────────────────────────────────────────────────────────────────────────────
// LENGTH / SCORE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Candidates are visited by (start asc, length desc, score desc). Against a
 * significantly overlapping accepted span:
 *   - candidate more than 1.2× longer → candidate wins
 *   - candidate less than 0.8× as long → existing wins
 *   - otherwise the strictly higher score wins, ties keep the existing span
 *
 * A candidate replaces accepted spans only if it wins against every one it
 * significantly overlaps; output is sorted by (start asc, score desc).
 */
export class LengthScoreOverlapResolver implements OverlapResolver {
  readonly name = 'length-score';

  constructor(
    private readonly longerRatio: number = 1.2,
    private readonly shorterRatio: number = 0.8
  ) {}

  resolve<T extends ScoredSpan>(spans: readonly T[]): T[] {
    const sorted = [...spans].sort(
      (a, b) => a.start - b.start || spanLength(b) - spanLength(a) || b.score - a.score
    );

    let accepted: T[] = [];

    for (const candidate of sorted) {
      const conflicts = accepted.filter(existing => overlapsSignificantly(candidate, existing));

      if (conflicts.length === 0) {
        accepted.push(candidate);
        continue;
      }

      if (conflicts.every(existing => this.beats(candidate, existing))) {
        accepted = accepted.filter(existing => !conflicts.includes(existing));
        accepted.push(candidate);
      }
    }

    return accepted.sort((a, b) => a.start - b.start || b.score - a.score);
  }

  private beats(candidate: ScoredSpan, existing: ScoredSpan): boolean {
    const candidateLen = spanLength(candidate);
    const existingLen = spanLength(existing);

    if (candidateLen > existingLen * this.longerRatio) return true;
    if (candidateLen < existingLen * this.shorterRatio) return false;
    return candidate.score > existing.score;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIDENCE SWEEP
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Stable sort by (start asc, score desc), then keep a span only if it starts
 * at or after the end of the last kept span.
 */
export class ConfidenceSweepOverlapResolver implements OverlapResolver {
  readonly name = 'confidence-sweep';

  resolve<T extends ScoredSpan>(spans: readonly T[]): T[] {
    const sorted = [...spans].sort((a, b) => a.start - b.start || b.score - a.score);

    const kept: T[] = [];
    let lastEnd = -1;

    for (const span of sorted) {
      if (span.start >= lastEnd) {
        kept.push(span);
        lastEnd = span.end;
      }
    }

    return kept;
  }
}
