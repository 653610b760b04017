// ═══════════════════════════════════════════════════════════════════════════════
// OVERLAP TESTS — Length/Score Resolver vs Confidence Sweep
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import {
  LengthScoreOverlapResolver,
  ConfidenceSweepOverlapResolver,
  overlapsSignificantly,
} from '../overlap.js';

interface TestSpan {
  start: number;
  end: number;
  score: number;
  id: string;
}

function span(id: string, start: number, end: number, score: number): TestSpan {
  return { id, start, end, score };
}

const ids = (spans: TestSpan[]) => spans.map(s => s.id);

describe('LengthScoreOverlapResolver', () => {
  const resolver = new LengthScoreOverlapResolver();

  it('should keep the longer span when lengths differ a lot', () => {
    const result = resolver.resolve([span('short', 2, 8, 0.99), span('long', 0, 10, 0.9)]);
    expect(ids(result)).toEqual(['long']);
  });

  it('should prefer the higher score for comparable lengths', () => {
    const result = resolver.resolve([span('a', 0, 10, 0.8), span('b', 1, 10, 0.95)]);
    expect(ids(result)).toEqual(['b']);
  });

  it('should keep the existing span on a score tie', () => {
    const result = resolver.resolve([span('first', 0, 5, 0.9), span('second', 0, 5, 0.9)]);
    expect(ids(result)).toEqual(['first']);
  });

  it('should keep spans whose overlap is at most half of the shorter', () => {
    const result = resolver.resolve([span('b', 8, 20, 0.9), span('a', 0, 10, 0.9)]);
    expect(ids(result)).toEqual(['a', 'b']);
  });

  it('should reject a candidate that loses to any span it overlaps', () => {
    const result = resolver.resolve([
      span('a', 0, 10, 0.9),
      span('b', 5, 15, 0.995),
      span('c', 5, 13, 0.99),
    ]);
    expect(ids(result)).toEqual(['a', 'b']);
  });

  it('should replace every span a candidate beats', () => {
    const result = resolver.resolve([
      span('a', 0, 10, 0.9),
      span('b', 5, 15, 0.9),
      span('c', 5, 13, 0.99),
    ]);
    expect(ids(result)).toEqual(['c']);
  });

  it('should never leave two significantly overlapping spans', () => {
    let seed = 7;
    const next = (max: number) => {
      seed = (seed * 16807) % 2147483647;
      return seed % max;
    };

    for (let round = 0; round < 50; round++) {
      const spans: TestSpan[] = [];
      for (let i = 0; i < 12; i++) {
        const start = next(60);
        spans.push(span(`${round}-${i}`, start, start + 1 + next(15), next(100) / 100));
      }

      const result = resolver.resolve(spans);
      for (let i = 0; i < result.length; i++) {
        for (let j = i + 1; j < result.length; j++) {
          const a = result[i];
          const b = result[j];
          if (a && b) {
            expect(overlapsSignificantly(a, b)).toBe(false);
          }
        }
      }
    }
  });

  it('should sort output by start then score', () => {
    const result = resolver.resolve([span('late', 20, 25, 0.5), span('early', 0, 4, 0.5)]);
    expect(ids(result)).toEqual(['early', 'late']);
  });
});

describe('ConfidenceSweepOverlapResolver', () => {
  const resolver = new ConfidenceSweepOverlapResolver();
  const input = () => [
    span('a', 0, 5, 0.8),
    span('b', 0, 8, 0.95),
    span('c', 6, 10, 0.9),
    span('d', 8, 12, 0.5),
  ];

  it('should keep matches left to right, highest confidence first', () => {
    expect(ids(resolver.resolve(input()))).toEqual(['b', 'd']);
  });

  it('should differ from the length/score strategy on the same input', () => {
    expect(ids(new LengthScoreOverlapResolver().resolve(input()))).toEqual(['b', 'c', 'd']);
  });

  it('should return an empty list for no input', () => {
    expect(resolver.resolve([])).toEqual([]);
  });
});
