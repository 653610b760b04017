// ═══════════════════════════════════════════════════════════════════════════════
// FUZZY MATCHER — Indel Similarity and Best-Window Partial Ratio
// ═══════════════════════════════════════════════════════════════════════════════

export interface FuzzyMatchOptions {
  /** Minimum similarity (0-100) for `matches`. */
  threshold?: number;
  caseSensitive?: boolean;
}

export const DEFAULT_FUZZY_OPTIONS: Required<FuzzyMatchOptions> = {
  threshold: 90,
  caseSensitive: true,
};

export class FuzzyMatcher {
  private readonly options: Required<FuzzyMatchOptions>;

  constructor(options: FuzzyMatchOptions = {}) {
    this.options = {
      ...DEFAULT_FUZZY_OPTIONS,
      ...options,
    };
  }

  get threshold(): number {
    return this.options.threshold;
  }

  /**
   * Length of the longest common subsequence (two-row DP).
   */
  lcsLength(a: string, b: string): number {
    if (a.length === 0 || b.length === 0) return 0;

    let prev = new Array<number>(b.length + 1).fill(0);
    let curr = new Array<number>(b.length + 1).fill(0);

    for (let i = 1; i <= a.length; i++) {
      const ca = a.charAt(i - 1);
      for (let j = 1; j <= b.length; j++) {
        const diag = prev[j - 1] ?? 0;
        curr[j] = ca === b.charAt(j - 1)
          ? diag + 1
          : Math.max(prev[j] ?? 0, curr[j - 1] ?? 0);
      }
      [prev, curr] = [curr, prev];
    }

    return prev[b.length] ?? 0;
  }

  /**
   * Normalized indel similarity: 100 * 2·LCS / (|a| + |b|).
   */
  ratio(a: string, b: string): number {
    const [x, y] = this.prepare(a, b);
    const total = x.length + y.length;
    if (total === 0) return 100;
    return (200 * this.lcsLength(x, y)) / total;
  }

  /**
   * Best `ratio` of the shorter string against any same-length window of the
   * longer one. Windows hanging off either end are truncated, so a needle that
   * only partly overlaps the haystack edge still scores.
   */
  partialRatio(a: string, b: string): number {
    const [x, y] = this.prepare(a, b);
    const [needle, haystack] = x.length <= y.length ? [x, y] : [y, x];

    if (needle.length === 0) {
      return haystack.length === 0 ? 100 : 0;
    }
    if (haystack.includes(needle)) {
      return 100;
    }

    const m = needle.length;
    let best = 0;

    for (let i = 1 - m; i < haystack.length; i++) {
      const window = haystack.slice(Math.max(0, i), Math.min(haystack.length, i + m));
      const score = (200 * this.lcsLength(needle, window)) / (m + window.length);
      if (score > best) {
        best = score;
        if (best === 100) break;
      }
    }

    return best;
  }

  /**
   * Check if the partial ratio reaches the configured threshold.
   */
  matches(query: string, target: string): boolean {
    return this.partialRatio(query, target) >= this.options.threshold;
  }

  private prepare(a: string, b: string): [string, string] {
    if (this.options.caseSensitive) {
      return [a, b];
    }
    return [a.toLowerCase(), b.toLowerCase()];
  }
}
