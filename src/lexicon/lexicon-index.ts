// ═══════════════════════════════════════════════════════════════════════════════
// LEXICON INDEX — Normalized Token Index for Candidate Generation
// ═══════════════════════════════════════════════════════════════════════════════
//
// Built once from an ordered term list and shared read-only by every document.
// Lookups never mutate the index.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { boundedPattern, escapeRegExp, normalizeForMatch, tokenize } from '../text/index.js';
import type { LexiconEntry, LexiconTerm, MatchCandidate, CandidateMatchType } from './types.js';

function toCandidate(
  entry: LexiconEntry,
  matchType: CandidateMatchType,
  position?: number
): MatchCandidate {
  return {
    term: entry.originalTerm,
    entityType: entry.entityType,
    normalizedTerm: entry.normalizedTerm,
    tokens: entry.tokens,
    matchType,
    ...(position !== undefined ? { position } : {}),
  };
}

export class LexiconIndex {
  private readonly _entries: LexiconEntry[] = [];
  private readonly tokenToEntries = new Map<string, number[]>();
  private readonly singleTokenEntries: LexiconEntry[] = [];
  private readonly multiTokenEntries: LexiconEntry[] = [];
  private readonly boundaryPatterns = new Map<string, RegExp>();

  /**
   * Terms are taken in order; a term whose normalized form is already indexed
   * is skipped, so earlier (higher-priority) terms win.
   */
  constructor(terms: ReadonlyArray<LexiconTerm>) {
    const seen = new Set<string>();

    for (const { term, entityType } of terms) {
      const normalizedTerm = normalizeForMatch(term);
      if (!normalizedTerm || seen.has(normalizedTerm)) continue;
      seen.add(normalizedTerm);

      const entry: LexiconEntry = {
        originalTerm: term,
        normalizedTerm,
        tokens: tokenize(normalizedTerm),
        entityType,
      };

      const idx = this._entries.length;
      this._entries.push(entry);

      for (const token of entry.tokens) {
        const list = this.tokenToEntries.get(token);
        if (list) {
          list.push(idx);
        } else {
          this.tokenToEntries.set(token, [idx]);
        }
      }

      this.boundaryPatterns.set(
        normalizedTerm,
        new RegExp(boundedPattern(escapeRegExp(normalizedTerm)), 'u')
      );
      if (entry.tokens.length === 1) {
        this.singleTokenEntries.push(entry);
      } else {
        this.multiTokenEntries.push(entry);
      }
    }
  }

  get size(): number {
    return this._entries.length;
  }

  get entries(): readonly LexiconEntry[] {
    return this._entries;
  }

  /**
   * First whole-word occurrence of an indexed term in a normalized sentence,
   * or the first plain occurrence when the term never stands alone.
   */
  locate(normalizedTerm: string, sentenceNorm: string): number {
    const match = this.boundaryPatterns.get(normalizedTerm)?.exec(sentenceNorm);
    return match ? match.index : sentenceNorm.indexOf(normalizedTerm);
  }

  /**
   * Exact phrase and whole-token candidates for one normalized sentence.
   */
  findCandidates(sentenceNorm: string, sentenceTokens: readonly string[]): MatchCandidate[] {
    const candidates: MatchCandidate[] = [];
    const exactTerms = new Set<string>();
    const tokenSet = new Set(sentenceTokens);

    // Multi-word phrases present verbatim
    for (const entry of this.multiTokenEntries) {
      if (sentenceNorm.includes(entry.normalizedTerm)) {
        candidates.push(toCandidate(entry, 'exact', this.locate(entry.normalizedTerm, sentenceNorm)));
        exactTerms.add(entry.normalizedTerm);
      }
    }

    // Single-word terms as whole words
    for (const entry of this.singleTokenEntries) {
      if (!tokenSet.has(entry.normalizedTerm)) continue;
      const match = this.boundaryPatterns.get(entry.normalizedTerm)?.exec(sentenceNorm);
      if (match) {
        candidates.push(toCandidate(entry, 'token', match.index));
      }
    }

    // Multi-word terms whose tokens are all present and form the phrase
    for (const entry of this.multiTokenEntries) {
      if (exactTerms.has(entry.normalizedTerm)) continue;
      if (!entry.tokens.every(token => tokenSet.has(token))) continue;
      if (sentenceNorm.includes(entry.normalizedTerm)) {
        candidates.push(toCandidate(entry, 'token', this.locate(entry.normalizedTerm, sentenceNorm)));
      }
    }

    return candidates;
  }

  /**
   * Fuzzy seeds: entries sharing at least one token with the sentence.
   * Only produced when `existing` is empty; scoring is left to the caller.
   */
  findFuzzyCandidates(
    sentenceNorm: string,
    sentenceTokens: readonly string[],
    existing: readonly MatchCandidate[]
  ): MatchCandidate[] {
    if (existing.length > 0) {
      return [];
    }

    const candidates: MatchCandidate[] = [];
    const checked = new Set<number>();

    for (const token of sentenceTokens) {
      for (const idx of this.tokenToEntries.get(token) ?? []) {
        if (checked.has(idx)) continue;
        checked.add(idx);

        const entry = this._entries[idx];
        if (!entry || sentenceNorm.includes(entry.normalizedTerm)) continue;
        candidates.push(toCandidate(entry, 'fuzzy'));
      }
    }

    return candidates;
  }
}
