// ═══════════════════════════════════════════════════════════════════════════════
// LEXICON TYPES — Terms, Index Entries, Match Candidates
// ═══════════════════════════════════════════════════════════════════════════════

import type { EntityType } from '../types/entities.js';
import type { AppError } from '../types/result.js';

/**
 * Raw (term, type) pair as read from a lexicon file.
 */
export interface LexiconTerm {
  readonly term: string;
  readonly entityType: EntityType;
}

/**
 * Indexed form of a term. Immutable once the index is built.
 */
export interface LexiconEntry {
  readonly originalTerm: string;
  readonly normalizedTerm: string;
  readonly tokens: readonly string[];
  readonly entityType: EntityType;
}

export type CandidateMatchType = 'exact' | 'token' | 'fuzzy';

/**
 * Per-sentence lookup result. Not persisted.
 */
export interface MatchCandidate {
  readonly term: string;
  readonly entityType: EntityType;
  readonly normalizedTerm: string;
  readonly tokens: readonly string[];
  readonly matchType: CandidateMatchType;
  /** Index of the word-bounded match in the normalized sentence; absent for fuzzy seeds. */
  readonly position?: number;
}

export interface LexiconLoadResult {
  readonly terms: LexiconTerm[];
  readonly filesLoaded: string[];
  readonly warnings: AppError[];
}
