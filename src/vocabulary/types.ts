// ═══════════════════════════════════════════════════════════════════════════════
// VOCABULARY TYPES — Concepts, Entries, Policies, Matches
// ═══════════════════════════════════════════════════════════════════════════════

import type { EntityType } from '../types/entities.js';
import type { AppError } from '../types/result.js';

// ─────────────────────────────────────────────────────────────────────────────────
// REFERENCE DATA
// ─────────────────────────────────────────────────────────────────────────────────

export const ENTRY_TYPES = ['official', 'code', 'abbr', 'drug_normalized'] as const;
export type EntryType = typeof ENTRY_TYPES[number];

export const MATCH_POLICIES = ['safe_exact', 'context_required', 'blocked'] as const;
export type MatchPolicy = typeof MATCH_POLICIES[number];

/**
 * Source terminology, e.g. CID10, TUSS_PROC, TUSS_DRUG, LABS, SIGLARIO.
 */
export type VocabularyName = string;

export interface Concept {
  readonly conceptId: string;
  readonly conceptName: string;
  readonly entityType: EntityType;
  readonly domain: string;
  readonly vocabulary: VocabularyName;
  readonly sourceFile: string;
  readonly version: string;
  readonly language: string;
  readonly status: string;
}

/**
 * Surface form of a concept. Many entries per concept; `conceptId` must
 * reference a loaded Concept.
 */
export interface Entry {
  readonly entryText: string;
  readonly conceptId: string;
  readonly entryType: EntryType;
  readonly matchPolicy: MatchPolicy;
  readonly sourceFile: string;
  readonly language: string;
}

export interface BlockedTerm {
  readonly term: string;
  readonly reason: string;
  readonly sourceFile: string;
}

export interface AmbiguityRecord {
  readonly entryText: string;
  readonly conceptId: string;
  readonly conflictType: string;
  readonly possibleMeanings: string;
  readonly contextRule: string;
  readonly sourceFile: string;
}

export interface VocabularyTables {
  readonly concepts: Concept[];
  readonly entries: Entry[];
  readonly blockedTerms: BlockedTerm[];
  readonly ambiguity: AmbiguityRecord[];
}

export interface VocabularyLoadResult {
  readonly tables: VocabularyTables;
  readonly warnings: AppError[];
}

// ─────────────────────────────────────────────────────────────────────────────────
// MATCHING
// ─────────────────────────────────────────────────────────────────────────────────

export type CanonicalMatchType = 'exact' | 'normalized';

/**
 * One vocabulary hit in a document. `score` is the policy-derived confidence.
 */
export interface CanonicalMatch {
  readonly text: string;
  readonly start: number;
  readonly end: number;
  readonly score: number;
  readonly conceptId: string;
  readonly conceptName: string;
  readonly entityType: EntityType;
  readonly vocabulary: VocabularyName;
  readonly matchType: CanonicalMatchType;
  readonly matchPolicy: MatchPolicy;
  readonly entryType: EntryType;
}

// ─────────────────────────────────────────────────────────────────────────────────
// REPORTING
// ─────────────────────────────────────────────────────────────────────────────────

export interface VocabularyStats {
  readonly version: string;
  readonly totalConcepts: number;
  readonly totalEntries: number;
  readonly indexedEntries: number;
  readonly drugNames: number;
  readonly blockedTerms: number;
  readonly ambiguousTerms: number;
  readonly byVocabulary: Record<string, number>;
  readonly byEntityType: Record<string, number>;
}

export interface VocabularyValidationReport {
  readonly valid: boolean;
  readonly orphanEntries: Array<{ entryText: string; conceptId: string }>;
  readonly duplicateConceptIds: string[];
  readonly emptyEntryTexts: number;
  readonly countsByVocabulary: Record<string, number>;
  readonly countsByEntryType: Record<string, number>;
  readonly countsByPolicy: Record<string, number>;
}
