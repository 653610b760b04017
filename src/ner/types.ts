// ═══════════════════════════════════════════════════════════════════════════════
// NER TYPES — Extractor Contract and Matcher Options
// ═══════════════════════════════════════════════════════════════════════════════

import type { EntitySpan, Sentence } from '../types/entities.js';
import type { ClinicalPattern } from './patterns.js';
import type { OverlapResolver } from './overlap.js';

/**
 * Anything that turns a document plus its sentences into entity spans.
 * Implementations hold only read-only state and may be shared across documents.
 */
export interface EntityExtractor {
  readonly name: string;
  extract(text: string, sentences: readonly Sentence[]): EntitySpan[];
}

export interface SpanMatcherOptions {
  /** Run the fuzzy layer for sentences without exact/token candidates. */
  enableFuzzy?: boolean;
  /** Minimum partial-ratio similarity (0-100). */
  minFuzzy?: number;
  patterns?: readonly ClinicalPattern[];
  resolver?: OverlapResolver;
}

export const LEXICON_SCORES = {
  exact: 0.99,
  token: 0.95,
} as const;
