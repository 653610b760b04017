// ═══════════════════════════════════════════════════════════════════════════════
// ENTITIES — Clinical Entity Types, Assertions, Spans
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// ENTITY TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export const ENTITY_TYPES = [
  'SYMPTOM',
  'ANATOMY',
  'PROCEDURE',
  'TEST',
  'DRUG',
  'PROBLEM',
  'ABBREV',
] as const;

export type EntityType = typeof ENTITY_TYPES[number];

export function isEntityType(value: string): value is EntityType {
  return ENTITY_TYPES.some(type => type === value);
}

// ─────────────────────────────────────────────────────────────────────────────────
// ASSERTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export const ASSERTIONS = ['PRESENT', 'NEGATED', 'POSSIBLE', 'HISTORICAL'] as const;

/**
 * Clinical polarity/certainty of a mention.
 */
export type Assertion = typeof ASSERTIONS[number];

export function isAssertion(value: string): value is Assertion {
  return ASSERTIONS.some(label => label === value);
}

/**
 * Normalize a free-text assertion label. Unknown or missing labels become PRESENT.
 */
export function toAssertion(value: string | null | undefined): Assertion {
  const label = (value ?? '').trim().toUpperCase();
  return isAssertion(label) ? label : 'PRESENT';
}

// ─────────────────────────────────────────────────────────────────────────────────
// SENTENCES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * A sentence located in the document. `text === document.slice(start, end)`.
 */
export interface Sentence {
  readonly text: string;
  readonly start: number;
  readonly end: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENTITY SPANS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Metadata attached to spans found through the canonical vocabulary.
 */
export interface CanonicalEvidence {
  readonly conceptId: string;
  readonly conceptName: string;
  readonly vocabulary: string;
  readonly matchType: 'exact' | 'normalized';
  readonly matchPolicy: string;
  readonly entryType: string;
  readonly sentence: string;
}

export type SpanEvidence = string | CanonicalEvidence;

/**
 * Minimal shape used by overlap resolution.
 */
export interface ScoredSpan {
  readonly start: number;
  readonly end: number;
  readonly score: number;
}

/**
 * Candidate or final entity mention.
 *
 * Invariant: `0 <= start < end <= text.length` and `span === text.slice(start, end)`.
 */
export interface EntitySpan extends ScoredSpan {
  readonly span: string;
  readonly type: EntityType;
  readonly sentenceStart: number;
  readonly sentenceEnd: number;
  readonly evidence: SpanEvidence;
}

export function spanLength(span: ScoredSpan): number {
  return span.end - span.start;
}
