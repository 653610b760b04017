// ═══════════════════════════════════════════════════════════════════════════════
// NER — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export type { EntityExtractor, SpanMatcherOptions } from './types.js';
export { LEXICON_SCORES } from './types.js';

export type { ClinicalPattern } from './patterns.js';
export { CLINICAL_PATTERNS } from './patterns.js';

export type { OverlapResolver } from './overlap.js';
export {
  overlapLength,
  overlapsSignificantly,
  LengthScoreOverlapResolver,
  ConfidenceSweepOverlapResolver,
} from './overlap.js';

export type { FuzzyMatchOptions } from './fuzzy.js';
export { FuzzyMatcher, DEFAULT_FUZZY_OPTIONS } from './fuzzy.js';

export { SpanMatcher } from './span-matcher.js';
