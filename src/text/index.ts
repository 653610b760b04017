// ═══════════════════════════════════════════════════════════════════════════════
// TEXT — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export type { NormalizedText } from './normalize.js';
export {
  isAlnum,
  escapeRegExp,
  WORD_BOUNDARY,
  boundedPattern,
  foldDiacritics,
  normalizeForMatch,
  normalizeWithOffsets,
  foldCaseInPlace,
  tokenize,
  normalizeText,
} from './normalize.js';

export type { SentenceSplitter } from './segment.js';
export {
  locateSentences,
  CompromiseSentenceSplitter,
  PunctuationSentenceSplitter,
} from './segment.js';

export type { Offsets, SpanSearchResult } from './span.js';
export { clampOffsets, normalizeSpan, findSpanInOriginal } from './span.js';
