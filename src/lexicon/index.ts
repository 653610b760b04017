// ═══════════════════════════════════════════════════════════════════════════════
// LEXICON — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  LexiconTerm,
  LexiconEntry,
  CandidateMatchType,
  MatchCandidate,
  LexiconLoadResult,
} from './types.js';

export { LexiconIndex } from './lexicon-index.js';

export {
  DEFAULT_LEXICON,
  loadLexiconFile,
  loadAllLexicons,
  buildLexiconIndex,
} from './loader.js';
