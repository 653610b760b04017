// ═══════════════════════════════════════════════════════════════════════════════
// VOCABULARY — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  EntryType,
  MatchPolicy,
  VocabularyName,
  Concept,
  Entry,
  BlockedTerm,
  AmbiguityRecord,
  VocabularyTables,
  VocabularyLoadResult,
  CanonicalMatchType,
  CanonicalMatch,
  VocabularyStats,
  VocabularyValidationReport,
} from './types.js';
export { ENTRY_TYPES, MATCH_POLICIES } from './types.js';

export {
  ConceptRowSchema,
  EntryRowSchema,
  BlockedTermRowSchema,
  AmbiguityRowSchema,
} from './schemas.js';

export {
  VOCABULARY_FILES,
  parseCsvTable,
  readVocabularyTables,
  validateVocabulary,
  enforceIntegrity,
  loadVocabularyTables,
} from './loader.js';

export { normalizeDrugName, MIN_DRUG_NAME_LENGTH } from './drug-name.js';

export type { CanonicalVocabularyOptions } from './canonical-vocabulary.js';
export {
  CanonicalVocabulary,
  PORTUGUESE_STOPWORDS,
  DRUG_MATCH_CONFIDENCE,
  entryConfidence,
  shouldSkipMatch,
} from './canonical-vocabulary.js';
