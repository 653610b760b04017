// ═══════════════════════════════════════════════════════════════════════════════
// EVALUATION — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  EvalEntity,
  GoldEntity,
  PredEntity,
  Located,
  CaseKey,
  GoldCase,
  PredCase,
  MatchReason,
  SpanMetrics,
  RelaxedMatchResult,
  MatchScore,
  Match,
  MatchOptions,
  MatchResult,
  CaseMatchResult,
  PrfCounts,
  FalsePositiveExample,
  FalseNegativeExample,
  AssertionMismatchExample,
  ErrorExamples,
  EvaluationReport,
} from './types.js';

export type { RawEntity, GoldCaseRecord, PredCaseRecord } from './schema.js';

export {
  LABEL_SYNONYMS,
  normalizeLabel,
  hasValidOffsets,
  RawEntitySchema,
  GoldCaseRecordSchema,
  PredCaseRecordSchema,
  entityText,
  toGoldEntity,
  toPredEntity,
  toGoldCase,
  toPredCase,
} from './schema.js';

export {
  DEFAULT_OVERLAP_THRESHOLD,
  computeSpanMetrics,
  strictMatch,
  relaxedMatch,
  computeMatchScore,
  matchEntities,
} from './matching.js';

export {
  DEFAULT_MAX_ERROR_EXAMPLES,
  DEFAULT_TOP_ENTITY_TEXTS,
  CONTEXT_WINDOW_CHARS,
  prf,
  computeNerMetrics,
  computePerTypeMetrics,
  computeAssertionMetrics,
  computeCoverageMetrics,
  getContext,
  collectErrorExamples,
} from './metrics.js';

export type { CaseAlignment, EvaluateOptions } from './evaluate.js';
export { TEXT_LENGTH_TOLERANCE, alignCases, evaluate, evaluationOptions } from './evaluate.js';

export type {
  OffsetFillExample,
  OffsetFillReport,
  FillOffsetsOptions,
  GoldRepairResult,
  ReanchorStatus,
  ReanchorMethod,
  ReanchorResult,
  OffsetFixMeta,
  OffsetFixExample,
  OffsetFixReport,
  FixOffsetsOptions,
  TextSyncReport,
} from './offsets.js';
export {
  DEFAULT_REANCHOR_WINDOW,
  MAX_FILL_EXAMPLES,
  MAX_FIX_EXAMPLES,
  findTextOccurrences,
  searchKey,
  fillGoldOffsets,
  reanchorEntity,
  fixGoldOffsets,
  syncGoldRawText,
} from './offsets.js';

export type { EvaluateFilesOptions, RepairGoldFileOptions, GoldRepairSummary } from './io.js';
export {
  DEFAULT_RELAXED_MATCH_MODE,
  parseGoldRecords,
  parseGoldLines,
  loadGoldCases,
  loadGoldRecords,
  writeGoldRecords,
  parsePredictions,
  loadPredCases,
  writeReport,
  evaluateFiles,
  loadCanonicalTexts,
  repairGoldFile,
} from './io.js';
