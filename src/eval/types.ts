// ═══════════════════════════════════════════════════════════════════════════════
// EVALUATION TYPES — Gold/Predicted Cases, Matches, Report
// ═══════════════════════════════════════════════════════════════════════════════

import type { MatchMode } from '../config/schema.js';

export type { MatchMode };

// ─────────────────────────────────────────────────────────────────────────────────
// ENTITIES AND CASES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Fields shared by gold and predicted entities after canonicalization.
 * `start`/`end` are null when the source value was missing or not an integer;
 * such entities are kept on the case but never matched.
 */
export interface EvalEntity {
  readonly start: number | null;
  readonly end: number | null;
  readonly text: string;
  /** Label after synonym normalization (DIAGNOSIS → PROBLEM, …). */
  readonly type: string;
  /** Uppercased label as annotated, or null. */
  readonly assertion: string | null;
}

export interface GoldEntity extends EvalEntity {
  readonly notes: string | null;
}

export interface PredEntity extends EvalEntity {
  readonly score: number;
  readonly evidence: string | null;
}

/** An entity whose offsets are known integers. */
export type Located<T extends EvalEntity> = T & { readonly start: number; readonly end: number };

export type CaseKey = string | number;

export interface GoldCase {
  readonly caseId: CaseKey;
  readonly group: string | null;
  readonly rawText: string;
  readonly goldEntities: GoldEntity[];
  readonly metadata: Record<string, unknown>;
}

export interface PredCase {
  readonly caseId: CaseKey;
  readonly docId: string | null;
  /** Text the prediction offsets refer to. */
  readonly text: string;
  readonly entities: PredEntity[];
  readonly group: string | null;
}

// ─────────────────────────────────────────────────────────────────────────────────
// MATCHING
// ─────────────────────────────────────────────────────────────────────────────────

export type MatchReason = 'iou' | 'min_cov' | 'containment';

export interface SpanMetrics {
  readonly iou: number;
  readonly minCov: number;
  readonly intersection: number;
  readonly isContainment: boolean;
}

export interface RelaxedMatchResult {
  readonly matched: boolean;
  readonly reason: MatchReason | null;
}

export interface MatchScore {
  /** max(IoU, min-coverage) */
  readonly primaryScore: number;
  readonly intersection: number;
  readonly startDistance: number;
}

export interface Match {
  readonly gold: Located<GoldEntity>;
  readonly pred: Located<PredEntity>;
  readonly matchType: 'strict' | 'relaxed';
  readonly matchReason: MatchReason | null;
}

export interface MatchOptions {
  relaxed?: boolean;
  overlapThreshold?: number;
  /** Relaxed criterion; `iou` when omitted. Ignored in strict mode. */
  matchMode?: MatchMode;
}

export interface MatchResult {
  readonly matched: Match[];
  readonly unmatchedGold: Located<GoldEntity>[];
  readonly unmatchedPred: Located<PredEntity>[];
}

/**
 * Matching outcome for one aligned case, with the texts needed for examples.
 */
export interface CaseMatchResult extends MatchResult {
  readonly caseId: string;
  readonly goldText: string;
  readonly predText: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// REPORT (snake_case, written as JSON)
// ─────────────────────────────────────────────────────────────────────────────────

export interface PrfCounts {
  precision: number;
  recall: number;
  f1: number;
  tp: number;
  fp: number;
  fn: number;
}

export interface FalsePositiveExample {
  case_id: string;
  text: string;
  type: string;
  start: number;
  end: number;
  score: number;
  evidence: string;
}

export interface FalseNegativeExample {
  case_id: string;
  text: string;
  type: string;
  start: number;
  end: number;
  context: string;
}

export interface AssertionMismatchExample {
  case_id: string;
  text: string;
  type: string;
  gold_assertion: string;
  pred_assertion: string;
  evidence: string;
}

export interface ErrorExamples {
  false_positives: FalsePositiveExample[];
  false_negatives: FalseNegativeExample[];
  assertion_mismatches: AssertionMismatchExample[];
}

export interface EvaluationReport {
  config: {
    relaxed_matching: boolean;
    overlap_threshold: number;
    match_mode: MatchMode | null;
    total_cases: number;
  };
  ner: {
    overall: PrfCounts;
    per_type: Record<string, PrfCounts>;
  };
  assertion: {
    accuracy: number;
    confusion_matrix: Record<string, Record<string, number>>;
    total_matched: number;
  };
  coverage: {
    total_cases: number;
    cases_with_entities: number;
    cases_without_entities: number;
    pct_cases_with_entities: number;
    avg_entities_per_case: number;
    entity_type_distribution: Record<string, number>;
    top_entity_texts: Array<{ text: string; count: number }>;
  };
  errors: ErrorExamples;
  diagnostics: {
    total_gold_entities_loaded: number;
    total_pred_entities_loaded: number;
    gold_entities_with_invalid_offsets: number;
    pred_entities_with_invalid_offsets: number;
    total_matches_found: number;
    matched_by_iou: number;
    matched_by_min_cov: number;
    matched_by_containment: number;
    gold_cases_without_predictions: string[];
    pred_cases_without_gold: string[];
    text_length_mismatches: string[];
  };
}
