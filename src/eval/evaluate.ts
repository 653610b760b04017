// ═══════════════════════════════════════════════════════════════════════════════
// EVALUATE — Case Alignment and Report Assembly
// ═══════════════════════════════════════════════════════════════════════════════

import { ClinicalError, ErrorCode, appError } from '../types/result.js';
import type { AppConfig } from '../config/schema.js';
import { getLogger } from '../observability/logging/index.js';
import { hasValidOffsets } from './schema.js';
import { DEFAULT_OVERLAP_THRESHOLD, matchEntities } from './matching.js';
import {
  DEFAULT_MAX_ERROR_EXAMPLES,
  DEFAULT_TOP_ENTITY_TEXTS,
  collectErrorExamples,
  computeAssertionMetrics,
  computeCoverageMetrics,
  computeNerMetrics,
  computePerTypeMetrics,
} from './metrics.js';
import type {
  CaseMatchResult,
  EvalEntity,
  EvaluationReport,
  GoldCase,
  Located,
  MatchMode,
  PredCase,
} from './types.js';

const logger = getLogger({ component: 'evaluation' });

/** Gold/prediction text lengths differing by more than this are reported. */
export const TEXT_LENGTH_TOLERANCE = 10;

// ─────────────────────────────────────────────────────────────────────────────────
// ALIGNMENT
// ─────────────────────────────────────────────────────────────────────────────────

export interface CaseAlignment {
  readonly aligned: Array<{ readonly gold: GoldCase; readonly pred: PredCase }>;
  /** Gold case ids with no prediction. */
  readonly missingPredictions: string[];
  /** Prediction case ids with no gold annotation. */
  readonly missingGold: string[];
}

function indexById<T extends { readonly caseId: string | number }>(cases: readonly T[]): Map<string, T> {
  const byId = new Map<string, T>();
  for (const item of cases) byId.set(String(item.caseId), item);
  return byId;
}

/**
 * Pair cases by stringified case id. A repeated id keeps its last record.
 */
export function alignCases(gold: readonly GoldCase[], pred: readonly PredCase[]): CaseAlignment {
  const goldById = indexById(gold);
  const predById = indexById(pred);

  const aligned: CaseAlignment['aligned'] = [];
  const missingPredictions: string[] = [];
  for (const [id, goldCase] of goldById) {
    const predCase = predById.get(id);
    if (predCase) {
      aligned.push({ gold: goldCase, pred: predCase });
    } else {
      missingPredictions.push(id);
    }
  }

  const missingGold = [...predById.keys()].filter(id => !goldById.has(id));
  return { aligned, missingPredictions, missingGold };
}

// ─────────────────────────────────────────────────────────────────────────────────
// EVALUATION
// ─────────────────────────────────────────────────────────────────────────────────

export interface EvaluateOptions {
  relaxed?: boolean;
  overlapThreshold?: number;
  /** Relaxed criterion; matching falls back to `iou` when omitted. */
  matchMode?: MatchMode;
  maxErrorExamples?: number;
  topEntityTexts?: number;
}

export function evaluationOptions(config: AppConfig): EvaluateOptions {
  const { relaxed, overlapThreshold, matchMode, maxErrorExamples, topEntityTexts } = config.evaluation;
  return { relaxed, overlapThreshold, matchMode, maxErrorExamples, topEntityTexts };
}

function splitByOffsets<T extends EvalEntity>(entities: readonly T[]): { valid: Located<T>[]; invalid: number } {
  const valid: Located<T>[] = [];
  let invalid = 0;
  for (const entity of entities) {
    if (hasValidOffsets(entity)) {
      valid.push(entity);
    } else {
      invalid++;
    }
  }
  return { valid, invalid };
}

/**
 * Score predictions against gold annotations.
 *
 * Unaligned cases are reported in diagnostics; only an empty alignment throws.
 * Entities whose offsets are not integers never match and are counted apart.
 */
export function evaluate(
  gold: readonly GoldCase[],
  pred: readonly PredCase[],
  options: EvaluateOptions = {}
): EvaluationReport {
  const relaxed = options.relaxed ?? false;
  const overlapThreshold = options.overlapThreshold ?? DEFAULT_OVERLAP_THRESHOLD;
  const matchMode = relaxed ? options.matchMode ?? 'iou' : undefined;

  const { aligned, missingPredictions, missingGold } = alignCases(gold, pred);

  if (missingGold.length > 0) {
    logger.warn('Predicted cases without gold annotation', {
      count: missingGold.length,
      sample: missingGold.slice(0, 5),
    });
  }
  if (missingPredictions.length > 0) {
    logger.warn('Gold cases without predictions', {
      count: missingPredictions.length,
      sample: missingPredictions.slice(0, 5),
    });
  }

  if (aligned.length === 0) {
    throw new ClinicalError(
      appError(ErrorCode.NO_ALIGNED_CASES, 'No cases could be aligned between gold and predictions', {
        context: { goldCases: gold.length, predCases: pred.length },
      })
    );
  }

  const caseResults: CaseMatchResult[] = [];
  const lengthMismatches: string[] = [];
  let goldLoaded = 0;
  let predLoaded = 0;
  let goldInvalid = 0;
  let predInvalid = 0;

  for (const { gold: goldCase, pred: predCase } of aligned) {
    const caseId = String(goldCase.caseId);
    const goldText = goldCase.rawText;
    const predText = predCase.text;

    if (Math.abs(goldText.length - predText.length) > TEXT_LENGTH_TOLERANCE) {
      lengthMismatches.push(caseId);
      logger.warn('Text length mismatch', {
        caseId,
        goldLength: goldText.length,
        predLength: predText.length,
      });
    }

    goldLoaded += goldCase.goldEntities.length;
    predLoaded += predCase.entities.length;

    const goldEntities = splitByOffsets(goldCase.goldEntities);
    const predEntities = splitByOffsets(predCase.entities);
    goldInvalid += goldEntities.invalid;
    predInvalid += predEntities.invalid;

    const result = matchEntities(goldEntities.valid, predEntities.valid, {
      relaxed,
      overlapThreshold,
      matchMode,
    });
    caseResults.push({ ...result, caseId, goldText, predText });
  }

  const matched = caseResults.flatMap(r => r.matched);
  const unmatchedGold = caseResults.flatMap(r => r.unmatchedGold);
  const unmatchedPred = caseResults.flatMap(r => r.unmatchedPred);
  const countReason = (reason: string) => matched.filter(m => m.matchReason === reason).length;

  const report: EvaluationReport = {
    config: {
      relaxed_matching: relaxed,
      overlap_threshold: overlapThreshold,
      match_mode: matchMode ?? null,
      total_cases: aligned.length,
    },
    ner: {
      overall: computeNerMetrics(matched, unmatchedGold, unmatchedPred),
      per_type: computePerTypeMetrics(matched, unmatchedGold, unmatchedPred),
    },
    assertion: computeAssertionMetrics(matched),
    coverage: computeCoverageMetrics(pred, options.topEntityTexts ?? DEFAULT_TOP_ENTITY_TEXTS),
    errors: collectErrorExamples(caseResults, options.maxErrorExamples ?? DEFAULT_MAX_ERROR_EXAMPLES),
    diagnostics: {
      total_gold_entities_loaded: goldLoaded,
      total_pred_entities_loaded: predLoaded,
      gold_entities_with_invalid_offsets: goldInvalid,
      pred_entities_with_invalid_offsets: predInvalid,
      total_matches_found: matched.length,
      matched_by_iou: countReason('iou'),
      matched_by_min_cov: countReason('min_cov'),
      matched_by_containment: countReason('containment'),
      gold_cases_without_predictions: missingPredictions,
      pred_cases_without_gold: missingGold,
      text_length_mismatches: lengthMismatches,
    },
  };

  logger.info('Evaluation complete', {
    cases: aligned.length,
    f1: report.ner.overall.f1,
    assertionAccuracy: report.assertion.accuracy,
  });

  return report;
}
