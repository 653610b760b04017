// ═══════════════════════════════════════════════════════════════════════════════
// EVALUATION METRICS — NER, Assertion, Coverage, Error Examples
// ═══════════════════════════════════════════════════════════════════════════════

import { ASSERTIONS, toAssertion } from '../types/entities.js';
import type {
  AssertionMismatchExample,
  CaseMatchResult,
  ErrorExamples,
  EvaluationReport,
  FalseNegativeExample,
  FalsePositiveExample,
  GoldEntity,
  Located,
  Match,
  PredCase,
  PredEntity,
  PrfCounts,
} from './types.js';

export const DEFAULT_MAX_ERROR_EXAMPLES = 10;
export const DEFAULT_TOP_ENTITY_TEXTS = 20;
export const CONTEXT_WINDOW_CHARS = 50;

// ─────────────────────────────────────────────────────────────────────────────────
// NER
// ─────────────────────────────────────────────────────────────────────────────────

export function prf(tp: number, fp: number, fn: number): PrfCounts {
  const precision = tp + fp > 0 ? tp / (tp + fp) : 0;
  const recall = tp + fn > 0 ? tp / (tp + fn) : 0;
  const f1 = precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;
  return { precision, recall, f1, tp, fp, fn };
}

export function computeNerMetrics(
  matched: readonly Match[],
  unmatchedGold: readonly GoldEntity[],
  unmatchedPred: readonly PredEntity[]
): PrfCounts {
  return prf(matched.length, unmatchedPred.length, unmatchedGold.length);
}

/**
 * Per-type counts. A true positive is attributed to the gold type.
 */
export function computePerTypeMetrics(
  matched: readonly Match[],
  unmatchedGold: readonly GoldEntity[],
  unmatchedPred: readonly PredEntity[]
): Record<string, PrfCounts> {
  const counts = new Map<string, { tp: number; fp: number; fn: number }>();
  const bucket = (type: string) => {
    let entry = counts.get(type);
    if (!entry) {
      entry = { tp: 0, fp: 0, fn: 0 };
      counts.set(type, entry);
    }
    return entry;
  };

  for (const match of matched) bucket(match.gold.type).tp++;
  for (const pred of unmatchedPred) bucket(pred.type).fp++;
  for (const gold of unmatchedGold) bucket(gold.type).fn++;

  const result: Record<string, PrfCounts> = {};
  for (const [type, c] of counts) {
    result[type] = prf(c.tp, c.fp, c.fn);
  }
  return result;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ASSERTION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Missing or unrecognized labels count as PRESENT.
 */
export function computeAssertionMetrics(matched: readonly Match[]): EvaluationReport['assertion'] {
  const confusion: Record<string, Record<string, number>> = {};
  for (const gold of ASSERTIONS) {
    const row: Record<string, number> = {};
    for (const pred of ASSERTIONS) row[pred] = 0;
    confusion[gold] = row;
  }

  let correct = 0;
  for (const match of matched) {
    const gold = toAssertion(match.gold.assertion);
    const pred = toAssertion(match.pred.assertion);
    const row = confusion[gold];
    if (row) row[pred] = (row[pred] ?? 0) + 1;
    if (gold === pred) correct++;
  }

  return {
    accuracy: matched.length > 0 ? correct / matched.length : 0,
    confusion_matrix: confusion,
    total_matched: matched.length,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// COVERAGE
// ─────────────────────────────────────────────────────────────────────────────────

export function computeCoverageMetrics(
  predCases: readonly PredCase[],
  topN: number = DEFAULT_TOP_ENTITY_TEXTS
): EvaluationReport['coverage'] {
  const totalCases = predCases.length;
  const withEntities = predCases.filter(c => c.entities.length > 0).length;
  const totalEntities = predCases.reduce((sum, c) => sum + c.entities.length, 0);

  const typeCounts: Record<string, number> = {};
  const textCounts = new Map<string, number>();
  for (const predCase of predCases) {
    for (const entity of predCase.entities) {
      typeCounts[entity.type] = (typeCounts[entity.type] ?? 0) + 1;
      const text = entity.text.trim();
      textCounts.set(text, (textCounts.get(text) ?? 0) + 1);
    }
  }

  // Array.prototype.sort is stable: equal counts keep first-seen order.
  const topTexts = [...textCounts.entries()]
    .map(([text, count]) => ({ text, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, topN);

  return {
    total_cases: totalCases,
    cases_with_entities: withEntities,
    cases_without_entities: totalCases - withEntities,
    pct_cases_with_entities: totalCases > 0 ? (withEntities / totalCases) * 100 : 0,
    avg_entities_per_case: totalCases > 0 ? totalEntities / totalCases : 0,
    entity_type_distribution: typeCounts,
    top_entity_texts: topTexts,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR EXAMPLES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Text around a span, `window` characters each side.
 */
export function getContext(
  text: string,
  start: number,
  end: number,
  window: number = CONTEXT_WINDOW_CHARS
): string {
  if (!text) return '';
  const from = Math.max(0, start - window);
  const to = Math.min(text.length, end + window);
  if (from >= to) return text.slice(0, 120);
  return text.slice(from, to);
}

function falsePositive(caseId: string, text: string, pred: Located<PredEntity>): FalsePositiveExample {
  return {
    case_id: caseId,
    text: pred.text,
    type: pred.type,
    start: pred.start,
    end: pred.end,
    score: pred.score,
    evidence: pred.evidence || getContext(text, pred.start, pred.end),
  };
}

function falseNegative(caseId: string, text: string, gold: Located<GoldEntity>): FalseNegativeExample {
  return {
    case_id: caseId,
    text: gold.text,
    type: gold.type,
    start: gold.start,
    end: gold.end,
    context: getContext(text, gold.start, gold.end),
  };
}

/**
 * First `max` examples of each error kind, in case order.
 */
export function collectErrorExamples(
  caseResults: readonly CaseMatchResult[],
  max: number = DEFAULT_MAX_ERROR_EXAMPLES
): ErrorExamples {
  const falsePositives: FalsePositiveExample[] = [];
  const falseNegatives: FalseNegativeExample[] = [];
  const mismatches: AssertionMismatchExample[] = [];

  for (const result of caseResults) {
    for (const pred of result.unmatchedPred) {
      if (falsePositives.length >= max) break;
      falsePositives.push(falsePositive(result.caseId, result.predText, pred));
    }
    for (const gold of result.unmatchedGold) {
      if (falseNegatives.length >= max) break;
      falseNegatives.push(falseNegative(result.caseId, result.goldText, gold));
    }
    for (const match of result.matched) {
      if (mismatches.length >= max) break;
      const goldAssertion = toAssertion(match.gold.assertion);
      const predAssertion = toAssertion(match.pred.assertion);
      if (goldAssertion === predAssertion) continue;
      mismatches.push({
        case_id: result.caseId,
        text: match.gold.text,
        type: match.gold.type,
        gold_assertion: goldAssertion,
        pred_assertion: predAssertion,
        evidence: match.pred.evidence ?? '',
      });
    }
  }

  return {
    false_positives: falsePositives,
    false_negatives: falseNegatives,
    assertion_mismatches: mismatches,
  };
}
