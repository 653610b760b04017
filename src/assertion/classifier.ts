// ═══════════════════════════════════════════════════════════════════════════════
// ASSERTION CLASSIFIER — Left-Context Rules
// ═══════════════════════════════════════════════════════════════════════════════
//
// Precedence is fixed: NEGATED > POSSIBLE > HISTORICAL > PRESENT. Closeness
// to the entity does not arbitrate between categories.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Assertion } from '../types/entities.js';
import {
  HISTORICAL_TRIGGERS,
  NEGATION_TRIGGERS,
  POSSIBLE_TRIGGERS,
  SCOPE_BREAKERS,
  TRAILING_QUESTION,
  compileTriggers,
} from './triggers.js';

export interface AssertionOptions {
  /** Characters of left context inspected before the entity. */
  leftWindowChars?: number;
}

export const DEFAULT_LEFT_WINDOW_CHARS = 60;

const NEGATION = compileTriggers(NEGATION_TRIGGERS);
const POSSIBLE = [...compileTriggers(POSSIBLE_TRIGGERS), TRAILING_QUESTION];
const HISTORICAL = compileTriggers(HISTORICAL_TRIGGERS);

function normalizeSentence(sentence: string): string {
  return sentence.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Drop everything up to the last scope breaker, so "sem X, porém Y" does not
 * negate Y.
 */
export function cutAfterLastBreaker(leftContext: string): string {
  let lastEnd = -1;
  for (const match of leftContext.matchAll(SCOPE_BREAKERS)) {
    lastEnd = (match.index ?? 0) + match[0].length;
  }
  return lastEnd === -1 ? leftContext : leftContext.slice(lastEnd).trim();
}

function anyTrigger(context: string, patterns: readonly RegExp[]): boolean {
  return patterns.some(pattern => {
    pattern.lastIndex = 0;
    return pattern.test(context);
  });
}

/**
 * Classify one entity from the text to its left within the sentence.
 * `entStart`/`entEnd` are relative to `sentence`; out-of-range values are
 * clamped. Anatomy is always PRESENT.
 *
 * The left window is taken from the lowercased, whitespace-collapsed
 * sentence using the original offsets.
 */
export function classifyAssertion(
  sentence: string,
  entStart: number,
  entEnd: number,
  entType: string,
  options: AssertionOptions = {}
): Assertion {
  if (entType.trim().toUpperCase() === 'ANATOMY') {
    return 'PRESENT';
  }
  if (!sentence) {
    return 'PRESENT';
  }

  const start = Math.max(0, Math.min(entStart, sentence.length));
  const windowChars = options.leftWindowChars ?? DEFAULT_LEFT_WINDOW_CHARS;

  const normalized = normalizeSentence(sentence);
  const left = cutAfterLastBreaker(normalized.slice(Math.max(0, start - windowChars), start));

  if (anyTrigger(left, NEGATION)) return 'NEGATED';
  if (anyTrigger(left, POSSIBLE)) return 'POSSIBLE';
  if (anyTrigger(left, HISTORICAL)) return 'HISTORICAL';
  return 'PRESENT';
}
