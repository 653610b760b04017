// ═══════════════════════════════════════════════════════════════════════════════
// ASSERTION — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export type { AssertionOptions } from './classifier.js';
export {
  classifyAssertion,
  cutAfterLastBreaker,
  DEFAULT_LEFT_WINDOW_CHARS,
} from './classifier.js';

export {
  NEGATION_TRIGGERS,
  POSSIBLE_TRIGGERS,
  HISTORICAL_TRIGGERS,
  SCOPE_BREAKERS,
  compileTriggers,
} from './triggers.js';
