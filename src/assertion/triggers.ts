// ═══════════════════════════════════════════════════════════════════════════════
// ASSERTION TRIGGERS — Portuguese Negation, Uncertainty and History Cues
// ═══════════════════════════════════════════════════════════════════════════════
//
// Sources are written without word boundaries; `compileTriggers` adds the
// Unicode-aware boundary on both sides. Text is lowercased before matching.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { WORD_BOUNDARY, boundedPattern } from '../text/index.js';

export const NEGATION_TRIGGERS: readonly string[] = [
  'nega(?:ndo|do|)',
  'negou',
  'negava',
  'nega\\s+queix(?:a|as)',
  'nega\\s+sintomas?',
  'nega\\s+(?:dor|febre|dispneia|vomitos?|n[aã]useas?)',
  'sem',
  'sem\\s+sinais?\\s+de',
  'sem\\s+evid[eê]ncia\\s+de',
  'sem\\s+queixas?\\s+de',
  'n[aã]o',
  'n[aã]o\\s+(?:apresenta|refere|relata|tem|possui|evidencia)',
  'n[aã]o\\s+houve',
  'n[aã]o\\s+nega',
  'ausent[ea]s?',
  'inexistente',
  'nega(?:tivo|tiva|)',
];

export const POSSIBLE_TRIGGERS: readonly string[] = [
  'suspeit[ae]',
  'hip[oó]teses?',
  'prov[aá]vel',
  'poss[ií]vel',
  'compat[ií]vel\\s+com',
  'a\\s+esclarecer',
  'a\\s+confirmar',
  'diferencial',
  'ddx',
];

export const HISTORICAL_TRIGGERS: readonly string[] = [
  'hist[oó]ria\\s+de',
  'antecedentes?',
  'antecedentes?\\s+pessoais',
  'hpp',
  'ap\\s*:',
  'af\\s*:',
  'previamente',
  'anteriormente',
  'pr[eé]vio',
];

/** Trailing question mark in the left context. Weak uncertainty signal. */
export const TRAILING_QUESTION = /\?\s*$/u;

const BREAKER_WORDS = [
  'mas',
  'por[eé]m',
  'contudo',
  'entretanto',
  'no entanto',
  'todavia',
  'por outro lado',
];

/**
 * Scope boundaries: strong punctuation, newlines and contrastive connectives.
 */
export const SCOPE_BREAKERS = new RegExp(
  `[.;:\\n]|${WORD_BOUNDARY}(?:${BREAKER_WORDS.join('|')})${WORD_BOUNDARY}`,
  'giu'
);

export function compileTriggers(sources: readonly string[]): RegExp[] {
  return sources.map(source => new RegExp(boundedPattern(source), 'giu'));
}
