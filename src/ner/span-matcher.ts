// ═══════════════════════════════════════════════════════════════════════════════
// SPAN MATCHER — Regex, Lexicon and Fuzzy Layers Over Sentences
// ═══════════════════════════════════════════════════════════════════════════════
//
// Layers, per sentence:
//   1. clinical regex patterns over the raw sentence
//   2. lexicon exact/token candidates over the normalized sentence
//   3. fuzzy fallback, only for sentences where layer 2 found nothing
//
// Every offset is mapped back to the original (accented) text and snapped to
// token boundaries before it becomes an EntitySpan.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { EntitySpan, EntityType, Sentence } from '../types/entities.js';
import type { LexiconIndex, MatchCandidate } from '../lexicon/index.js';
import {
  clampOffsets,
  findSpanInOriginal,
  normalizeForMatch,
  normalizeSpan,
  tokenize,
  type Offsets,
} from '../text/index.js';
import { getLogger } from '../observability/logging/index.js';
import { CLINICAL_PATTERNS, type ClinicalPattern } from './patterns.js';
import { LengthScoreOverlapResolver, type OverlapResolver } from './overlap.js';
import { FuzzyMatcher } from './fuzzy.js';
import { LEXICON_SCORES, type EntityExtractor, type SpanMatcherOptions } from './types.js';

const logger = getLogger({ component: 'ner' });

export class SpanMatcher implements EntityExtractor {
  readonly name = 'baseline';

  private readonly enableFuzzy: boolean;
  private readonly patterns: readonly ClinicalPattern[];
  private readonly resolver: OverlapResolver;
  private readonly fuzzy: FuzzyMatcher;

  constructor(private readonly index: LexiconIndex, options: SpanMatcherOptions = {}) {
    this.enableFuzzy = options.enableFuzzy ?? true;
    this.patterns = options.patterns ?? CLINICAL_PATTERNS;
    this.resolver = options.resolver ?? new LengthScoreOverlapResolver();
    this.fuzzy = new FuzzyMatcher({ threshold: options.minFuzzy ?? 90 });
  }

  extract(text: string, sentences: readonly Sentence[]): EntitySpan[] {
    const results: EntitySpan[] = [];

    for (const sentence of sentences) {
      results.push(...this.matchPatterns(text, sentence));
    }

    for (const sentence of sentences) {
      const sentNorm = normalizeForMatch(sentence.text);
      const sentTokens = tokenize(sentNorm);
      const candidates = this.index.findCandidates(sentNorm, sentTokens);

      results.push(...this.matchLexicon(text, sentence, sentNorm, candidates));

      if (this.enableFuzzy && candidates.length === 0) {
        const seeds = this.index.findFuzzyCandidates(sentNorm, sentTokens, candidates);
        results.push(...this.matchFuzzy(text, sentence, sentNorm, sentTokens, seeds));
      }
    }

    const resolved = this.resolver.resolve(dedupe(results));
    logger.debug('Sentences matched', {
      sentences: sentences.length,
      candidates: results.length,
      entities: resolved.length,
    });

    return resolved.sort((a, b) => a.start - b.start || b.score - a.score);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // LAYERS
  // ─────────────────────────────────────────────────────────────────────────────

  private matchPatterns(text: string, sentence: Sentence): EntitySpan[] {
    const spans: EntitySpan[] = [];

    for (const pattern of this.patterns) {
      for (const match of sentence.text.matchAll(pattern.regex)) {
        const start = sentence.start + (match.index ?? 0);
        const offsets = { start, end: start + match[0].length };
        const span = buildSpan(text, sentence, offsets, pattern.entityType, pattern.score);
        if (span) spans.push(span);
      }
    }

    return spans;
  }

  private matchLexicon(
    text: string,
    sentence: Sentence,
    sentNorm: string,
    candidates: readonly MatchCandidate[]
  ): EntitySpan[] {
    const spans: EntitySpan[] = [];

    for (const candidate of candidates) {
      if (candidate.matchType === 'fuzzy') continue;

      const found = findSpanInOriginal(
        sentence.text,
        sentNorm,
        candidate.normalizedTerm,
        sentence.start,
        candidate.position
      );
      if (found.kind === 'not_found') continue;

      const offsets = clampOffsets(found.start, found.end, sentence.start, sentence.end);
      const score = LEXICON_SCORES[candidate.matchType];
      const span = buildSpan(text, sentence, offsets, candidate.entityType, score);
      if (span) spans.push(span);
    }

    return spans;
  }

  private matchFuzzy(
    text: string,
    sentence: Sentence,
    sentNorm: string,
    sentTokens: readonly string[],
    seeds: readonly MatchCandidate[]
  ): EntitySpan[] {
    const spans: EntitySpan[] = [];

    for (const seed of seeds) {
      let bestScore = 0;
      let best: Offsets | null = null;

      const n = seed.tokens.length;
      if (n > 0 && sentTokens.length >= n) {
        for (let i = 0; i + n <= sentTokens.length; i++) {
          const window = sentTokens.slice(i, i + n).join(' ');
          const score = this.fuzzy.partialRatio(seed.normalizedTerm, window);
          if (score <= bestScore) continue;

          bestScore = score;
          const found = findSpanInOriginal(sentence.text, sentNorm, window, sentence.start);
          if (found.kind !== 'not_found') {
            best = { start: found.start, end: found.end };
          }
        }
      }

      // Whole-sentence similarity can raise the score; offsets move only if the
      // term itself can be located.
      const wholeScore = this.fuzzy.partialRatio(seed.normalizedTerm, sentNorm);
      if (wholeScore > bestScore) {
        bestScore = wholeScore;
        const found = findSpanInOriginal(sentence.text, sentNorm, seed.normalizedTerm, sentence.start);
        if (found.kind !== 'not_found') {
          best = { start: found.start, end: found.end };
        }
      }

      if (bestScore < this.fuzzy.threshold || !best) continue;

      const offsets = clampOffsets(best.start, best.end, sentence.start, sentence.end);
      const span = buildSpan(text, sentence, offsets, seed.entityType, bestScore / 100);
      if (span) spans.push(span);
    }

    return spans;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

function buildSpan(
  text: string,
  sentence: Sentence,
  raw: Offsets,
  type: EntityType,
  score: number
): EntitySpan | null {
  const offsets = normalizeSpan(text, raw.start, raw.end);
  if (!offsets) {
    return null;
  }

  return {
    span: text.slice(offsets.start, offsets.end),
    start: offsets.start,
    end: offsets.end,
    type,
    score,
    sentenceStart: sentence.start,
    sentenceEnd: sentence.end,
    evidence: sentence.text.trim(),
  };
}

/**
 * Collapse identical (start, end, type) spans, keeping the highest score.
 */
function dedupe(spans: readonly EntitySpan[]): EntitySpan[] {
  const unique = new Map<string, EntitySpan>();

  for (const span of spans) {
    const key = `${span.start}:${span.end}:${span.type}`;
    const current = unique.get(key);
    if (!current || span.score > current.score) {
      unique.set(key, span);
    }
  }

  return [...unique.values()];
}
