// ═══════════════════════════════════════════════════════════════════════════════
// ENTITY FILTERS — Drop Junk Predictions Before Output
// ═══════════════════════════════════════════════════════════════════════════════
//
// Rules, in order:
//   1. offsets must be integers inside the text with start < end
//   2. stripped span at least `minChars` long
//   3. at least one letter
//   4. boundary punctuation trimmed (optional, updates span and offsets)
//   5. for types in `applyToTypes` (all types when empty):
//      not only stopwords, and SYMPTOM spans need a nucleus token
//
// ═══════════════════════════════════════════════════════════════════════════════

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { EntityType } from '../types/entities.js';
import type { FilterSettings } from '../config/schema.js';
import { foldDiacritics, isAlnum } from '../text/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TERM LISTS
// ─────────────────────────────────────────────────────────────────────────────────

const FILTER_TERMS_PATH = fileURLToPath(new URL('../../data/filters/pt-filter-terms.json', import.meta.url));

const FilterTermsSchema = z.object({
  stopwords: z.array(z.string()),
  symptomNucleus: z.array(z.string()),
});

export type FilterTerms = z.infer<typeof FilterTermsSchema>;

let cachedTerms: FilterTerms | null = null;

/**
 * Default Portuguese stopwords and symptom nucleus words, read once.
 */
export function getDefaultFilterTerms(): FilterTerms {
  if (!cachedTerms) {
    cachedTerms = FilterTermsSchema.parse(JSON.parse(readFileSync(FILTER_TERMS_PATH, 'utf-8')));
  }
  return cachedTerms;
}

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface FilterConfig extends FilterSettings {
  stopwords?: readonly string[];
  symptomNucleus?: readonly string[];
}

/**
 * Minimal entity shape the filter reads. Extra fields pass through untouched.
 */
export interface FilterableEntity {
  readonly span: string;
  readonly start: number;
  readonly end: number;
  readonly type: EntityType;
}

export type FilterDropReason =
  | 'invalid_offsets'
  | 'too_short'
  | 'no_letters'
  | 'no_tokens'
  | 'stopwords_only'
  | 'no_nucleus';

export interface FilterStats {
  readonly input: number;
  readonly kept: number;
  readonly dropped: number;
  readonly byReason: Partial<Record<FilterDropReason, number>>;
}

export const DEFAULT_FILTER_SETTINGS: FilterSettings = {
  minChars: 4,
  applyToTypes: ['SYMPTOM'],
  trimPunct: true,
};

// ─────────────────────────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

const LETTER = /\p{L}/u;
const WORD = /[\p{L}\p{N}_]+/gu;

function normalizeToken(token: string): string {
  return foldDiacritics(token.trim().toLowerCase());
}

export function tokenizeSpan(span: string): string[] {
  return span.toLowerCase().match(WORD) ?? [];
}

function isBoundaryPunct(ch: string): boolean {
  return !isAlnum(ch) && !/\s/.test(ch);
}

/**
 * Trim leading/trailing characters that are neither alphanumeric nor
 * whitespace. Invalid offsets are returned unchanged.
 */
export function trimPunctuation(text: string, start: number, end: number): { start: number; end: number } {
  if (start >= end || start < 0 || end > text.length) {
    return { start, end };
  }

  let newStart = start;
  while (newStart < end && isBoundaryPunct(text.charAt(newStart))) {
    newStart++;
  }

  let newEnd = end;
  while (newEnd > newStart && isBoundaryPunct(text.charAt(newEnd - 1))) {
    newEnd--;
  }

  return { start: newStart, end: newEnd };
}

// ─────────────────────────────────────────────────────────────────────────────────
// FILTER
// ─────────────────────────────────────────────────────────────────────────────────

interface Verdict<T> {
  readonly entity?: T;
  readonly reason?: FilterDropReason;
}

function judge<T extends FilterableEntity>(
  entity: T,
  rawText: string,
  settings: FilterSettings,
  stopwords: ReadonlySet<string>,
  nucleus: ReadonlySet<string>
): Verdict<T> {
  let { start, end } = entity;

  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end > rawText.length || end <= start) {
    return { reason: 'invalid_offsets' };
  }

  let extracted = rawText.slice(start, end).trim();
  if (!extracted) return { reason: 'invalid_offsets' };
  if (extracted.length < settings.minChars) return { reason: 'too_short' };
  if (!LETTER.test(extracted)) return { reason: 'no_letters' };

  let kept = entity;
  if (settings.trimPunct) {
    const trimmed = trimPunctuation(rawText, start, end);
    if (trimmed.start < trimmed.end) {
      start = trimmed.start;
      end = trimmed.end;
      extracted = rawText.slice(start, end);
      kept = { ...entity, start, end, span: extracted };
    }
  }

  if (settings.applyToTypes.length > 0 && !settings.applyToTypes.includes(entity.type)) {
    return { entity: kept };
  }

  const tokens = tokenizeSpan(extracted).map(normalizeToken);
  if (tokens.length === 0) return { reason: 'no_tokens' };
  if (tokens.every(token => stopwords.has(token))) return { reason: 'stopwords_only' };

  if (entity.type === 'SYMPTOM' && !tokens.some(token => nucleus.has(token))) {
    return { reason: 'no_nucleus' };
  }

  return { entity: kept };
}

/**
 * Filter entities against `rawText` and report why each one was dropped.
 */
export function filterEntitiesWithStats<T extends FilterableEntity>(
  entities: readonly T[],
  rawText: string,
  config: Partial<FilterConfig> = {}
): { entities: T[]; stats: FilterStats } {
  const settings: FilterSettings = { ...DEFAULT_FILTER_SETTINGS, ...config };
  const defaults = config.stopwords && config.symptomNucleus ? null : getDefaultFilterTerms();
  const stopwords = new Set((config.stopwords ?? defaults?.stopwords ?? []).map(normalizeToken));
  const nucleus = new Set((config.symptomNucleus ?? defaults?.symptomNucleus ?? []).map(normalizeToken));

  const kept: T[] = [];
  const byReason: Partial<Record<FilterDropReason, number>> = {};

  for (const entity of entities) {
    const verdict = judge(entity, rawText, settings, stopwords, nucleus);
    if (verdict.entity) {
      kept.push(verdict.entity);
    } else if (verdict.reason) {
      byReason[verdict.reason] = (byReason[verdict.reason] ?? 0) + 1;
    }
  }

  return {
    entities: kept,
    stats: {
      input: entities.length,
      kept: kept.length,
      dropped: entities.length - kept.length,
      byReason,
    },
  };
}

export function filterEntities<T extends FilterableEntity>(
  entities: readonly T[],
  rawText: string,
  config: Partial<FilterConfig> = {}
): T[] {
  return filterEntitiesWithStats(entities, rawText, config).entities;
}
