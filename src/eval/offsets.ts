// ═══════════════════════════════════════════════════════════════════════════════
// GOLD OFFSETS — Filling, Re-anchoring and Text Sync for Annotated Cases
// ═══════════════════════════════════════════════════════════════════════════════
//
// Annotators often record entity text without offsets, or offsets against an
// older copy of the note. These passes work on raw gold records (unknown
// fields are carried through) and return new records plus a summary.
//
// ═══════════════════════════════════════════════════════════════════════════════

import {
  boundedPattern,
  escapeRegExp,
  normalizeForMatch,
  normalizeWithOffsets,
  tokenize,
  type Offsets,
} from '../text/index.js';
import { getLogger } from '../observability/logging/index.js';
import type { GoldCaseRecord, RawEntity } from './schema.js';

const logger = getLogger({ component: 'gold-offsets' });

export const DEFAULT_REANCHOR_WINDOW = 250;
export const MAX_FILL_EXAMPLES = 20;
export const MAX_FIX_EXAMPLES = 10;

function integerOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isInteger(value) ? value : null;
}

function caseKey(record: GoldCaseRecord): string {
  return String(record.case_id);
}

// ─────────────────────────────────────────────────────────────────────────────────
// SEARCH
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Every whole-word occurrence of `text` in `rawText`, ignoring case, accents,
 * punctuation and runs of whitespace. Offsets are in `rawText`.
 */
export function findTextOccurrences(rawText: string, text: string): Offsets[] {
  const tokens = tokenize(normalizeForMatch(text));
  if (!rawText || tokens.length === 0) {
    return [];
  }

  const mapped = normalizeWithOffsets(rawText);
  const pattern = new RegExp(boundedPattern(tokens.map(escapeRegExp).join(' +')), 'gu');
  const found: Offsets[] = [];

  for (const m of mapped.text.matchAll(pattern)) {
    const first = m.index ?? 0;
    const start = mapped.starts[first];
    const end = mapped.ends[first + m[0].length - 1];
    if (start !== undefined && end !== undefined) {
      found.push({ start, end });
    }
  }

  return found;
}

/**
 * Comparison key for re-anchoring: NFKC, lowercase, dashes unified,
 * whitespace collapsed. Accents and punctuation are significant.
 */
export function searchKey(value: string): string {
  if (!value) {
    return '';
  }
  return value
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[–—]/g, '-')
    .replace(/\s+/g, ' ')
    .trim();
}

// ─────────────────────────────────────────────────────────────────────────────────
// FILL MISSING OFFSETS
// ─────────────────────────────────────────────────────────────────────────────────

export interface OffsetFillExample {
  case_id: string;
  text: string;
  match_count: number;
  reason?: string;
}

export interface OffsetFillReport {
  total_cases: number;
  total_entities: number;
  filled_count: number;
  ambiguous_count: number;
  not_found_count: number;
  examples: {
    ambiguous: OffsetFillExample[];
    not_found: OffsetFillExample[];
  };
}

export interface FillOffsetsOptions {
  /** Take the first occurrence when the text appears more than once. */
  allowAmbiguous?: boolean;
}

export interface GoldRepairResult<R> {
  records: GoldCaseRecord[];
  report: R;
}

/**
 * Add offsets to gold entities that have none, when their text occurs exactly
 * once in `raw_text`. Entities with integer offsets are left untouched.
 */
export function fillGoldOffsets(
  records: readonly GoldCaseRecord[],
  options: FillOffsetsOptions = {}
): GoldRepairResult<OffsetFillReport> {
  const report: OffsetFillReport = {
    total_cases: 0,
    total_entities: 0,
    filled_count: 0,
    ambiguous_count: 0,
    not_found_count: 0,
    examples: { ambiguous: [], not_found: [] },
  };

  const note = (kind: 'ambiguous' | 'not_found', example: OffsetFillExample): void => {
    const list = report.examples[kind];
    if (list.length < MAX_FILL_EXAMPLES) list.push(example);
  };

  const out = records.map(record => {
    const rawText = record.raw_text ?? '';
    const entities = record.gold_entities ?? [];
    report.total_cases++;
    report.total_entities += entities.length;

    const filled = entities.map((entity): RawEntity => {
      if (integerOrNull(entity.start) !== null && integerOrNull(entity.end) !== null) {
        return entity;
      }

      const text = entity.text || entity.span || '';
      if (!text || !rawText) {
        report.not_found_count++;
        note('not_found', { case_id: caseKey(record), text, match_count: 0, reason: 'empty_text_or_raw' });
        return entity;
      }

      const found = findTextOccurrences(rawText, text);
      const first = found[0];
      if (!first) {
        report.not_found_count++;
        note('not_found', { case_id: caseKey(record), text, match_count: 0 });
        return entity;
      }
      if (found.length > 1) {
        report.ambiguous_count++;
        note('ambiguous', { case_id: caseKey(record), text, match_count: found.length });
        return options.allowAmbiguous ? { ...entity, start: first.start, end: first.end } : entity;
      }

      report.filled_count++;
      return { ...entity, start: first.start, end: first.end };
    });

    return { ...record, gold_entities: filled };
  });

  logger.info('Gold offsets filled', {
    cases: report.total_cases,
    filled: report.filled_count,
    ambiguous: report.ambiguous_count,
    notFound: report.not_found_count,
  });

  return { records: out, report };
}

// ─────────────────────────────────────────────────────────────────────────────────
// RE-ANCHOR EXISTING OFFSETS
// ─────────────────────────────────────────────────────────────────────────────────

export type ReanchorStatus = 'unchanged' | 'ok' | 'ambiguous' | 'unresolved';

export type ReanchorMethod =
  | 'existing_ok'
  | 'exact_cs_window'
  | 'exact_cs_global'
  | 'exact_ci_window'
  | 'exact_ci_global'
  | 'regex_window'
  | 'regex_global';

export interface ReanchorResult {
  status: ReanchorStatus;
  oldStart: number | null;
  oldEnd: number | null;
  newStart: number | null;
  newEnd: number | null;
  method: ReanchorMethod | null;
  message?: string;
}

interface Candidate extends Offsets {
  readonly method: ReanchorMethod;
}

interface SearchRange {
  readonly from: number;
  readonly to: number;
  readonly scope: 'window' | 'global';
}

const METHODS: Record<SearchRange['scope'], Record<'cs' | 'ci' | 'regex', ReanchorMethod>> = {
  window: { cs: 'exact_cs_window', ci: 'exact_ci_window', regex: 'regex_window' },
  global: { cs: 'exact_cs_global', ci: 'exact_ci_global', regex: 'regex_global' },
};

function searchRange(rawText: string, hint: number | null, window: number): SearchRange {
  if (hint === null) {
    return { from: 0, to: rawText.length, scope: 'global' };
  }
  return {
    from: Math.max(0, hint - window),
    to: Math.min(rawText.length, hint + window),
    scope: 'window',
  };
}

function regexCandidates(
  rawText: string,
  range: SearchRange,
  source: string,
  method: ReanchorMethod
): Candidate[] {
  const slice = rawText.slice(range.from, range.to);
  return Array.from(slice.matchAll(new RegExp(source, 'giu')), m => {
    const start = range.from + (m.index ?? 0);
    return { start, end: start + m[0].length, method };
  });
}

/**
 * Case-sensitive substring hits (overlapping), then case-insensitive hits,
 * then whitespace-tolerant hits. A span found by several searches keeps the
 * first method.
 */
function collectCandidates(rawText: string, text: string, range: SearchRange): Candidate[] {
  const candidates: Candidate[] = [];
  const methods = METHODS[range.scope];
  const slice = rawText.slice(range.from, range.to);

  let idx = slice.indexOf(text);
  while (idx !== -1) {
    const start = range.from + idx;
    candidates.push({ start, end: start + text.length, method: methods.cs });
    idx = slice.indexOf(text, idx + 1);
  }

  candidates.push(...regexCandidates(rawText, range, escapeRegExp(text), methods.ci));

  const flexible = text.trim().split(/\s+/).map(escapeRegExp).join('\\s+');
  candidates.push(...regexCandidates(rawText, range, flexible, methods.regex));

  const seen = new Set<string>();
  return candidates.filter(c => {
    const key = `${c.start}:${c.end}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Move one entity onto `rawText`. Offsets that already cover the text are
 * kept; otherwise the search runs within `window` characters of the old start
 * (or over the whole text when there is none) and the nearest hit wins.
 */
export function reanchorEntity(
  rawText: string,
  text: string,
  oldStart: number | null = null,
  oldEnd: number | null = null,
  window: number = DEFAULT_REANCHOR_WINDOW
): ReanchorResult {
  const unresolved = (message: string, method: ReanchorMethod | null = null): ReanchorResult => ({
    status: 'unresolved',
    oldStart,
    oldEnd,
    newStart: null,
    newEnd: null,
    method,
    message,
  });

  if (!rawText || !text) {
    return unresolved('empty_raw_or_text');
  }

  if (oldStart !== null && oldEnd !== null && oldStart >= 0 && oldStart < oldEnd && oldEnd <= rawText.length) {
    const span = rawText.slice(oldStart, oldEnd);
    if (span === text || searchKey(span) === searchKey(text)) {
      return { status: 'unchanged', oldStart, oldEnd, newStart: oldStart, newEnd: oldEnd, method: 'existing_ok' };
    }
  }

  const candidates = collectCandidates(rawText, text, searchRange(rawText, oldStart, window));
  const first = candidates[0];
  if (!first) {
    return unresolved('no_match_found');
  }

  let best = first;
  if (oldStart !== null) {
    for (const candidate of candidates) {
      if (Math.abs(candidate.start - oldStart) < Math.abs(best.start - oldStart)) {
        best = candidate;
      }
    }
  }

  if (searchKey(rawText.slice(best.start, best.end)) !== searchKey(text)) {
    return unresolved('span_text_mismatch_after_match', best.method);
  }

  return {
    status: candidates.length === 1 ? 'ok' : 'ambiguous',
    oldStart,
    oldEnd,
    newStart: best.start,
    newEnd: best.end,
    method: best.method,
  };
}

export interface OffsetFixMeta {
  status: ReanchorStatus;
  method: ReanchorMethod | null;
  old_start: number | null;
  old_end: number | null;
  message?: string;
}

export interface OffsetFixExample {
  case_id: string;
  text: string;
  old_start: number | null;
  old_end: number | null;
  new_start?: number | null;
  new_end?: number | null;
  span?: string;
  method?: ReanchorMethod | null;
  message?: string;
}

export interface OffsetFixReport {
  total_cases: number;
  total_entities: number;
  fixed_count: number;
  unchanged_count: number;
  unresolved_count: number;
  ambiguous_count: number;
  status_counts: Partial<Record<ReanchorStatus, number>>;
  examples: Partial<Record<ReanchorStatus, OffsetFixExample[]>>;
}

export interface FixOffsetsOptions {
  window?: number;
}

/**
 * Re-anchor every gold entity onto its case's `raw_text`. Moved and
 * unresolved entities carry an `offset_fix_meta` record; unresolved ones
 * keep their old offsets.
 */
export function fixGoldOffsets(
  records: readonly GoldCaseRecord[],
  options: FixOffsetsOptions = {}
): GoldRepairResult<OffsetFixReport> {
  const window = options.window ?? DEFAULT_REANCHOR_WINDOW;
  const report: OffsetFixReport = {
    total_cases: 0,
    total_entities: 0,
    fixed_count: 0,
    unchanged_count: 0,
    unresolved_count: 0,
    ambiguous_count: 0,
    status_counts: {},
    examples: {},
  };

  const note = (status: ReanchorStatus, example: OffsetFixExample): void => {
    const list = report.examples[status] ?? [];
    if (list.length < MAX_FIX_EXAMPLES) list.push(example);
    report.examples[status] = list;
  };

  const out = records.map(record => {
    const rawText = record.raw_text ?? '';
    const entities = record.gold_entities ?? [];
    report.total_cases++;
    report.total_entities += entities.length;

    const fixed = entities.map((entity): RawEntity => {
      const text = entity.text || entity.span || '';
      const result = reanchorEntity(rawText, text, integerOrNull(entity.start), integerOrNull(entity.end), window);
      report.status_counts[result.status] = (report.status_counts[result.status] ?? 0) + 1;

      const meta: OffsetFixMeta = {
        status: result.status,
        method: result.method,
        old_start: result.oldStart,
        old_end: result.oldEnd,
      };

      if (result.status === 'unchanged') {
        report.unchanged_count++;
        return entity;
      }

      if (result.status === 'unresolved' || result.newStart === null || result.newEnd === null) {
        report.unresolved_count++;
        note(result.status, {
          case_id: caseKey(record),
          text,
          old_start: result.oldStart,
          old_end: result.oldEnd,
          message: result.message,
        });
        return { ...entity, offset_fix_meta: { ...meta, message: result.message } };
      }

      report.fixed_count++;
      if (result.status === 'ambiguous') report.ambiguous_count++;
      note(result.status, {
        case_id: caseKey(record),
        text,
        old_start: result.oldStart,
        old_end: result.oldEnd,
        new_start: result.newStart,
        new_end: result.newEnd,
        span: rawText.slice(result.newStart, result.newEnd),
        method: result.method,
      });
      return { ...entity, start: result.newStart, end: result.newEnd, offset_fix_meta: meta };
    });

    return { ...record, gold_entities: fixed };
  });

  logger.info('Gold offsets re-anchored', {
    cases: report.total_cases,
    fixed: report.fixed_count,
    unchanged: report.unchanged_count,
    unresolved: report.unresolved_count,
    ambiguous: report.ambiguous_count,
  });

  return { records: out, report };
}

// ─────────────────────────────────────────────────────────────────────────────────
// RAW TEXT SYNC
// ─────────────────────────────────────────────────────────────────────────────────

export interface TextSyncReport {
  total_cases: number;
  synced_cases: number;
  missing_in_cases_dir: string[];
  /** Synced cases whose text length changed, so old offsets are suspect. */
  length_changed_count: number;
}

/**
 * Replace each gold `raw_text` with the canonical text of the same case id
 * (usually the text the pipeline ran on).
 */
export function syncGoldRawText(
  records: readonly GoldCaseRecord[],
  canonical: ReadonlyMap<string, string>
): GoldRepairResult<TextSyncReport> {
  const report: TextSyncReport = {
    total_cases: records.length,
    synced_cases: 0,
    missing_in_cases_dir: [],
    length_changed_count: 0,
  };

  const out = records.map(record => {
    const key = caseKey(record);
    const text = canonical.get(key);
    if (text === undefined) {
      report.missing_in_cases_dir.push(key);
      return record;
    }
    if (record.raw_text === text) {
      return record;
    }

    report.synced_cases++;
    if ((record.raw_text ?? '').length !== text.length) report.length_changed_count++;
    return { ...record, raw_text: text };
  });

  if (report.missing_in_cases_dir.length > 0) {
    logger.warn('Gold cases without canonical text', {
      count: report.missing_in_cases_dir.length,
      sample: report.missing_in_cases_dir.slice(0, 5),
    });
  }

  return { records: out, report };
}
