// ═══════════════════════════════════════════════════════════════════════════════
// SPAN OFFSETS — Boundary Normalization and Position Search
// ═══════════════════════════════════════════════════════════════════════════════

import { isAlnum, normalizeWithOffsets } from './normalize.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface Offsets {
  readonly start: number;
  readonly end: number;
}

/**
 * Outcome of mapping a normalized match back into original text.
 * `approximate` reuses the normalized offset when it cannot be traced back.
 */
export type SpanSearchResult =
  | { readonly kind: 'exact'; readonly start: number; readonly end: number }
  | { readonly kind: 'approximate'; readonly start: number; readonly end: number }
  | { readonly kind: 'not_found' };

// ─────────────────────────────────────────────────────────────────────────────────
// BOUNDARIES
// ─────────────────────────────────────────────────────────────────────────────────

export function clampOffsets(start: number, end: number, min: number, max: number): Offsets {
  return {
    start: Math.max(min, Math.min(start, max)),
    end: Math.max(min, Math.min(end, max)),
  };
}

/**
 * Trim non-alphanumeric characters at both ends, then grow the span over
 * adjacent letters/digits so it covers whole tokens ("febre," → "febre",
 * "ebr" inside "febre" → "febre"). Returns null when nothing alphanumeric remains.
 *
 * Idempotent: the result starts and ends on alphanumerics with no
 * alphanumeric neighbours.
 */
export function normalizeSpan(text: string, start: number, end: number): Offsets | null {
  const n = text.length;
  let s = Math.max(0, Math.min(start, n));
  let e = Math.max(0, Math.min(end, n));

  if (s >= e) {
    return null;
  }

  while (s < e && !isAlnum(text.charAt(s))) s++;
  while (e > s && !isAlnum(text.charAt(e - 1))) e--;

  if (s >= e) {
    return null;
  }

  while (s > 0 && isAlnum(text.charAt(s - 1))) s--;
  while (e < n && isAlnum(text.charAt(e))) e++;

  return { start: s, end: e };
}

// ─────────────────────────────────────────────────────────────────────────────────
// POSITION SEARCH
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Map `pattern` (already normalized) found in `normalized` back onto
 * `original`, the text `normalized` was derived from. `position` is the
 * normalized index of the match when the caller already knows it (a
 * word-bounded hit); otherwise the first occurrence is used.
 *
 * When `normalized` is the match key of `original`, the match is traced back
 * character by character. Otherwise the normalized offset is reused as an
 * approximation. Offsets are shifted by `offset` (the sentence start).
 */
export function findSpanInOriginal(
  original: string,
  normalized: string,
  pattern: string,
  offset: number = 0,
  position?: number
): SpanSearchResult {
  if (!pattern) {
    return { kind: 'not_found' };
  }

  const normIdx = position !== undefined && normalized.startsWith(pattern, position)
    ? position
    : normalized.indexOf(pattern);
  if (normIdx === -1) {
    return { kind: 'not_found' };
  }

  const mapped = normalizeWithOffsets(original);
  if (mapped.text === normalized) {
    const start = mapped.starts[normIdx];
    const end = mapped.ends[normIdx + pattern.length - 1];
    if (start !== undefined && end !== undefined) {
      return { kind: 'exact', start: offset + start, end: offset + end };
    }
  }

  return { kind: 'approximate', start: offset + normIdx, end: offset + normIdx + pattern.length };
}
