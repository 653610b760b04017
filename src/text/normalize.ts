// ═══════════════════════════════════════════════════════════════════════════════
// TEXT NORMALIZATION — Match Keys, Diacritic Folding, Document Preprocessing
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// CHARACTER CLASSES
// ─────────────────────────────────────────────────────────────────────────────────

const ALNUM_CHAR = /[\p{L}\p{N}]/u;

export function isAlnum(ch: string): boolean {
  return ch !== '' && ALNUM_CHAR.test(ch);
}

/**
 * Escape a literal for use inside a RegExp source.
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * `\b` over Unicode letters and digits. JS `\b` only knows ASCII word
 * characters, so "dor" would match inside "dorção". Use with the `u` flag.
 */
export const WORD_BOUNDARY = '(?:(?<=[\\p{L}\\p{N}_])(?![\\p{L}\\p{N}_])|(?<![\\p{L}\\p{N}_])(?=[\\p{L}\\p{N}_]))';

export function boundedPattern(source: string): string {
  return `${WORD_BOUNDARY}(?:${source})${WORD_BOUNDARY}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// MATCH NORMALIZATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Strip combining marks after canonical decomposition.
 * Length-preserving for precomposed Latin text ("febrícula" → "febricula").
 */
export function foldDiacritics(value: string): string {
  return value.normalize('NFD').replace(/\p{M}/gu, '');
}

/**
 * Match key shared by the lexicon index and the span matcher:
 * lowercase, folded, single-spaced, punctuation removed except hyphens.
 */
export function normalizeForMatch(value: string): string {
  if (!value) {
    return '';
  }
  return foldDiacritics(value.toLowerCase())
    .replace(/\s+/g, ' ')
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .trim();
}

/**
 * A match key with, per UTF-16 unit of `text`, the original range it came from.
 */
export interface NormalizedText {
  readonly text: string;
  readonly starts: readonly number[];
  readonly ends: readonly number[];
}

interface MappedChar {
  readonly ch: string;
  readonly start: number;
  readonly end: number;
}

const WHITESPACE_CHAR = /\s/u;
const KEPT_CHAR = /[\p{L}\p{N}_\s-]/u;

/**
 * `normalizeForMatch` applied code point by code point, so every character of
 * the key can be traced back to its range in `value`. Steps run in the same
 * order, so `text` equals `normalizeForMatch(value)`.
 */
export function normalizeWithOffsets(value: string): NormalizedText {
  const folded: MappedChar[] = [];
  let pos = 0;
  for (const cp of value) {
    for (const ch of foldDiacritics(cp.toLowerCase())) {
      folded.push({ ch, start: pos, end: pos + cp.length });
    }
    pos += cp.length;
  }

  const collapsed: MappedChar[] = [];
  for (const item of folded) {
    if (!WHITESPACE_CHAR.test(item.ch)) {
      collapsed.push(item);
      continue;
    }
    const last = collapsed[collapsed.length - 1];
    if (last && last.ch === ' ') continue;
    collapsed.push({ ...item, ch: ' ' });
  }

  const kept = collapsed.filter(item => KEPT_CHAR.test(item.ch));
  let first = 0;
  let last = kept.length;
  while (first < last && kept[first]?.ch === ' ') first++;
  while (last > first && kept[last - 1]?.ch === ' ') last--;

  let text = '';
  const starts: number[] = [];
  const ends: number[] = [];
  for (const item of kept.slice(first, last)) {
    text += item.ch;
    for (let k = 0; k < item.ch.length; k++) {
      starts.push(item.start);
      ends.push(item.end);
    }
  }
  return { text, starts, ends };
}

/**
 * Upper- or lowercase without changing the string's length. Characters whose
 * case mapping would grow or shrink ("ß" → "SS", "ﬁ" → "FI") are kept as they
 * are, so match offsets in the folded string are valid in `value`.
 */
export function foldCaseInPlace(value: string, direction: 'upper' | 'lower'): string {
  let out = '';
  for (const cp of value) {
    const mapped = direction === 'upper' ? cp.toUpperCase() : cp.toLowerCase();
    out += mapped.length === cp.length ? mapped : cp;
  }
  return out;
}

/**
 * Whitespace tokens of an already-normalized string.
 */
export function tokenize(normalized: string): string[] {
  return normalized.split(' ').filter(Boolean);
}

// ─────────────────────────────────────────────────────────────────────────────────
// DOCUMENT PREPROCESSING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Clean raw note text before segmentation. Offsets produced downstream refer
 * to the returned string, so callers must keep it alongside predictions.
 */
export function normalizeText(raw: string): string {
  if (!raw) {
    return '';
  }

  return raw
    .replace(/\r\n|\r/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .replace(/[ \t]+/g, ' ')
    // "120/80", "120 X 80" → "120 x 80"
    .replace(/(\d{2,3})\s*[xX/]\s*(\d{2,3})/g, '$1 x $2')
    .replace(/\s+([,;:.])/g, '$1')
    .replace(/([,;:])(\S)/g, '$1 $2')
    .trim();
}
