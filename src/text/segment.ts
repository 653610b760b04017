// ═══════════════════════════════════════════════════════════════════════════════
// SENTENCE SEGMENTATION — Boundary Detection Located Back Into the Document
// ═══════════════════════════════════════════════════════════════════════════════

import nlp from 'compromise';
import type { Sentence } from '../types/entities.js';
import { escapeRegExp } from './normalize.js';

// ─────────────────────────────────────────────────────────────────────────────────
// INTERFACE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Produces ordered, non-overlapping sentences with `text === doc.slice(start, end)`.
 */
export interface SentenceSplitter {
  readonly name: string;
  split(text: string): Sentence[];
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOCATING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Find each sentence string in the document, moving a cursor forward so
 * repeated sentences resolve to successive occurrences. Pieces that cannot be
 * found (the splitter rewrote whitespace) fall back to a whitespace-tolerant
 * search; anything still missing is dropped.
 */
export function locateSentences(text: string, pieces: readonly string[]): Sentence[] {
  const sentences: Sentence[] = [];
  let cursor = 0;

  for (const piece of pieces) {
    const trimmed = piece.trim();
    if (!trimmed) continue;

    let start = text.indexOf(trimmed, cursor);
    let end = start + trimmed.length;

    if (start === -1) {
      const source = trimmed.split(/\s+/).map(escapeRegExp).join('\\s+');
      const re = new RegExp(source, 'gu');
      re.lastIndex = cursor;
      const match = re.exec(text);
      if (!match) continue;
      start = match.index;
      end = start + match[0].length;
    }

    sentences.push({ text: text.slice(start, end), start, end });
    cursor = end;
  }

  return sentences;
}

// ─────────────────────────────────────────────────────────────────────────────────
// IMPLEMENTATIONS
// ─────────────────────────────────────────────────────────────────────────────────

function toStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Default splitter backed by compromise's sentence boundary detector.
 */
export class CompromiseSentenceSplitter implements SentenceSplitter {
  readonly name = 'compromise';

  split(text: string): Sentence[] {
    if (!text.trim()) {
      return [];
    }
    const pieces: unknown = nlp(text).sentences().out('array');
    return locateSentences(text, toStringArray(pieces));
  }
}

/**
 * Deterministic splitter: breaks after `.`, `!` or `?` followed by whitespace,
 * and on blank lines.
 */
export class PunctuationSentenceSplitter implements SentenceSplitter {
  readonly name = 'punctuation';

  split(text: string): Sentence[] {
    const pieces = text.split(/(?<=[.!?])\s+|\n\s*\n/);
    return locateSentences(text, pieces);
  }
}
