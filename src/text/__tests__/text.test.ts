// ═══════════════════════════════════════════════════════════════════════════════
// TEXT TESTS — Normalization, Segmentation, Span Offsets
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import {
  foldDiacritics,
  normalizeForMatch,
  normalizeWithOffsets,
  foldCaseInPlace,
  normalizeText,
  boundedPattern,
  escapeRegExp,
} from '../normalize.js';
import {
  CompromiseSentenceSplitter,
  PunctuationSentenceSplitter,
  locateSentences,
} from '../segment.js';
import { normalizeSpan, findSpanInOriginal } from '../span.js';

// ─────────────────────────────────────────────────────────────────────────────────
// NORMALIZATION
// ─────────────────────────────────────────────────────────────────────────────────

describe('normalizeForMatch', () => {
  it('should lowercase, fold accents and strip punctuation', () => {
    expect(normalizeForMatch('Cefaléia, INTENSA!')).toBe('cefaleia intensa');
  });

  it('should keep hyphens and collapse whitespace', () => {
    expect(normalizeForMatch('  raio-X \n de   tórax ')).toBe('raio-x de torax');
  });

  it('should return empty string for empty input', () => {
    expect(normalizeForMatch('')).toBe('');
  });
});

describe('foldDiacritics', () => {
  it('should preserve length for precomposed text', () => {
    const folded = foldDiacritics('náuseas e vômitos');
    expect(folded).toBe('nauseas e vomitos');
    expect(folded.length).toBe('náuseas e vômitos'.length);
  });
});

describe('normalizeText', () => {
  it('should standardize blood pressure notation and punctuation spacing', () => {
    expect(normalizeText('PA 120/80 mmHg ,ok')).toBe('PA 120 x 80 mmHg, ok');
  });

  it('should normalize line endings and cap blank lines', () => {
    expect(normalizeText('a\r\n\r\n\r\nb')).toBe('a\n\nb');
  });

  it('should collapse runs of spaces and tabs', () => {
    expect(normalizeText('febre\t\t  alta')).toBe('febre alta');
  });
});

describe('boundedPattern', () => {
  it('should treat accented letters as word characters', () => {
    const re = new RegExp(boundedPattern(escapeRegExp('dor')), 'iu');
    expect(re.test('dorção')).toBe(false);
    expect(re.test('com dor.')).toBe(true);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// SEGMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

describe('PunctuationSentenceSplitter', () => {
  it('should split on terminal punctuation and blank lines', () => {
    const text = 'Paciente com febre. Nega dor?\n\nHPP: diabetes.';
    const sentences = new PunctuationSentenceSplitter().split(text);

    expect(sentences).toEqual([
      { text: 'Paciente com febre.', start: 0, end: 19 },
      { text: 'Nega dor?', start: 20, end: 29 },
      { text: 'HPP: diabetes.', start: 31, end: 45 },
    ]);
  });
});

describe('locateSentences', () => {
  it('should tolerate whitespace rewritten by the splitter', () => {
    const text = 'febre  alta. dor';
    expect(locateSentences(text, ['febre alta.', 'dor'])).toEqual([
      { text: 'febre  alta.', start: 0, end: 12 },
      { text: 'dor', start: 13, end: 16 },
    ]);
  });

  it('should resolve repeated sentences to successive occurrences', () => {
    const text = 'Sem febre. Sem febre.';
    const sentences = locateSentences(text, ['Sem febre.', 'Sem febre.']);
    expect(sentences.map(s => s.start)).toEqual([0, 11]);
  });
});

describe('CompromiseSentenceSplitter', () => {
  it('should return sentences that slice back out of the document', () => {
    const text = 'Paciente com febre alta. Nega dor torácica.';
    const sentences = new CompromiseSentenceSplitter().split(text);

    expect(sentences.length).toBeGreaterThan(0);
    let previousEnd = 0;
    for (const sentence of sentences) {
      expect(text.slice(sentence.start, sentence.end)).toBe(sentence.text);
      expect(sentence.start).toBeGreaterThanOrEqual(previousEnd);
      previousEnd = sentence.end;
    }
  });

  it('should return nothing for blank text', () => {
    expect(new CompromiseSentenceSplitter().split('   ')).toEqual([]);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// SPANS
// ─────────────────────────────────────────────────────────────────────────────────

describe('normalizeSpan', () => {
  it('should trim trailing punctuation', () => {
    expect(normalizeSpan('febre, alta', 0, 6)).toEqual({ start: 0, end: 5 });
  });

  it('should expand partial tokens to whole words', () => {
    expect(normalizeSpan('Paciente com febre alta', 15, 17)).toEqual({ start: 13, end: 18 });
  });

  it('should return null when nothing alphanumeric remains', () => {
    expect(normalizeSpan('a  ,  b', 1, 6)).toBeNull();
    expect(normalizeSpan('abc', 2, 2)).toBeNull();
  });

  it('should be idempotent', () => {
    const text = 'Refere (cefaléia) e dor-de-cabeça há 2 dias.';
    for (let start = 0; start < text.length; start++) {
      for (let end = start + 1; end <= text.length; end++) {
        const first = normalizeSpan(text, start, end);
        if (!first) continue;
        expect(normalizeSpan(text, first.start, first.end)).toEqual(first);
      }
    }
  });
});

describe('normalizeWithOffsets', () => {
  it('should produce the same key as normalizeForMatch', () => {
    const original = 'Dor  no   TÓRAX, (leve) - ok ';
    const mapped = normalizeWithOffsets(original);

    expect(mapped.text).toBe('dor no torax leve - ok');
    expect(mapped.text).toBe(normalizeForMatch(original));
  });

  it('should trace each key character to its original range', () => {
    const mapped = normalizeWithOffsets('Dor  no   TÓRAX');

    expect(mapped.text).toBe('dor no torax');
    expect(mapped.starts[7]).toBe(10);
    expect(mapped.ends[11]).toBe(15);
  });
});

describe('foldCaseInPlace', () => {
  it('should keep characters whose case mapping changes length', () => {
    expect(foldCaseInPlace('ﬁbrose ß (a09)', 'upper')).toBe('ﬁBROSE ß (A09)');
    expect(foldCaseInPlace('ﬁbrose ß (a09)', 'upper').length).toBe('ﬁbrose ß (a09)'.length);
  });

  it('should lowercase ordinary text', () => {
    expect(foldCaseInPlace('Dipirona 500 MG', 'lower')).toBe('dipirona 500 mg');
  });
});

describe('findSpanInOriginal', () => {
  it('should map a normalized match back to accented text', () => {
    const original = 'Refere cefaléia.';
    const result = findSpanInOriginal(original, normalizeForMatch(original), 'cefaleia', 100);

    expect(result).toEqual({ kind: 'exact', start: 107, end: 115 });
  });

  it('should return offsets that are already on token boundaries', () => {
    const original = 'Paciente apresenta febre alta e cefaleia intensa.';
    const result = findSpanInOriginal(original, normalizeForMatch(original), 'febre');

    expect(result).toEqual({ kind: 'exact', start: 19, end: 24 });
    if (result.kind === 'exact') {
      expect(normalizeSpan(original, result.start, result.end)).toEqual({ start: 19, end: 24 });
    }
  });

  it('should use the given normalized position instead of the first occurrence', () => {
    const original = 'Exame do dorso sem alterações, refere dor.';
    const normalized = normalizeForMatch(original);

    expect(findSpanInOriginal(original, normalized, 'dor', 0, 37)).toEqual({
      kind: 'exact',
      start: 38,
      end: 41,
    });
  });

  it('should ignore a position where the pattern does not start', () => {
    const original = 'febre e dor';
    const result = findSpanInOriginal(original, normalizeForMatch(original), 'dor', 0, 2);

    expect(result).toEqual({ kind: 'exact', start: 8, end: 11 });
  });

  it('should fall back to approximate offsets when the key does not match the text', () => {
    const result = findSpanInOriginal('xxxxxxxxxxxxxxxx', 'febre', 'febre', 10);
    expect(result).toEqual({ kind: 'approximate', start: 10, end: 15 });
  });

  it('should report not_found when the pattern is absent', () => {
    expect(findSpanInOriginal('dor', 'dor', 'febre')).toEqual({ kind: 'not_found' });
  });
});
