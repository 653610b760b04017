// ═══════════════════════════════════════════════════════════════════════════════
// LEXICON TESTS — Index Build, Candidate Lookup, File Loading
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { LexiconIndex } from '../lexicon-index.js';
import {
  loadLexiconFile,
  loadAllLexicons,
  buildLexiconIndex,
  DEFAULT_LEXICON,
} from '../loader.js';
import { normalizeForMatch, tokenize } from '../../text/index.js';
import { ErrorCode } from '../../types/result.js';

function lookup(index: LexiconIndex, sentence: string) {
  const norm = normalizeForMatch(sentence);
  return index.findCandidates(norm, tokenize(norm));
}

// ─────────────────────────────────────────────────────────────────────────────────
// INDEX
// ─────────────────────────────────────────────────────────────────────────────────

describe('LexiconIndex', () => {
  it('should keep one entry per normalized term, first occurrence wins', () => {
    const index = new LexiconIndex([
      { term: 'Cefaléia', entityType: 'SYMPTOM' },
      { term: 'cefaleia', entityType: 'PROBLEM' },
      { term: 'CEFALEIA!', entityType: 'TEST' },
      { term: 'febre', entityType: 'SYMPTOM' },
    ]);

    expect(index.size).toBe(2);
    expect(index.entries[0]).toEqual({
      originalTerm: 'Cefaléia',
      normalizedTerm: 'cefaleia',
      tokens: ['cefaleia'],
      entityType: 'SYMPTOM',
    });
  });

  it('should skip terms that normalize to nothing', () => {
    const index = new LexiconIndex([{ term: '...', entityType: 'SYMPTOM' }]);
    expect(index.size).toBe(0);
  });

  it('should return no candidates from an empty index', () => {
    const index = new LexiconIndex([]);
    expect(lookup(index, 'febre alta')).toEqual([]);
    expect(index.findFuzzyCandidates('febre alta', ['febre', 'alta'], [])).toEqual([]);
  });

  it('should report multi-word phrases as exact and single words as token', () => {
    const index = new LexiconIndex([
      { term: 'dor abdominal', entityType: 'SYMPTOM' },
      { term: 'febre', entityType: 'SYMPTOM' },
    ]);

    const candidates = lookup(index, 'Refere dor abdominal e febre.');
    expect(candidates.map(c => [c.normalizedTerm, c.matchType])).toEqual([
      ['dor abdominal', 'exact'],
      ['febre', 'token'],
    ]);
  });

  it('should require whole-word matches for single tokens', () => {
    const index = new LexiconIndex([{ term: 'dor', entityType: 'SYMPTOM' }]);
    expect(lookup(index, 'dorsalgia importante')).toEqual([]);
  });

  it('should point single tokens at their whole-word occurrence', () => {
    const index = new LexiconIndex([{ term: 'dor', entityType: 'SYMPTOM' }]);
    const candidates = lookup(index, 'Exame do dorso sem alterações, refere dor.');

    expect(candidates.map(c => [c.normalizedTerm, c.position])).toEqual([['dor', 37]]);
  });

  it('should not emit a multi-word term twice', () => {
    const index = new LexiconIndex([{ term: 'cultura de urina', entityType: 'TEST' }]);
    const candidates = lookup(index, 'solicitada cultura de urina');
    expect(candidates).toHaveLength(1);
    expect(candidates[0]?.matchType).toBe('exact');
  });

  it('should seed fuzzy candidates only when nothing matched', () => {
    const index = new LexiconIndex([
      { term: 'dor epigástrica', entityType: 'SYMPTOM' },
      { term: 'dor abdominal', entityType: 'SYMPTOM' },
    ]);
    const norm = normalizeForMatch('dor epigastrca');
    const tokens = tokenize(norm);

    const existing = index.findCandidates(norm, tokens);
    expect(existing).toEqual([]);

    const fuzzy = index.findFuzzyCandidates(norm, tokens, existing);
    expect(fuzzy.map(c => c.normalizedTerm)).toEqual(['dor epigastrica', 'dor abdominal']);
    expect(fuzzy.every(c => c.matchType === 'fuzzy')).toBe(true);

    expect(index.findFuzzyCandidates(norm, tokens, fuzzy)).toEqual([]);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// LOADER
// ─────────────────────────────────────────────────────────────────────────────────

describe('Lexicon loader', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'lexicon-'));
    await writeFile(path.join(dir, 'core.txt'), 'febre\n\n  cefaleia  \n');
    await writeFile(path.join(dir, 'expanded.txt'), 'Febre\ncefaléia\ncalafrios\n');
    await writeFile(path.join(dir, 'drugs.txt'), 'dipirona\n');
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read one trimmed term per line', async () => {
    const result = await loadLexiconFile(path.join(dir, 'core.txt'), 'SYMPTOM');
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toEqual([
        { term: 'febre', entityType: 'SYMPTOM' },
        { term: 'cefaleia', entityType: 'SYMPTOM' },
      ]);
    }
  });

  it('should return an error result for a missing file', async () => {
    const result = await loadLexiconFile(path.join(dir, 'missing.txt'), 'SYMPTOM');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.DATA_FILE_MISSING);
    }
  });

  it('should load by priority and drop accent/case duplicates', async () => {
    const result = await loadAllLexicons(dir, [
      { filename: 'expanded.txt', entityType: 'SYMPTOM', priority: 2 },
      { filename: 'core.txt', entityType: 'SYMPTOM', priority: 1 },
      { filename: 'drugs.txt', entityType: 'DRUG', priority: 1 },
      { filename: 'absent.txt', entityType: 'TEST', priority: 1 },
    ]);

    expect(result.terms.map(t => t.term)).toEqual(['febre', 'cefaleia', 'dipirona', 'calafrios']);
    expect(result.filesLoaded).toEqual(['core.txt', 'drugs.txt', 'expanded.txt']);
    expect(result.warnings).toHaveLength(1);
  });

  it('should warn instead of failing when the directory is missing', async () => {
    const result = await loadAllLexicons(path.join(dir, 'nope'), []);
    expect(result.terms).toEqual([]);
    expect(result.warnings[0]?.code).toBe(ErrorCode.DATA_FILE_MISSING);
  });

  it('should fall back to the built-in lexicon when nothing loads', async () => {
    const index = await buildLexiconIndex(path.join(dir, 'nope'), []);
    expect(index.size).toBe(DEFAULT_LEXICON.length);
  });
});
