// ═══════════════════════════════════════════════════════════════════════════════
// FILTER TESTS — Offsets, Length, Stopwords, Symptom Nucleus
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import {
  filterEntities,
  filterEntitiesWithStats,
  getDefaultFilterTerms,
  tokenizeSpan,
  trimPunctuation,
  type FilterableEntity,
} from '../filters.js';
import type { EntityType } from '../../types/entities.js';

function entity(text: string, span: string, type: EntityType, from = 0): FilterableEntity {
  const start = text.indexOf(span, from);
  return { span, start, end: start + span.length, type };
}

describe('filterEntities', () => {
  it('should drop a stopword-only symptom span', () => {
    const kept = filterEntities([{ span: 'com', start: 0, end: 3, type: 'SYMPTOM' }], 'com');
    expect(kept).toEqual([]);
  });

  it('should trim boundary punctuation and update offsets', () => {
    const text = 'febre, tosse';
    const kept = filterEntities([{ span: 'febre,', start: 0, end: 6, type: 'SYMPTOM' }], text);
    expect(kept).toEqual([{ span: 'febre', start: 0, end: 5, type: 'SYMPTOM' }]);
  });

  it('should keep punctuation when trimming is disabled', () => {
    const text = 'refere (febre) alta';
    const kept = filterEntities([entity(text, '(febre)', 'SYMPTOM')], text, { trimPunct: false });
    expect(kept.map(e => e.span)).toEqual(['(febre)']);
  });

  it('should require a nucleus token for symptoms only', () => {
    const text = 'mancha no braço e mancha na pele';
    const symptom = entity(text, 'mancha', 'SYMPTOM');
    const drug = entity(text, 'mancha', 'DRUG', 10);

    expect(filterEntities([symptom, drug], text)).toEqual([drug]);
  });

  it('should match nucleus words regardless of accents', () => {
    const text = 'Vômito intenso';
    expect(filterEntities([entity(text, 'Vômito intenso', 'SYMPTOM')], text)).toHaveLength(1);
  });

  it('should leave types outside the filtered set alone', () => {
    const text = 'paciente refere';
    const test = entity(text, 'paciente refere', 'TEST');

    expect(filterEntities([test], text)).toEqual([test]);
    expect(filterEntities([test], text, { applyToTypes: [] })).toEqual([]);
  });

  it('should drop invalid offsets, short spans and spans without letters', () => {
    const text = 'PA 120/80, dor';
    const { entities, stats } = filterEntitiesWithStats([
      { span: 'dor', start: 11, end: 99, type: 'SYMPTOM' },
      { span: 'dor', start: 11.5, end: 14, type: 'SYMPTOM' },
      { span: 'dor', start: 11, end: 14, type: 'SYMPTOM' },
      { span: '120/80', start: 3, end: 9, type: 'TEST' },
    ], text);

    expect(entities).toEqual([]);
    expect(stats).toEqual({
      input: 4,
      kept: 0,
      dropped: 4,
      byReason: { invalid_offsets: 2, too_short: 1, no_letters: 1 },
    });
  });

  it('should accept custom term lists', () => {
    const text = 'coceira leve';
    const itch = entity(text, 'coceira leve', 'SYMPTOM');

    expect(filterEntities([itch], text)).toEqual([]);
    expect(filterEntities([itch], text, { stopwords: ['leve'], symptomNucleus: ['coceira'] })).toEqual([itch]);
  });
});

describe('filter helpers', () => {
  it('should trim only non-alphanumeric, non-space characters', () => {
    expect(trimPunctuation('(febre).', 0, 8)).toEqual({ start: 1, end: 6 });
    expect(trimPunctuation(' febre ', 0, 7)).toEqual({ start: 0, end: 7 });
    expect(trimPunctuation('abc', 2, 1)).toEqual({ start: 2, end: 1 });
  });

  it('should split spans into lowercase word tokens', () => {
    expect(tokenizeSpan('Dor-de-Cabeça, forte!')).toEqual(['dor', 'de', 'cabeça', 'forte']);
  });

  it('should load the default term lists', () => {
    const terms = getDefaultFilterTerms();
    expect(terms.stopwords).toContain('paciente');
    expect(terms.symptomNucleus).toContain('cefaleia');
  });
});
