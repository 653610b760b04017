// ═══════════════════════════════════════════════════════════════════════════════
// PIPELINE TESTS — Document Processing, Batches, Case Loading, Output
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { ClinicalPipeline } from '../clinical-pipeline.js';
import { createPipeline } from '../factory.js';
import { formatDocId, loadJsonCases, parseCases } from '../cases.js';
import { writeDocumentPredictions, writePredictions } from '../output.js';
import type { CaseDocument } from '../types.js';
import type { EntityExtractor } from '../../ner/types.js';
import { SpanMatcher } from '../../ner/span-matcher.js';
import { LexiconIndex } from '../../lexicon/index.js';
import { PunctuationSentenceSplitter } from '../../text/index.js';
import { loadTestConfig } from '../../config/loader.js';
import { FormatError } from '../../types/result.js';
import type { EntitySpan, Sentence } from '../../types/entities.js';

// ─────────────────────────────────────────────────────────────────────────────────
// FIXTURES
// ─────────────────────────────────────────────────────────────────────────────────

function doc(caseId: number, text: string): CaseDocument {
  return { docId: formatDocId('cases', caseId), text, source: 'cases.json', caseId, group: 'prontuario' };
}

/**
 * Emits every occurrence of the given words as SYMPTOM spans; throws on "ERRO".
 */
class WordExtractor implements EntityExtractor {
  readonly name = 'words';

  constructor(private readonly words: readonly string[]) {}

  extract(text: string, sentences: readonly Sentence[]): EntitySpan[] {
    if (text.includes('ERRO')) {
      throw new Error('extractor failure');
    }

    const spans: EntitySpan[] = [];
    for (const sentence of sentences) {
      for (const word of this.words) {
        const at = sentence.text.indexOf(word);
        if (at === -1) continue;
        const start = sentence.start + at;
        spans.push({
          span: word,
          start,
          end: start + word.length,
          type: 'SYMPTOM',
          score: 0.95,
          sentenceStart: sentence.start,
          sentenceEnd: sentence.end,
          evidence: sentence.text,
        });
      }
    }
    return spans;
  }
}

function pipelineWith(words: readonly string[]): ClinicalPipeline {
  return new ClinicalPipeline({
    extractor: new WordExtractor(words),
    splitter: new PunctuationSentenceSplitter(),
  });
}

// ─────────────────────────────────────────────────────────────────────────────────
// DOCUMENT PROCESSING
// ─────────────────────────────────────────────────────────────────────────────────

describe('ClinicalPipeline', () => {
  it('should extract, classify and keep offsets aligned with the text', () => {
    const index = new LexiconIndex([
      { term: 'febre', entityType: 'SYMPTOM' },
      { term: 'cefaleia', entityType: 'SYMPTOM' },
      { term: 'tosse', entityType: 'SYMPTOM' },
    ]);
    const pipeline = new ClinicalPipeline({
      extractor: new SpanMatcher(index, { enableFuzzy: false }),
      splitter: new PunctuationSentenceSplitter(),
    });

    const prediction = pipeline.processDocument(
      doc(1, 'Paciente apresenta febre alta e cefaleia intensa. Nega tosse.')
    );

    expect(prediction.entities.map(e => [e.span, e.type, e.assertion])).toEqual([
      ['febre', 'SYMPTOM', 'PRESENT'],
      ['cefaleia', 'SYMPTOM', 'PRESENT'],
      ['tosse', 'SYMPTOM', 'NEGATED'],
    ]);
    for (const entity of prediction.entities) {
      expect(prediction.text.slice(entity.start, entity.end)).toBe(entity.span);
    }
  });

  it('should preprocess the note and report offsets against the cleaned text', () => {
    const prediction = pipelineWith(['febre']).processDocument(doc(2, 'PA 120/80 ,  febre'));

    expect(prediction.text).toBe('PA 120 x 80, febre');
    expect(prediction.entities).toEqual([{
      span: 'febre',
      start: 13,
      end: 18,
      type: 'SYMPTOM',
      score: 0.95,
      assertion: 'PRESENT',
      evidence: 'PA 120 x 80, febre',
    }]);
  });

  it('should carry case metadata through to the prediction', () => {
    const prediction = pipelineWith([]).processDocument(doc(7, 'Sem queixas.'));

    expect(prediction).toMatchObject({
      docId: 'cases_case_0007',
      source: 'cases.json',
      caseId: 7,
      group: 'prontuario',
      entities: [],
    });
  });

  it('should apply the configured assertion window', () => {
    const text = `nega ${'z'.repeat(60)} febre`;
    const narrow = pipelineWith(['febre']).processDocument(doc(3, text));
    const wide = new ClinicalPipeline({
      extractor: new WordExtractor(['febre']),
      splitter: new PunctuationSentenceSplitter(),
      leftWindowChars: 80,
    }).processDocument(doc(3, text));

    expect(narrow.entities[0]?.assertion).toBe('PRESENT');
    expect(wide.entities[0]?.assertion).toBe('NEGATED');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// BATCHES
// ─────────────────────────────────────────────────────────────────────────────────

describe('ClinicalPipeline.processBatch', () => {
  it('should count filtered entities and continue past failing documents', () => {
    const pipeline = pipelineWith(['febre', 'com']);
    const result = pipeline.processBatch([
      doc(1, 'Refere febre com calafrios.'),
      doc(2, 'ERRO de leitura.'),
      doc(3, 'Febre ausente.'),
    ]);

    expect(result.extractor).toBe('words');
    expect(result.runId).toMatch(/^[0-9a-f-]{36}$/);
    expect(result.predictions.map(p => p.docId)).toEqual(['cases_case_0001', 'cases_case_0003']);
    expect(result.failures).toEqual([{ docId: 'cases_case_0002', message: 'extractor failure' }]);
    expect(result.stats).toMatchObject({ processed: 2, failed: 1, entities: 1, filteredOut: 1 });
  });

  it('should give each document the same result regardless of batch order', () => {
    const pipeline = pipelineWith(['febre', 'tosse']);
    const docs = [doc(1, 'Nega febre.'), doc(2, 'Tosse seca e febre.'), doc(3, 'Sem tosse.')];

    const forward = pipeline.processBatch(docs).predictions;
    const backward = pipeline.processBatch([...docs].reverse()).predictions;

    expect([...backward].reverse()).toEqual(forward);
  });

  it('should build a pipeline from config', () => {
    const config = loadTestConfig({ assertion: { leftWindowChars: 5 } });
    const pipeline = createPipeline(config, new WordExtractor(['febre']), new PunctuationSentenceSplitter());

    const prediction = pipeline.processDocument(doc(1, 'nega calafrios e febre'));

    expect(pipeline.extractorName).toBe('words');
    expect(prediction.entities[0]?.assertion).toBe('PRESENT');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// CASE FILES AND OUTPUT
// ─────────────────────────────────────────────────────────────────────────────────

describe('case loading and prediction output', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'pipeline-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should prefer raw text and rebuild it from structured sections', () => {
    const docs = parseCases([
      { case_id: 1, group: 'prontuario', raw_text: 'Febre há 2 dias.' },
      { case_id: 12, qd: 'cefaleia', hpma: 'início há 3 dias', ap: 'HAS' },
    ], 'data/raw/pep.json');

    expect(docs).toEqual([
      { docId: 'pep_case_0001', text: 'Febre há 2 dias.', source: 'data/raw/pep.json', caseId: 1, group: 'prontuario' },
      {
        docId: 'pep_case_0012',
        text: 'QD: cefaleia HPMA: início há 3 dias AP: HAS',
        source: 'data/raw/pep.json',
        caseId: 12,
        group: 'unknown',
      },
    ]);
  });

  it('should reject cases without an id or any text', () => {
    expect(() => parseCases([{ raw_text: 'febre' }], 'x.json')).toThrow(FormatError);
    expect(() => parseCases([{ case_id: 3 }], 'x.json')).toThrow('Case 3: no text available');
    expect(() => parseCases({ case_id: 3 }, 'x.json')).toThrow(FormatError);
  });

  it('should fail the whole file on malformed JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await writeFile(file, '[{"case_id": 1,');

    await expect(loadJsonCases(file)).rejects.toBeInstanceOf(FormatError);
  });

  it('should load cases from disk', async () => {
    const file = path.join(dir, 'pepv1.json');
    await writeFile(file, JSON.stringify([{ case_id: 5, group: 'caso_estruturado', raw_text: 'Dor lombar.' }]));

    const docs = await loadJsonCases(file);

    expect(docs.map(d => [d.docId, d.text, d.group])).toEqual([['pepv1_case_0005', 'Dor lombar.', 'caso_estruturado']]);
  });

  it('should write snake_case records, together and per document', async () => {
    const prediction = pipelineWith(['febre']).processDocument(doc(4, 'Nega febre.'));

    const combined = path.join(dir, 'out', 'predictions.json');
    await writePredictions(combined, [prediction]);
    const written = await writeDocumentPredictions(path.join(dir, 'cases'), [prediction]);

    const records: unknown = JSON.parse(await readFile(combined, 'utf-8'));
    expect(records).toEqual([{
      doc_id: 'cases_case_0004',
      source: 'cases.json',
      text: 'Nega febre.',
      entities: [{
        span: 'febre',
        start: 5,
        end: 10,
        type: 'SYMPTOM',
        score: 0.95,
        assertion: 'NEGATED',
        evidence: 'Nega febre.',
      }],
      case_id: 4,
      group: 'prontuario',
    }]);

    expect(written).toEqual([path.join(dir, 'cases', 'cases_case_0004.json')]);
    const single: unknown = JSON.parse(await readFile(written[0] ?? '', 'utf-8'));
    expect(single).toMatchObject({ doc_id: 'cases_case_0004', case_id: 4 });
  });
});
