// ═══════════════════════════════════════════════════════════════════════════════
// CLINICAL PIPELINE — Preprocess, Segment, Extract, Assert, Filter
// ═══════════════════════════════════════════════════════════════════════════════
//
// The extractor (lexicon SpanMatcher or CanonicalVocabulary) and the sentence
// splitter are injected and shared read-only. Documents carry no state into
// each other, so batch order never changes a document's result.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { v4 as uuidv4 } from 'uuid';
import type { EntitySpan, Sentence } from '../types/entities.js';
import type { EntityExtractor } from '../ner/types.js';
import { CompromiseSentenceSplitter, normalizeText, type SentenceSplitter } from '../text/index.js';
import { classifyAssertion, DEFAULT_LEFT_WINDOW_CHARS } from '../assertion/index.js';
import {
  DEFAULT_FILTER_SETTINGS,
  filterEntitiesWithStats,
  type FilterConfig,
} from '../postprocess/index.js';
import { getLogger } from '../observability/logging/index.js';
import type {
  BatchResult,
  CaseDocument,
  DocumentFailure,
  DocumentPrediction,
  PredictedEntity,
} from './types.js';

const logger = getLogger({ component: 'pipeline' });

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export interface ClinicalPipelineOptions {
  extractor: EntityExtractor;
  splitter?: SentenceSplitter;
  /** Apply document preprocessing before segmentation (default true). */
  preprocess?: boolean;
  leftWindowChars?: number;
  filter?: Partial<FilterConfig>;
}

interface DocumentOutcome {
  readonly prediction: DocumentPrediction;
  readonly filteredOut: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// PIPELINE
// ─────────────────────────────────────────────────────────────────────────────────

export class ClinicalPipeline {
  private readonly extractor: EntityExtractor;
  private readonly splitter: SentenceSplitter;
  private readonly preprocess: boolean;
  private readonly leftWindowChars: number;
  private readonly filter: Partial<FilterConfig>;

  constructor(options: ClinicalPipelineOptions) {
    this.extractor = options.extractor;
    this.splitter = options.splitter ?? new CompromiseSentenceSplitter();
    this.preprocess = options.preprocess ?? true;
    this.leftWindowChars = options.leftWindowChars ?? DEFAULT_LEFT_WINDOW_CHARS;
    this.filter = { ...DEFAULT_FILTER_SETTINGS, ...options.filter };
  }

  get extractorName(): string {
    return this.extractor.name;
  }

  /**
   * Run one document through every stage.
   */
  processDocument(doc: CaseDocument): DocumentPrediction {
    return this.run(doc).prediction;
  }

  /**
   * Process documents one after another. A document that throws is logged
   * and recorded as a failure; the rest of the batch still runs.
   */
  processBatch(docs: readonly CaseDocument[]): BatchResult {
    const runId = uuidv4();
    const startedAt = performance.now();
    const predictions: DocumentPrediction[] = [];
    const failures: DocumentFailure[] = [];
    let entities = 0;
    let filteredOut = 0;

    logger.info('Batch started', { runId, documents: docs.length, extractor: this.extractor.name });

    for (const doc of docs) {
      try {
        const outcome = this.run(doc);
        predictions.push(outcome.prediction);
        entities += outcome.prediction.entities.length;
        filteredOut += outcome.filteredOut;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error('Document failed', error, { runId, docId: doc.docId });
        failures.push({ docId: doc.docId, message });
      }
    }

    const stats = {
      processed: predictions.length,
      failed: failures.length,
      entities,
      filteredOut,
      durationMs: Math.round(performance.now() - startedAt),
    };

    logger.info('Batch completed', { runId, ...stats });

    return { runId, extractor: this.extractor.name, predictions, failures, stats };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // STAGES
  // ─────────────────────────────────────────────────────────────────────────────

  private run(doc: CaseDocument): DocumentOutcome {
    const text = this.preprocess ? normalizeText(doc.text) : doc.text;
    const sentences = this.splitter.split(text);
    const spans = this.extractor.extract(text, sentences);
    const withAssertions = spans.map(span => this.annotate(text, span));

    const { entities, stats } = filterEntitiesWithStats(withAssertions, text, this.filter);

    if (stats.dropped > 0) {
      logger.debug('Filtered junk entities', {
        docId: doc.docId,
        kept: stats.kept,
        input: stats.input,
        byReason: stats.byReason,
      });
    }

    return {
      prediction: {
        docId: doc.docId,
        source: doc.source,
        text,
        entities,
        caseId: doc.caseId,
        group: doc.group,
      },
      filteredOut: stats.dropped,
    };
  }

  private annotate(text: string, span: EntitySpan): PredictedEntity {
    const sentence: Sentence = {
      text: text.slice(span.sentenceStart, span.sentenceEnd),
      start: span.sentenceStart,
      end: span.sentenceEnd,
    };

    const assertion = classifyAssertion(
      sentence.text,
      span.start - sentence.start,
      span.end - sentence.start,
      span.type,
      { leftWindowChars: this.leftWindowChars }
    );

    return {
      span: span.span,
      start: span.start,
      end: span.end,
      type: span.type,
      score: span.score,
      assertion,
      evidence: span.evidence,
    };
  }
}
