// ═══════════════════════════════════════════════════════════════════════════════
// PIPELINE TYPES — Input Documents, Predictions, Batch Results
// ═══════════════════════════════════════════════════════════════════════════════

import type { Assertion, EntityType, SpanEvidence } from '../types/entities.js';

// ─────────────────────────────────────────────────────────────────────────────────
// INPUT
// ─────────────────────────────────────────────────────────────────────────────────

export type CaseId = number | string;

/**
 * One clinical note to process.
 */
export interface CaseDocument {
  readonly docId: string;
  readonly text: string;
  /** Path of the file the note was read from. */
  readonly source: string;
  readonly caseId: CaseId;
  readonly group: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// OUTPUT
// ─────────────────────────────────────────────────────────────────────────────────

export interface PredictedEntity {
  readonly span: string;
  readonly start: number;
  readonly end: number;
  readonly type: EntityType;
  readonly score: number;
  readonly assertion: Assertion;
  readonly evidence: SpanEvidence;
}

/**
 * Entities for one document. Offsets refer to `text`, the preprocessed note.
 */
export interface DocumentPrediction {
  readonly docId: string;
  readonly source: string;
  readonly text: string;
  readonly entities: PredictedEntity[];
  readonly caseId: CaseId;
  readonly group: string;
}

export interface DocumentFailure {
  readonly docId: string;
  readonly message: string;
}

export interface BatchStats {
  readonly processed: number;
  readonly failed: number;
  readonly entities: number;
  readonly filteredOut: number;
  readonly durationMs: number;
}

export interface BatchResult {
  readonly runId: string;
  readonly extractor: string;
  readonly predictions: DocumentPrediction[];
  readonly failures: DocumentFailure[];
  readonly stats: BatchStats;
}
