// ═══════════════════════════════════════════════════════════════════════════════
// PIPELINE — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  CaseId,
  CaseDocument,
  PredictedEntity,
  DocumentPrediction,
  DocumentFailure,
  BatchStats,
  BatchResult,
} from './types.js';

export type { CaseRecord } from './cases.js';
export {
  CaseRecordSchema,
  reconstructText,
  formatDocId,
  parseCases,
  loadJsonCases,
} from './cases.js';

export type { ClinicalPipelineOptions } from './clinical-pipeline.js';
export { ClinicalPipeline } from './clinical-pipeline.js';

export { createExtractor, createPipeline } from './factory.js';

export type { EvidenceRecord, EntityRecord, DocumentRecord } from './output.js';
export {
  toDocumentRecord,
  writePredictions,
  writeDocumentPredictions,
} from './output.js';
