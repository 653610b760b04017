// ═══════════════════════════════════════════════════════════════════════════════
// PREDICTION OUTPUT — snake_case JSON Records
// ═══════════════════════════════════════════════════════════════════════════════

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { SpanEvidence } from '../types/entities.js';
import type { CaseId, DocumentPrediction } from './types.js';

export type EvidenceRecord =
  | string
  | {
      concept_id: string;
      concept_name: string;
      vocabulary: string;
      match_type: string;
      match_policy: string;
      entry_type: string;
      sentence: string;
    };

export interface EntityRecord {
  span: string;
  start: number;
  end: number;
  type: string;
  score: number;
  assertion: string;
  evidence: EvidenceRecord;
}

export interface DocumentRecord {
  doc_id: string;
  source: string;
  text: string;
  entities: EntityRecord[];
  case_id: CaseId;
  group: string;
}

function toEvidenceRecord(evidence: SpanEvidence): EvidenceRecord {
  if (typeof evidence === 'string') {
    return evidence;
  }
  return {
    concept_id: evidence.conceptId,
    concept_name: evidence.conceptName,
    vocabulary: evidence.vocabulary,
    match_type: evidence.matchType,
    match_policy: evidence.matchPolicy,
    entry_type: evidence.entryType,
    sentence: evidence.sentence,
  };
}

export function toDocumentRecord(prediction: DocumentPrediction): DocumentRecord {
  return {
    doc_id: prediction.docId,
    source: prediction.source,
    text: prediction.text,
    entities: prediction.entities.map(entity => ({
      span: entity.span,
      start: entity.start,
      end: entity.end,
      type: entity.type,
      score: entity.score,
      assertion: entity.assertion,
      evidence: toEvidenceRecord(entity.evidence),
    })),
    case_id: prediction.caseId,
    group: prediction.group,
  };
}

/**
 * Write all predictions to one JSON array file.
 */
export async function writePredictions(
  filePath: string,
  predictions: readonly DocumentPrediction[]
): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const records = predictions.map(toDocumentRecord);
  await writeFile(filePath, JSON.stringify(records, null, 2), 'utf-8');
}

/**
 * Write one `<docId>.json` file per document. Returns the written paths.
 */
export async function writeDocumentPredictions(
  outDir: string,
  predictions: readonly DocumentPrediction[]
): Promise<string[]> {
  await mkdir(outDir, { recursive: true });

  const written: string[] = [];
  for (const prediction of predictions) {
    const filePath = path.join(outDir, `${prediction.docId}.json`);
    await writeFile(filePath, JSON.stringify(toDocumentRecord(prediction), null, 2), 'utf-8');
    written.push(filePath);
  }
  return written;
}
