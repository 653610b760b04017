// ═══════════════════════════════════════════════════════════════════════════════
// EVALUATION SCHEMA — Gold/Prediction Records and Canonicalization
// ═══════════════════════════════════════════════════════════════════════════════
//
// Raw records are validated with zod, then converted once into GoldCase /
// PredCase. Nothing downstream reads `span` vs `text` or raw labels.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import type {
  EvalEntity,
  GoldCase,
  GoldEntity,
  Located,
  PredCase,
  PredEntity,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// LABELS
// ─────────────────────────────────────────────────────────────────────────────────

export const LABEL_SYNONYMS: Readonly<Record<string, string>> = {
  DIAGNOSIS: 'PROBLEM',
  DISEASE: 'PROBLEM',
  CONDITION: 'PROBLEM',
  SIGN: 'SYMPTOM',
  EXAM: 'TEST',
  EXAMINATION: 'TEST',
  MEDICATION: 'DRUG',
  MEDICINE: 'DRUG',
  BODY_PART: 'ANATOMY',
};

/**
 * Uppercase and map synonyms to the canonical label. Unknown labels pass
 * through uppercased.
 */
export function normalizeLabel(label: string | null | undefined): string {
  const upper = (label ?? '').trim().toUpperCase();
  return LABEL_SYNONYMS[upper] ?? upper;
}

function normalizeAssertionLabel(value: string | null | undefined): string | null {
  const label = (value ?? '').trim().toUpperCase();
  return label === '' ? null : label;
}

function toOffset(value: unknown): number | null {
  return typeof value === 'number' && Number.isInteger(value) ? value : null;
}

export function hasValidOffsets<T extends EvalEntity>(entity: T): entity is Located<T> {
  return entity.start !== null && entity.end !== null;
}

// ─────────────────────────────────────────────────────────────────────────────────
// RAW RECORDS
// ─────────────────────────────────────────────────────────────────────────────────

const CaseKeySchema = z.union([z.number(), z.string().min(1)]);

const EvidenceSchema = z.union([z.string(), z.record(z.unknown())]).nullish();

export const RawEntitySchema = z
  .object({
    start: z.unknown(),
    end: z.unknown(),
    span: z.string().nullish(),
    text: z.string().nullish(),
    type: z.string(),
    assertion: z.string().nullish(),
    notes: z.string().nullish(),
    score: z.number().nullish(),
    evidence: EvidenceSchema,
  })
  .passthrough();

export type RawEntity = z.infer<typeof RawEntitySchema>;

export const GoldCaseRecordSchema = z
  .object({
    case_id: CaseKeySchema,
    group: z.string().nullish(),
    raw_text: z.string().nullish(),
    gold_entities: z.array(RawEntitySchema).nullish(),
    metadata: z.record(z.unknown()).nullish(),
  })
  .passthrough();

export const PredCaseRecordSchema = z
  .object({
    case_id: CaseKeySchema.nullish(),
    doc_id: z.string().nullish(),
    text: z.string().nullish(),
    raw_text: z.string().nullish(),
    normalized_text: z.string().nullish(),
    entities: z.array(RawEntitySchema).nullish(),
    group: z.string().nullish(),
  })
  .passthrough()
  .refine(record => record.case_id != null || Boolean(record.doc_id), {
    message: 'case_id or doc_id is required',
  });

export type GoldCaseRecord = z.infer<typeof GoldCaseRecordSchema>;
export type PredCaseRecord = z.infer<typeof PredCaseRecordSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// CANONICALIZATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Entity text from whichever of `span` / `text` is filled.
 */
export function entityText(raw: Pick<RawEntity, 'span' | 'text'>): string {
  return raw.span || raw.text || '';
}

function evidenceText(evidence: RawEntity['evidence']): string | null {
  if (evidence == null) return null;
  if (typeof evidence === 'string') return evidence;
  const sentence = evidence['sentence'];
  return typeof sentence === 'string' ? sentence : JSON.stringify(evidence);
}

export function toGoldEntity(raw: RawEntity): GoldEntity {
  return {
    start: toOffset(raw.start),
    end: toOffset(raw.end),
    text: entityText(raw),
    type: normalizeLabel(raw.type),
    assertion: normalizeAssertionLabel(raw.assertion),
    notes: raw.notes ?? null,
  };
}

export function toPredEntity(raw: RawEntity): PredEntity {
  return {
    start: toOffset(raw.start),
    end: toOffset(raw.end),
    text: entityText(raw),
    type: normalizeLabel(raw.type),
    assertion: normalizeAssertionLabel(raw.assertion),
    score: raw.score ?? 0,
    evidence: evidenceText(raw.evidence),
  };
}

export function toGoldCase(record: GoldCaseRecord): GoldCase {
  return {
    caseId: record.case_id,
    group: record.group ?? null,
    rawText: record.raw_text ?? '',
    goldEntities: (record.gold_entities ?? []).map(toGoldEntity),
    metadata: record.metadata ?? {},
  };
}

/**
 * Offsets refer to `text`, falling back to `raw_text` then `normalized_text`.
 * The case id falls back to the document id.
 */
export function toPredCase(record: PredCaseRecord): PredCase {
  return {
    caseId: record.case_id ?? record.doc_id ?? '',
    docId: record.doc_id ?? null,
    text: record.text || record.raw_text || record.normalized_text || '',
    entities: (record.entities ?? []).map(toPredEntity),
    group: record.group ?? null,
  };
}
