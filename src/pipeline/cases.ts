// ═══════════════════════════════════════════════════════════════════════════════
// CASE LOADER — JSON Arrays of Clinical Cases
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each case carries `case_id`, an optional `group`, and `raw_text`. Cases
// without raw text are rebuilt from the structured sections (qd, hpma, isda,
// ap, af). Any malformed case fails the whole file.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { FormatError } from '../types/result.js';
import type { CaseDocument } from './types.js';

const optionalSection = z.string().nullish();

export const CaseRecordSchema = z
  .object({
    case_id: z.union([z.number().int(), z.string().min(1)]),
    group: z.string().optional(),
    raw_text: optionalSection,
    qd: optionalSection,
    hpma: optionalSection,
    isda: optionalSection,
    ap: optionalSection,
    af: optionalSection,
  })
  .passthrough();

export type CaseRecord = z.infer<typeof CaseRecordSchema>;

const STRUCTURED_SECTIONS = [
  ['qd', 'QD'],
  ['hpma', 'HPMA'],
  ['isda', 'ISDA'],
  ['ap', 'AP'],
  ['af', 'AF'],
] as const;

/**
 * "QD: … HPMA: …" from whichever structured sections are filled, or null.
 */
export function reconstructText(record: CaseRecord): string | null {
  const parts: string[] = [];
  for (const [key, label] of STRUCTURED_SECTIONS) {
    const value = record[key];
    if (value) {
      parts.push(`${label}: ${value}`);
    }
  }
  return parts.length > 0 ? parts.join(' ') : null;
}

export function formatDocId(stem: string, caseId: number | string): string {
  return `${stem}_case_${String(caseId).padStart(4, '0')}`;
}

/**
 * Turn parsed JSON into documents. `source` names the file in errors and
 * in the document ids.
 */
export function parseCases(data: unknown, source: string): CaseDocument[] {
  if (!Array.isArray(data)) {
    throw new FormatError(`Expected a JSON array of cases in ${source}`, { path: source });
  }

  const stem = path.basename(source, path.extname(source));

  return data.map((item: unknown, index): CaseDocument => {
    const parsed = CaseRecordSchema.safeParse(item);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new FormatError(`Invalid case at index ${index} in ${source}`, {
        path: source,
        index,
        issue: issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid case',
      });
    }

    const record = parsed.data;
    const text = record.raw_text || reconstructText(record);
    if (!text) {
      throw new FormatError(`Case ${record.case_id}: no text available`, {
        path: source,
        caseId: record.case_id,
      });
    }

    return {
      docId: formatDocId(stem, record.case_id),
      text,
      source,
      caseId: record.case_id,
      group: record.group ?? 'unknown',
    };
  });
}

export async function loadJsonCases(filePath: string): Promise<CaseDocument[]> {
  const content = await readFile(filePath, 'utf-8');

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new FormatError(
      `Malformed JSON in ${filePath}`,
      { path: filePath },
      error instanceof Error ? error : undefined
    );
  }

  return parseCases(data, filePath);
}
