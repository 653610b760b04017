// ═══════════════════════════════════════════════════════════════════════════════
// VOCABULARY LOADER — Canonical CSV Tables, Validation, Referential Integrity
// ═══════════════════════════════════════════════════════════════════════════════
//
// concepts.csv, entries.csv, blocked_terms.csv, ambiguity.csv
//
// Missing files and invalid rows degrade the vocabulary and are reported as
// warnings; nothing here throws on bad reference data.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import type { z } from 'zod';
import { appError, ErrorCode, type AppError } from '../types/result.js';
import { getLogger } from '../observability/logging/index.js';
import {
  AmbiguityRowSchema,
  BlockedTermRowSchema,
  ConceptRowSchema,
  CsvRecordsSchema,
  EntryRowSchema,
} from './schemas.js';
import type {
  VocabularyLoadResult,
  VocabularyTables,
  VocabularyValidationReport,
} from './types.js';

const logger = getLogger({ component: 'vocabulary' });

export const VOCABULARY_FILES = {
  concepts: 'concepts.csv',
  entries: 'entries.csv',
  blockedTerms: 'blocked_terms.csv',
  ambiguity: 'ambiguity.csv',
} as const;

// ─────────────────────────────────────────────────────────────────────────────────
// CSV
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Parse CSV text with a header row into validated records. Invalid rows are
 * dropped and summarized in one warning.
 */
export function parseCsvTable<T>(
  content: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  source: string,
  warnings: AppError[]
): T[] {
  let records: Array<Record<string, string>>;
  try {
    const parsed: unknown = parse(content, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
      relax_column_count: true,
    });
    records = CsvRecordsSchema.parse(parsed);
  } catch (error) {
    warnings.push(appError(ErrorCode.FORMAT_ERROR, `Unreadable CSV: ${source}`, {
      cause: error instanceof Error ? error : undefined,
      context: { path: source },
    }));
    return [];
  }

  const rows: T[] = [];
  const rejected: Array<{ line: number; issue: string }> = [];

  records.forEach((record, i) => {
    const result = schema.safeParse(record);
    if (result.success) {
      rows.push(result.data);
    } else {
      const issue = result.error.issues[0];
      rejected.push({
        line: i + 2,
        issue: issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid row',
      });
    }
  });

  if (rejected.length > 0) {
    warnings.push(appError(ErrorCode.FORMAT_ERROR, `Skipped ${rejected.length} invalid rows in ${source}`, {
      context: { path: source, rejected: rejected.length, examples: rejected.slice(0, 5) },
    }));
  }

  return rows;
}

async function readCsvTable<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  warnings: AppError[]
): Promise<T[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    warnings.push(appError(ErrorCode.DATA_FILE_MISSING, `Vocabulary file not found: ${filePath}`, {
      cause: error instanceof Error ? error : undefined,
      context: { path: filePath },
    }));
    return [];
  }
  return parseCsvTable(content, schema, filePath, warnings);
}

/**
 * Read the four tables as they are on disk, without integrity checks.
 */
export async function readVocabularyTables(directory: string): Promise<VocabularyLoadResult> {
  const dir = path.resolve(directory);
  const warnings: AppError[] = [];

  const [concepts, entries, blockedTerms, ambiguity] = await Promise.all([
    readCsvTable(path.join(dir, VOCABULARY_FILES.concepts), ConceptRowSchema, warnings),
    readCsvTable(path.join(dir, VOCABULARY_FILES.entries), EntryRowSchema, warnings),
    readCsvTable(path.join(dir, VOCABULARY_FILES.blockedTerms), BlockedTermRowSchema, warnings),
    readCsvTable(path.join(dir, VOCABULARY_FILES.ambiguity), AmbiguityRowSchema, warnings),
  ]);

  return { tables: { concepts, entries, blockedTerms, ambiguity }, warnings };
}

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

function countBy<T>(items: readonly T[], key: (item: T) => string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const item of items) {
    const k = key(item);
    counts[k] = (counts[k] ?? 0) + 1;
  }
  return counts;
}

export function validateVocabulary(tables: VocabularyTables): VocabularyValidationReport {
  const conceptIds = new Set<string>();
  const duplicateConceptIds = new Set<string>();

  for (const concept of tables.concepts) {
    if (conceptIds.has(concept.conceptId)) {
      duplicateConceptIds.add(concept.conceptId);
    }
    conceptIds.add(concept.conceptId);
  }

  const orphanEntries = tables.entries
    .filter(entry => !conceptIds.has(entry.conceptId))
    .map(entry => ({ entryText: entry.entryText, conceptId: entry.conceptId }));

  const emptyEntryTexts = tables.entries.filter(entry => entry.entryText.trim() === '').length;

  return {
    valid: orphanEntries.length === 0 && duplicateConceptIds.size === 0,
    orphanEntries,
    duplicateConceptIds: [...duplicateConceptIds],
    emptyEntryTexts,
    countsByVocabulary: countBy(tables.concepts, c => c.vocabulary),
    countsByEntryType: countBy(tables.entries, e => e.entryType),
    countsByPolicy: countBy(tables.entries, e => e.matchPolicy),
  };
}

/**
 * Drop entries that reference unknown concepts or have no text. Each kind of
 * exclusion is reported once.
 */
export function enforceIntegrity(
  tables: VocabularyTables,
  report: VocabularyValidationReport = validateVocabulary(tables)
): VocabularyLoadResult {
  const warnings: AppError[] = [];
  const conceptIds = new Set(tables.concepts.map(c => c.conceptId));

  if (report.orphanEntries.length > 0) {
    warnings.push(appError(
      ErrorCode.REFERENTIAL_INTEGRITY,
      `${report.orphanEntries.length} entries reference unknown concepts`,
      { context: { examples: report.orphanEntries.slice(0, 5) } }
    ));
  }

  const entries = tables.entries.filter(
    entry => entry.entryText.trim() !== '' && conceptIds.has(entry.conceptId)
  );

  return { tables: { ...tables, entries }, warnings };
}

/**
 * Read, validate and clean the canonical tables in `directory`.
 */
export async function loadVocabularyTables(directory: string): Promise<VocabularyLoadResult> {
  const read = await readVocabularyTables(directory);
  const cleaned = enforceIntegrity(read.tables);
  const warnings = [...read.warnings, ...cleaned.warnings];

  for (const warning of warnings) {
    logger.warn(warning.message, warning.context);
  }

  logger.info('Vocabulary tables loaded', {
    concepts: cleaned.tables.concepts.length,
    entries: cleaned.tables.entries.length,
    blockedTerms: cleaned.tables.blockedTerms.length,
    ambiguousTerms: cleaned.tables.ambiguity.length,
    warnings: warnings.length,
  });

  return { tables: cleaned.tables, warnings };
}
