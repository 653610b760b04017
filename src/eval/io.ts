// ═══════════════════════════════════════════════════════════════════════════════
// EVALUATION I/O — Gold JSONL, Prediction JSON, Report Output
// ═══════════════════════════════════════════════════════════════════════════════

import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { ZodError } from 'zod';
import { FormatError } from '../types/result.js';
import { getLogger, withTiming } from '../observability/logging/index.js';
import {
  GoldCaseRecordSchema,
  PredCaseRecordSchema,
  toGoldCase,
  toPredCase,
  type GoldCaseRecord,
} from './schema.js';
import {
  fillGoldOffsets,
  fixGoldOffsets,
  syncGoldRawText,
  type OffsetFillReport,
  type OffsetFixReport,
  type TextSyncReport,
} from './offsets.js';
import { evaluate, type EvaluateOptions } from './evaluate.js';
import type { EvaluationReport, GoldCase, MatchMode, PredCase } from './types.js';

const logger = getLogger({ component: 'evaluation-io' });

/** Relaxed criterion used by file-level evaluation when none is given. */
export const DEFAULT_RELAXED_MATCH_MODE: MatchMode = 'iou_or_min_cov_or_containment';

function describeIssue(error: ZodError): string {
  const issue = error.issues[0];
  return issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid record';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ─────────────────────────────────────────────────────────────────────────────────
// GOLD
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Parse line-delimited gold records. Blank lines are skipped; any other bad
 * line fails the whole file with its 1-based line number.
 */
export function parseGoldRecords(content: string, source: string): GoldCaseRecord[] {
  const records: GoldCaseRecord[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((raw, index) => {
    const line = raw.trim();
    if (!line) return;
    const lineNumber = index + 1;

    let data: unknown;
    try {
      data = JSON.parse(line);
    } catch (error) {
      throw new FormatError(
        `Malformed JSON at line ${lineNumber} of ${source}`,
        { path: source, line: lineNumber },
        error instanceof Error ? error : undefined
      );
    }

    const parsed = GoldCaseRecordSchema.safeParse(data);
    if (!parsed.success) {
      throw new FormatError(`Invalid gold case at line ${lineNumber} of ${source}`, {
        path: source,
        line: lineNumber,
        issue: describeIssue(parsed.error),
      });
    }
    records.push(parsed.data);
  });

  return records;
}

export function parseGoldLines(content: string, source: string): GoldCase[] {
  return parseGoldRecords(content, source).map(toGoldCase);
}

export async function loadGoldCases(filePath: string): Promise<GoldCase[]> {
  const content = await readFile(filePath, 'utf-8');
  const cases = parseGoldLines(content, filePath);
  logger.info('Loaded gold cases', { path: filePath, cases: cases.length });
  return cases;
}

export async function loadGoldRecords(filePath: string): Promise<GoldCaseRecord[]> {
  return parseGoldRecords(await readFile(filePath, 'utf-8'), filePath);
}

export async function writeGoldRecords(filePath: string, records: readonly GoldCaseRecord[]): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, records.map(record => `${JSON.stringify(record)}\n`).join(''), 'utf-8');
}

// ─────────────────────────────────────────────────────────────────────────────────
// PREDICTIONS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Accepts an array of cases, a single case object, or an object keyed by case id.
 */
export function parsePredictions(data: unknown, source: string): PredCase[] {
  let items: unknown[];
  if (Array.isArray(data)) {
    items = data;
  } else if (isRecord(data)) {
    items = 'case_id' in data || 'doc_id' in data ? [data] : Object.values(data);
  } else {
    throw new FormatError(`Unexpected predictions format in ${source}`, { path: source });
  }

  return items.map((item, index) => {
    const parsed = PredCaseRecordSchema.safeParse(item);
    if (!parsed.success) {
      throw new FormatError(`Invalid prediction case at index ${index} in ${source}`, {
        path: source,
        index,
        issue: describeIssue(parsed.error),
      });
    }
    return toPredCase(parsed.data);
  });
}

export async function loadPredCases(filePath: string): Promise<PredCase[]> {
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

  const cases = parsePredictions(data, filePath);
  logger.info('Loaded predicted cases', { path: filePath, cases: cases.length });
  return cases;
}

// ─────────────────────────────────────────────────────────────────────────────────
// REPORT
// ─────────────────────────────────────────────────────────────────────────────────

export async function writeReport(filePath: string, report: EvaluationReport): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(report, null, 2), 'utf-8');
}

export interface EvaluateFilesOptions extends EvaluateOptions {
  goldPath: string;
  predPath: string;
  /** When set, the report is also written here. */
  outPath?: string;
}

/**
 * Load both files, evaluate, and optionally persist the report. In relaxed
 * mode without an explicit criterion, IoU, min-coverage and containment are
 * all accepted.
 */
export async function evaluateFiles(options: EvaluateFilesOptions): Promise<EvaluationReport> {
  const { goldPath, predPath, outPath, ...settings } = options;

  const gold = await loadGoldCases(goldPath);
  const pred = await loadPredCases(predPath);

  const matchMode = settings.matchMode ?? (settings.relaxed ? DEFAULT_RELAXED_MATCH_MODE : undefined);
  const report = withTiming('evaluate', () => evaluate(gold, pred, { ...settings, matchMode }), logger);

  if (outPath) {
    await writeReport(outPath, report);
    logger.info('Report written', { path: outPath });
  }

  return report;
}

// ─────────────────────────────────────────────────────────────────────────────────
// GOLD REPAIR
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Case id → text from a directory of per-case prediction files (`*.json`).
 * `raw_text` is preferred over `text` and `normalized_text`. Files without an
 * id are skipped with a warning.
 */
export async function loadCanonicalTexts(casesDir: string): Promise<Map<string, string>> {
  const names = (await readdir(casesDir)).filter(name => name.endsWith('.json')).sort();
  const texts = new Map<string, string>();

  for (const name of names) {
    const filePath = path.join(casesDir, name);
    let data: unknown;
    try {
      data = JSON.parse(await readFile(filePath, 'utf-8'));
    } catch (error) {
      throw new FormatError(
        `Malformed JSON in ${filePath}`,
        { path: filePath },
        error instanceof Error ? error : undefined
      );
    }

    const parsed = PredCaseRecordSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn('Skipping case file without a usable id', { path: filePath, issue: describeIssue(parsed.error) });
      continue;
    }
    const record = parsed.data;
    texts.set(String(record.case_id ?? record.doc_id), record.raw_text || record.text || record.normalized_text || '');
  }

  return texts;
}

export interface RepairGoldFileOptions {
  goldPath: string;
  outPath: string;
  /** `fill` adds missing offsets; `fix` re-anchors every entity. */
  mode: 'fill' | 'fix';
  /** When set, raw texts are synced from these case files first. */
  casesDir?: string;
  /** When set, the repair summary is written here. */
  reportPath?: string;
  allowAmbiguous?: boolean;
  window?: number;
}

export interface GoldRepairSummary {
  sync: TextSyncReport | null;
  offsets: OffsetFillReport | OffsetFixReport;
}

export async function repairGoldFile(options: RepairGoldFileOptions): Promise<GoldRepairSummary> {
  let records = await loadGoldRecords(options.goldPath);

  let sync: TextSyncReport | null = null;
  if (options.casesDir) {
    const synced = syncGoldRawText(records, await loadCanonicalTexts(options.casesDir));
    records = synced.records;
    sync = synced.report;
  }

  const repaired = options.mode === 'fill'
    ? fillGoldOffsets(records, { allowAmbiguous: options.allowAmbiguous })
    : fixGoldOffsets(records, { window: options.window });

  await writeGoldRecords(options.outPath, repaired.records);
  const summary: GoldRepairSummary = { sync, offsets: repaired.report };

  if (options.reportPath) {
    await mkdir(path.dirname(options.reportPath), { recursive: true });
    await writeFile(options.reportPath, JSON.stringify(summary, null, 2), 'utf-8');
  }
  logger.info('Gold file repaired', { path: options.outPath, mode: options.mode, cases: repaired.records.length });

  return summary;
}
