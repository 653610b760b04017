// ═══════════════════════════════════════════════════════════════════════════════
// LEXICON LOADER — Priority-Ordered Term Files With Best-Effort Fallback
// ═══════════════════════════════════════════════════════════════════════════════

import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import type { EntityType } from '../types/entities.js';
import { ok, err, appError, ErrorCode, type Result } from '../types/result.js';
import type { LexiconFileConfig } from '../config/index.js';
import { getLogger } from '../observability/logging/index.js';
import { foldDiacritics } from '../text/index.js';
import { LexiconIndex } from './lexicon-index.js';
import type { LexiconLoadResult, LexiconTerm } from './types.js';

const logger = getLogger({ component: 'lexicon' });

// ─────────────────────────────────────────────────────────────────────────────────
// FALLBACK
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Used when no lexicon file could be read.
 */
export const DEFAULT_LEXICON: readonly LexiconTerm[] = [
  { term: 'vômito', entityType: 'SYMPTOM' },
  { term: 'vômitos', entityType: 'SYMPTOM' },
  { term: 'náusea', entityType: 'SYMPTOM' },
  { term: 'dor epigástrica', entityType: 'SYMPTOM' },
  { term: 'dor abdominal', entityType: 'SYMPTOM' },
  { term: 'febre', entityType: 'SYMPTOM' },
  { term: 'disúria', entityType: 'SYMPTOM' },
  { term: 'cefaleia', entityType: 'SYMPTOM' },
  { term: 'fast', entityType: 'PROCEDURE' },
  { term: 'cultura de urina', entityType: 'TEST' },
  { term: 'hemograma', entityType: 'TEST' },
  { term: 'rx', entityType: 'TEST' },
  { term: 'raio x', entityType: 'TEST' },
  { term: 'tomografia', entityType: 'TEST' },
  { term: 'cefadroxila', entityType: 'DRUG' },
  { term: 'dipirona', entityType: 'DRUG' },
  { term: 'paracetamol', entityType: 'DRUG' },
];

// ─────────────────────────────────────────────────────────────────────────────────
// FILES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * One term per line; blank lines skipped.
 */
export async function loadLexiconFile(
  filePath: string,
  entityType: EntityType
): Promise<Result<LexiconTerm[]>> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    return err(appError(ErrorCode.DATA_FILE_MISSING, `Lexicon file not found: ${filePath}`, {
      cause: error instanceof Error ? error : undefined,
      context: { path: filePath },
    }));
  }

  const terms = content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(Boolean)
    .map(term => ({ term, entityType }));

  return ok(terms);
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Load every configured file in priority order (lower first). A term already
 * seen, compared case- and accent-insensitively, is dropped. Missing
 * directories and files are warnings, not failures.
 */
export async function loadAllLexicons(
  directory: string,
  files: readonly LexiconFileConfig[]
): Promise<LexiconLoadResult> {
  const dir = path.resolve(directory);
  const warnings: LexiconLoadResult['warnings'] = [];
  const terms: LexiconTerm[] = [];
  const filesLoaded: string[] = [];

  if (!(await isDirectory(dir))) {
    const warning = appError(ErrorCode.DATA_FILE_MISSING, `Lexicon directory not found: ${dir}`, {
      context: { directory: dir },
    });
    logger.warn(warning.message, warning.context);
    return { terms, filesLoaded, warnings: [warning] };
  }

  const seen = new Set<string>();
  const ordered = [...files].sort((a, b) => a.priority - b.priority);

  for (const file of ordered) {
    const filePath = path.join(dir, file.filename);
    const result = await loadLexiconFile(filePath, file.entityType);

    if (!result.ok) {
      logger.warn(result.error.message, result.error.context);
      warnings.push(result.error);
      continue;
    }

    filesLoaded.push(file.filename);
    for (const term of result.value) {
      const key = foldDiacritics(term.term.trim().toLowerCase());
      if (seen.has(key)) continue;
      seen.add(key);
      terms.push(term);
    }
  }

  logger.info('Lexicons loaded', { files: filesLoaded.length, terms: terms.length });
  return { terms, filesLoaded, warnings };
}

/**
 * Load configured lexicons and build the shared index, falling back to
 * DEFAULT_LEXICON when nothing could be read.
 */
export async function buildLexiconIndex(
  directory: string,
  files: readonly LexiconFileConfig[]
): Promise<LexiconIndex> {
  const { terms } = await loadAllLexicons(directory, files);

  if (terms.length === 0) {
    logger.warn('No lexicon terms loaded, using built-in fallback', {
      terms: DEFAULT_LEXICON.length,
    });
    return new LexiconIndex(DEFAULT_LEXICON);
  }

  return new LexiconIndex(terms);
}
