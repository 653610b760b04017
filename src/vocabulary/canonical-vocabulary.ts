// ═══════════════════════════════════════════════════════════════════════════════
// CANONICAL VOCABULARY — Policy-Aware Matching Over Structured Terminologies
// ═══════════════════════════════════════════════════════════════════════════════
//
// Constructed by the caller, initialized once, then shared read-only:
//
//   const vocabulary = new CanonicalVocabulary({ directory: 'data/vocab/canonical' });
//   await vocabulary.initialize();
//   const spans = vocabulary.extract(text, sentences);
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { EntitySpan, EntityType, Sentence } from '../types/entities.js';
import { ClinicalError, ErrorCode, appError } from '../types/result.js';
import { boundedPattern, escapeRegExp, foldCaseInPlace } from '../text/index.js';
import { ConfidenceSweepOverlapResolver, type OverlapResolver } from '../ner/overlap.js';
import type { EntityExtractor } from '../ner/types.js';
import { getLogger } from '../observability/logging/index.js';
import { normalizeDrugName, MIN_DRUG_NAME_LENGTH } from './drug-name.js';
import { enforceIntegrity, loadVocabularyTables } from './loader.js';
import type {
  CanonicalMatch,
  Concept,
  Entry,
  VocabularyStats,
  VocabularyTables,
} from './types.js';

const logger = getLogger({ component: 'vocabulary' });

/**
 * Function words never matched as clinical terms (compared lowercase).
 */
export const PORTUGUESE_STOPWORDS: ReadonlySet<string> = new Set([
  'a', 'o', 'e', 'de', 'da', 'do', 'em', 'na', 'no', 'para', 'por',
  'com', 'sem', 'sob', 'sobre', 'ou', 'mas', 'se', 'ao', 'aos',
  'as', 'os', 'um', 'uma', 'uns', 'umas', 'que', 'qual',
]);

export const DRUG_MATCH_CONFIDENCE = 0.85;

/**
 * context_required 0.50, official 0.95, code 0.90, abbr 0.85, anything else 0.80.
 * context_required only lowers confidence; no disambiguation is attempted.
 */
export function entryConfidence(entry: Pick<Entry, 'entryType' | 'matchPolicy'>): number {
  if (entry.matchPolicy === 'context_required') return 0.5;
  switch (entry.entryType) {
    case 'official':
      return 0.95;
    case 'code':
      return 0.9;
    case 'abbr':
      return 0.85;
    default:
      return 0.8;
  }
}

/**
 * At least one cased character and no lowercase ones.
 */
function isUpperCase(value: string): boolean {
  return value !== value.toLowerCase() && value === value.toUpperCase();
}

/**
 * Codes always pass. Single characters and stopwords never do. Two-character
 * entries pass only as abbreviations written in uppercase in the source
 * ("IC" matches, "ic" does not).
 */
export function shouldSkipMatch(entryKey: string, entry: Pick<Entry, 'entryType'>, original: string): boolean {
  if (entry.entryType === 'code') return false;
  if (entryKey.length === 1) return true;
  if (PORTUGUESE_STOPWORDS.has(entryKey.toLowerCase())) return true;
  if (entryKey.length === 2) {
    return !(entry.entryType === 'abbr' && isUpperCase(original));
  }
  return false;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SERVICE
// ─────────────────────────────────────────────────────────────────────────────────

export interface CanonicalVocabularyOptions {
  /** Directory holding the four CSV tables. */
  directory?: string;
  version?: string;
  /** Restrict matches to these concept entity types. */
  entityTypes?: readonly EntityType[];
  resolver?: OverlapResolver;
}

interface IndexedEntry {
  readonly key: string;
  readonly pattern: RegExp;
  readonly records: Entry[];
}

interface IndexedDrug {
  readonly name: string;
  readonly pattern: RegExp;
  readonly conceptIds: string[];
}

export class CanonicalVocabulary implements EntityExtractor {
  readonly name = 'canonical';

  private readonly options: CanonicalVocabularyOptions;
  private readonly resolver: OverlapResolver;
  private tables: VocabularyTables | null = null;

  private readonly conceptIndex = new Map<string, Concept>();
  private readonly entryIndex = new Map<string, IndexedEntry>();
  private readonly drugIndex = new Map<string, IndexedDrug>();
  private readonly blockedTerms = new Set<string>();
  private readonly ambiguousTerms = new Set<string>();

  constructor(options: CanonicalVocabularyOptions = {}) {
    this.options = options;
    this.resolver = options.resolver ?? new ConfidenceSweepOverlapResolver();
  }

  get isInitialized(): boolean {
    return this.tables !== null;
  }

  /**
   * Load the tables (from `tables` when given, else from the configured
   * directory) and build the lookup indexes. Safe to call once only.
   */
  async initialize(tables?: VocabularyTables): Promise<void> {
    if (this.tables) {
      return;
    }

    let source: VocabularyTables;
    if (tables) {
      const cleaned = enforceIntegrity(tables);
      for (const warning of cleaned.warnings) {
        logger.warn(warning.message, warning.context);
      }
      source = cleaned.tables;
    } else if (this.options.directory) {
      source = (await loadVocabularyTables(this.options.directory)).tables;
    } else {
      throw new ClinicalError(appError(
        ErrorCode.CONFIGURATION_ERROR,
        'CanonicalVocabulary needs either tables or a directory'
      ));
    }

    this.buildIndexes(source);
    this.tables = source;

    logger.info('Canonical vocabulary ready', {
      concepts: this.conceptIndex.size,
      indexedEntries: this.entryIndex.size,
      drugNames: this.drugIndex.size,
    });
  }

  private buildIndexes(tables: VocabularyTables): void {
    for (const concept of tables.concepts) {
      this.conceptIndex.set(concept.conceptId, concept);
    }

    for (const entry of tables.entries) {
      if (entry.matchPolicy === 'blocked') continue;

      const key = foldCaseInPlace(entry.entryText, 'upper');
      const indexed = this.entryIndex.get(key);
      if (indexed) {
        indexed.records.push(entry);
      } else {
        this.entryIndex.set(key, {
          key,
          pattern: new RegExp(boundedPattern(escapeRegExp(key)), 'gu'),
          records: [entry],
        });
      }
    }

    for (const concept of tables.concepts) {
      if (concept.entityType !== 'DRUG') continue;

      const name = normalizeDrugName(concept.conceptName);
      if (!name) continue;

      const indexed = this.drugIndex.get(name);
      if (indexed) {
        indexed.conceptIds.push(concept.conceptId);
      } else {
        const source = `${escapeRegExp(name)}(?:\\s+\\d+\\s*(?:mg|g|ml|mcg|ui))?`;
        this.drugIndex.set(name, {
          name,
          pattern: new RegExp(boundedPattern(source), 'gu'),
          conceptIds: [concept.conceptId],
        });
      }
    }

    for (const blocked of tables.blockedTerms) {
      this.blockedTerms.add(blocked.term.toUpperCase());
    }
    for (const ambiguous of tables.ambiguity) {
      this.ambiguousTerms.add(ambiguous.entryText.toUpperCase());
    }
  }

  private requireTables(): VocabularyTables {
    if (!this.tables) {
      throw new ClinicalError(appError(
        ErrorCode.INTERNAL_ERROR,
        'CanonicalVocabulary used before initialize()'
      ));
    }
    return this.tables;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // LOOKUP
  // ─────────────────────────────────────────────────────────────────────────────

  getConcept(conceptId: string): Concept | undefined {
    return this.conceptIndex.get(conceptId);
  }

  isBlocked(term: string): boolean {
    return this.blockedTerms.has(term.toUpperCase());
  }

  isAmbiguous(term: string): boolean {
    return this.ambiguousTerms.has(term.toUpperCase());
  }

  getStats(): VocabularyStats {
    const tables = this.requireTables();
    const byVocabulary: Record<string, number> = {};
    const byEntityType: Record<string, number> = {};

    for (const concept of tables.concepts) {
      byVocabulary[concept.vocabulary] = (byVocabulary[concept.vocabulary] ?? 0) + 1;
      byEntityType[concept.entityType] = (byEntityType[concept.entityType] ?? 0) + 1;
    }

    return {
      version: this.options.version ?? 'canonical',
      totalConcepts: tables.concepts.length,
      totalEntries: tables.entries.length,
      indexedEntries: this.entryIndex.size,
      drugNames: this.drugIndex.size,
      blockedTerms: this.blockedTerms.size,
      ambiguousTerms: this.ambiguousTerms.size,
      byVocabulary,
      byEntityType,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // MATCHING
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * All non-overlapping vocabulary and drug matches in `text`.
   * An empty `entityTypes` list disables the type filter but also the drug pass.
   */
  matchText(text: string, entityTypes?: readonly EntityType[]): CanonicalMatch[] {
    this.requireTables();

    const filterTypes = entityTypes && entityTypes.length > 0 ? new Set(entityTypes) : null;
    const matches: CanonicalMatch[] = [];
    const textUpper = foldCaseInPlace(text, 'upper');

    for (const { key, pattern, records } of this.entryIndex.values()) {
      for (const m of textUpper.matchAll(pattern)) {
        const start = m.index ?? 0;
        const end = start + m[0].length;
        const original = text.slice(start, end);

        for (const entry of records) {
          if (shouldSkipMatch(key, entry, original)) continue;

          const concept = this.conceptIndex.get(entry.conceptId);
          if (!concept) continue;
          if (filterTypes && !filterTypes.has(concept.entityType)) continue;

          matches.push({
            text: original,
            start,
            end,
            score: entryConfidence(entry),
            conceptId: concept.conceptId,
            conceptName: concept.conceptName,
            entityType: concept.entityType,
            vocabulary: concept.vocabulary,
            matchType: 'exact',
            matchPolicy: entry.matchPolicy,
            entryType: entry.entryType,
          });
        }
      }
    }

    if (!entityTypes || entityTypes.includes('DRUG')) {
      matches.push(...this.matchDrugs(text));
    }

    return this.resolver.resolve(matches);
  }

  private matchDrugs(text: string): CanonicalMatch[] {
    const matches: CanonicalMatch[] = [];
    const textLower = foldCaseInPlace(text, 'lower');

    for (const { name, pattern, conceptIds } of this.drugIndex.values()) {
      if (name.length < MIN_DRUG_NAME_LENGTH || PORTUGUESE_STOPWORDS.has(name)) continue;

      for (const m of textLower.matchAll(pattern)) {
        const start = m.index ?? 0;
        const end = start + m[0].length;

        for (const conceptId of conceptIds) {
          const concept = this.conceptIndex.get(conceptId);
          if (!concept) continue;

          matches.push({
            text: text.slice(start, end),
            start,
            end,
            score: DRUG_MATCH_CONFIDENCE,
            conceptId: concept.conceptId,
            conceptName: concept.conceptName,
            entityType: 'DRUG',
            vocabulary: 'TUSS_DRUG',
            matchType: 'normalized',
            matchPolicy: 'safe_exact',
            entryType: 'drug_normalized',
          });
        }
      }
    }

    return matches;
  }

  /**
   * Matches as entity spans, attributed to the sentence containing their
   * start offset (the whole document when none does).
   */
  extractEntitiesCanonical(
    text: string,
    sentences: readonly Sentence[],
    entityTypes?: readonly EntityType[]
  ): EntitySpan[] {
    const spans = this.matchText(text, entityTypes).map((match): EntitySpan => {
      const sentence = sentences.find(s => s.start <= match.start && match.start < s.end);
      const sentenceStart = sentence?.start ?? 0;
      const sentenceEnd = sentence?.end ?? text.length;
      const sentenceText = sentence?.text ?? text;

      return {
        span: match.text,
        start: match.start,
        end: match.end,
        type: match.entityType,
        score: match.score,
        sentenceStart,
        sentenceEnd,
        evidence: {
          conceptId: match.conceptId,
          conceptName: match.conceptName,
          vocabulary: match.vocabulary,
          matchType: match.matchType,
          matchPolicy: match.matchPolicy,
          entryType: match.entryType,
          sentence: sentenceText.trim(),
        },
      };
    });

    return spans.sort((a, b) => a.start - b.start || b.score - a.score);
  }

  extract(text: string, sentences: readonly Sentence[]): EntitySpan[] {
    return this.extractEntitiesCanonical(text, sentences, this.options.entityTypes);
  }
}
