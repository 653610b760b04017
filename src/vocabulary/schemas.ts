// ═══════════════════════════════════════════════════════════════════════════════
// VOCABULARY SCHEMAS — Zod Row Validation for Canonical CSV Tables
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { ENTITY_TYPES } from '../types/entities.js';
import { ENTRY_TYPES, MATCH_POLICIES } from './types.js';
import type { AmbiguityRecord, BlockedTerm, Concept, Entry } from './types.js';

const optionalText = z.string().optional().default('');

export const ConceptRowSchema = z
  .object({
    concept_id: z.string().min(1),
    concept_name: z.string().min(1),
    entity_type: z.enum(ENTITY_TYPES),
    domain: optionalText,
    vocabulary: z.string().min(1),
    source_file: optionalText,
    version: optionalText,
    language: optionalText,
    status: optionalText,
  })
  .transform((row): Concept => ({
    conceptId: row.concept_id,
    conceptName: row.concept_name,
    entityType: row.entity_type,
    domain: row.domain,
    vocabulary: row.vocabulary,
    sourceFile: row.source_file,
    version: row.version,
    language: row.language,
    status: row.status,
  }));

export const EntryRowSchema = z
  .object({
    entry_text: optionalText,
    concept_id: z.string().min(1),
    entry_type: z.enum(ENTRY_TYPES),
    match_policy: z.enum(MATCH_POLICIES),
    source_file: optionalText,
    language: optionalText,
  })
  .transform((row): Entry => ({
    entryText: row.entry_text,
    conceptId: row.concept_id,
    entryType: row.entry_type,
    matchPolicy: row.match_policy,
    sourceFile: row.source_file,
    language: row.language,
  }));

export const BlockedTermRowSchema = z
  .object({
    term: z.string().min(1),
    reason: optionalText,
    source_file: optionalText,
  })
  .transform((row): BlockedTerm => ({
    term: row.term,
    reason: row.reason,
    sourceFile: row.source_file,
  }));

export const AmbiguityRowSchema = z
  .object({
    entry_text: z.string().min(1),
    concept_id: optionalText,
    conflict_type: optionalText,
    possible_meanings: optionalText,
    context_rule: optionalText,
    source_file: optionalText,
  })
  .transform((row): AmbiguityRecord => ({
    entryText: row.entry_text,
    conceptId: row.concept_id,
    conflictType: row.conflict_type,
    possibleMeanings: row.possible_meanings,
    contextRule: row.context_rule,
    sourceFile: row.source_file,
  }));

/**
 * Shape csv-parse produces with `columns: true`.
 */
export const CsvRecordsSchema = z.array(z.record(z.string()));
