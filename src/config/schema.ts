// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMA — Zod Validation for Pipeline and Evaluation Settings
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { ENTITY_TYPES } from '../types/entities.js';

// ─────────────────────────────────────────────────────────────────────────────────
// PRIMITIVES
// ─────────────────────────────────────────────────────────────────────────────────

export const EnvironmentSchema = z.enum(['development', 'test', 'production']);
export type Environment = z.infer<typeof EnvironmentSchema>;

export const EntityTypeSchema = z.enum(ENTITY_TYPES);

export const MatchModeSchema = z.enum([
  'iou',
  'iou_or_min_cov',
  'iou_or_containment',
  'iou_or_min_cov_or_containment',
]);
export type MatchMode = z.infer<typeof MatchModeSchema>;

const RatioSchema = z.number().min(0).max(1);

// ─────────────────────────────────────────────────────────────────────────────────
// SECTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  pretty: z.boolean().default(true),
});

export const LexiconFileSchema = z.object({
  filename: z.string().min(1),
  entityType: EntityTypeSchema,
  /** Lower number loads first and wins on duplicate terms. */
  priority: z.number().int().min(0),
});

export type LexiconFileConfig = z.infer<typeof LexiconFileSchema>;

export const DEFAULT_LEXICON_FILES: LexiconFileConfig[] = [
  { filename: 'symptoms_core_ptbr.txt', entityType: 'SYMPTOM', priority: 1 },
  { filename: 'symptoms_expanded_ptbr.txt', entityType: 'SYMPTOM', priority: 2 },
  { filename: 'anatomy_ptbr.txt', entityType: 'ANATOMY', priority: 1 },
  { filename: 'procedures_ptbr.txt', entityType: 'PROCEDURE', priority: 1 },
  { filename: 'tests_exams_ptbr.txt', entityType: 'TEST', priority: 1 },
  { filename: 'drugs_ptbr.txt', entityType: 'DRUG', priority: 1 },
];

export const LexiconConfigSchema = z.object({
  directory: z.string().default('data/lexicons'),
  files: z.array(LexiconFileSchema).default(DEFAULT_LEXICON_FILES),
});

export const VocabularyConfigSchema = z.object({
  directory: z.string().default('data/vocab/canonical'),
});

export const NerConfigSchema = z.object({
  matcher: z.enum(['baseline', 'canonical']).default('baseline'),
  enableFuzzy: z.boolean().default(true),
  /** Minimum partial-ratio similarity (0-100) for fuzzy spans. */
  minFuzzy: z.number().min(0).max(100).default(90),
});

export const FilterConfigSchema = z.object({
  minChars: z.number().int().min(0).default(4),
  applyToTypes: z.array(EntityTypeSchema).default(['SYMPTOM']),
  trimPunct: z.boolean().default(true),
});

export const AssertionConfigSchema = z.object({
  leftWindowChars: z.number().int().positive().default(60),
});

export const EvaluationConfigSchema = z.object({
  relaxed: z.boolean().default(false),
  overlapThreshold: RatioSchema.default(0.5),
  matchMode: MatchModeSchema.optional(),
  maxErrorExamples: z.number().int().min(0).default(10),
  topEntityTexts: z.number().int().min(0).default(20),
});

// ─────────────────────────────────────────────────────────────────────────────────
// APP CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export const AppConfigSchema = z.object({
  environment: EnvironmentSchema.default('development'),
  logging: LoggingConfigSchema.default({}),
  lexicon: LexiconConfigSchema.default({}),
  vocabulary: VocabularyConfigSchema.default({}),
  ner: NerConfigSchema.default({}),
  filter: FilterConfigSchema.default({}),
  assertion: AssertionConfigSchema.default({}),
  evaluation: EvaluationConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;
export type NerConfig = AppConfig['ner'];
export type FilterSettings = AppConfig['filter'];
export type EvaluationSettings = AppConfig['evaluation'];

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Validate a config object. Throws ZodError on invalid input.
 */
export function validateConfig(input: unknown): AppConfig {
  return AppConfigSchema.parse(input);
}

export function safeValidateConfig(input: unknown): z.SafeParseReturnType<AppConfigInput, AppConfig> {
  return AppConfigSchema.safeParse(input);
}

/**
 * One line per issue: `path.to.field: message`.
 */
export function formatConfigErrors(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

export function getDefaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}
