// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export {
  EnvironmentSchema,
  EntityTypeSchema,
  MatchModeSchema,
  LoggingConfigSchema,
  LexiconFileSchema,
  LexiconConfigSchema,
  VocabularyConfigSchema,
  NerConfigSchema,
  FilterConfigSchema,
  AssertionConfigSchema,
  EvaluationConfigSchema,
  AppConfigSchema,
  DEFAULT_LEXICON_FILES,
  validateConfig,
  safeValidateConfig,
  formatConfigErrors,
  getDefaultConfig,
} from './schema.js';

export type {
  Environment,
  MatchMode,
  LexiconFileConfig,
  AppConfig,
  AppConfigInput,
  NerConfig,
  FilterSettings,
  EvaluationSettings,
} from './schema.js';

export {
  readEnvironmentConfig,
  loadConfig,
  getConfig,
  isConfigLoaded,
  resetConfig,
  loadTestConfig,
  getEnvironment,
  isProduction,
} from './loader.js';
