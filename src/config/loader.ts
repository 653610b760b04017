// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG LOADER — Environment Overrides, Caching, Test Config
// ═══════════════════════════════════════════════════════════════════════════════

import {
  AppConfigSchema,
  formatConfigErrors,
  type AppConfig,
  type AppConfigInput,
  type Environment,
} from './schema.js';
import { ClinicalError, ErrorCode, appError } from '../types/result.js';
import { configureLogger } from '../observability/logging/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

function envBool(key: string): boolean | undefined {
  const value = process.env[key]?.toLowerCase();
  if (value === undefined) return undefined;
  return value === 'true' || value === '1' || value === 'yes';
}

function envNumber(key: string): number | undefined {
  const value = process.env[key];
  if (value === undefined) return undefined;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? undefined : parsed;
}

function envString(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? undefined : value;
}

function envList(key: string): string[] | undefined {
  const value = process.env[key];
  if (!value) return undefined;
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Drop undefined leaves so env lookups that are unset fall through to defaults.
 */
function compact(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) continue;
    if (isPlainObject(value)) {
      const nested = compact(value);
      if (Object.keys(nested).length > 0) out[key] = nested;
    } else {
      out[key] = value;
    }
  }
  return out;
}

function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = out[key];
    out[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return out;
}

/**
 * Read `CLIN_*` environment variables into a partial config.
 */
export function readEnvironmentConfig(): Record<string, unknown> {
  return compact({
    environment: envString('NODE_ENV'),
    logging: {
      level: envString('LOG_LEVEL')?.toLowerCase(),
      pretty: envBool('CLIN_LOG_PRETTY'),
    },
    lexicon: {
      directory: envString('CLIN_LEXICON_DIR'),
    },
    vocabulary: {
      directory: envString('CLIN_VOCAB_DIR'),
    },
    ner: {
      matcher: envString('CLIN_NER_MATCHER'),
      enableFuzzy: envBool('CLIN_NER_ENABLE_FUZZY'),
      minFuzzy: envNumber('CLIN_NER_MIN_FUZZY'),
    },
    filter: {
      minChars: envNumber('CLIN_FILTER_MIN_CHARS'),
      applyToTypes: envList('CLIN_FILTER_TYPES'),
      trimPunct: envBool('CLIN_FILTER_TRIM_PUNCT'),
    },
    assertion: {
      leftWindowChars: envNumber('CLIN_ASSERTION_WINDOW'),
    },
    evaluation: {
      relaxed: envBool('CLIN_EVAL_RELAXED'),
      overlapThreshold: envNumber('CLIN_EVAL_OVERLAP'),
      matchMode: envString('CLIN_EVAL_MATCH_MODE'),
      maxErrorExamples: envNumber('CLIN_EVAL_MAX_ERRORS'),
    },
  });
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOADING
// ─────────────────────────────────────────────────────────────────────────────────

let cachedConfig: AppConfig | null = null;

function applyConfig(config: AppConfig): AppConfig {
  configureLogger({
    level: config.logging.level,
    pretty: config.logging.pretty,
    environment: config.environment,
  });
  cachedConfig = config;
  return config;
}

/**
 * Load config from defaults, environment and explicit overrides (highest wins).
 * Invalid values are a configuration error and throw.
 */
export function loadConfig(overrides: AppConfigInput = {}): AppConfig {
  const merged = deepMerge(readEnvironmentConfig(), compact(overrides));
  const result = AppConfigSchema.safeParse(merged);

  if (!result.success) {
    const issues = formatConfigErrors(result.error);
    throw new ClinicalError(
      appError(ErrorCode.CONFIGURATION_ERROR, `Invalid configuration: ${issues.join('; ')}`, {
        context: { issues },
      })
    );
  }

  return applyConfig(result.data);
}

/**
 * Get the loaded config, loading it on first access.
 */
export function getConfig(): AppConfig {
  return cachedConfig ?? loadConfig();
}

export function isConfigLoaded(): boolean {
  return cachedConfig !== null;
}

export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Config for tests: ignores the environment entirely.
 */
export function loadTestConfig(overrides: AppConfigInput = {}): AppConfig {
  return applyConfig(AppConfigSchema.parse(deepMerge({ environment: 'test' }, compact(overrides))));
}

export function getEnvironment(): Environment {
  return getConfig().environment;
}

export function isProduction(): boolean {
  return getEnvironment() === 'production';
}
