// ═══════════════════════════════════════════════════════════════════════════════
// STRUCTURED LOGGER — Component Loggers for Loaders, Matchers and Evaluation
// ═══════════════════════════════════════════════════════════════════════════════
//
// JSON lines in production, colored single-line output in development.
// Batch tools report progress and warning counts through here; nothing else
// in the library writes to the console.
//
// Usage:
//   import { getLogger } from '../observability/logging/index.js';
//
//   const logger = getLogger({ component: 'lexicon' });
//   logger.warn('Lexicon file not found', { path });
//
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Log levels in order of severity.
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Numeric log level values (Pino-compatible).
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
  /** Minimum log level */
  level?: LogLevel;

  /** Enable pretty printing (development) */
  pretty?: boolean;

  /** Service name for logs */
  serviceName?: string;

  /** Environment name */
  environment?: string;

  /** Enable timestamp */
  timestamp?: boolean;

  /** Silence all output (tests) */
  silent?: boolean;

  /** Custom base context added to all logs */
  base?: Record<string, unknown>;
}

/**
 * Options for creating a child logger.
 */
export interface LoggerOptions {
  /** Component name */
  component?: string;

  /** Additional context */
  context?: Record<string, unknown>;
}

export interface ILogger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(options: LoggerOptions): ILogger;

  /** Check if a level is enabled */
  isLevelEnabled(level: LogLevel): boolean;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  pretty: process.env.NODE_ENV !== 'production',
  serviceName: 'clinical-ner',
  environment: process.env.NODE_ENV ?? 'development',
  timestamp: true,
  silent: false,
};

let globalConfig: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG };

/**
 * Configure the global logger settings. Existing loggers read the level on every call.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
  rootLogger = null;
}

export function getLoggerConfig(): LoggerConfig {
  return { ...globalConfig };
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Get log level from environment or config.
 */
function getEffectiveLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return globalConfig.level ?? 'info';
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTERS
// ─────────────────────────────────────────────────────────────────────────────────

function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      errorName: error.name,
      errorMessage: error.message,
      ...(code ? { errorCode: code } : {}),
      errorStack: error.stack?.split('\n').slice(0, 10).join('\n'),
      ...(error.cause ? { errorCause: String(error.cause) } : {}),
    };
  }

  if (typeof error === 'string') {
    return { errorMessage: error };
  }

  return { errorMessage: String(error) };
}

interface LogEntry {
  level: LogLevel;
  msg: string;
  time?: string;
  component?: string;
  fields: Record<string, unknown>;
}

function toJson(entry: LogEntry): string {
  return JSON.stringify({
    level: entry.level,
    levelNum: LOG_LEVELS[entry.level],
    time: entry.time,
    msg: entry.msg,
    ...globalConfig.base,
    service: globalConfig.serviceName,
    env: globalConfig.environment,
    ...(entry.component ? { component: entry.component } : {}),
    ...entry.fields,
  });
}

const COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

function prettyPrint(entry: LogEntry): string {
  const levelStr = entry.level.toUpperCase().padEnd(5);
  const timeStr = entry.time ? entry.time.split('T')[1]?.replace('Z', '') ?? '' : '';
  const componentStr = entry.component ? `[${entry.component}]` : '';

  let contextStr = '';
  if (Object.keys(entry.fields).length > 0) {
    contextStr = ` ${DIM}${JSON.stringify(entry.fields)}${RESET}`;
  }

  return `${DIM}${timeStr}${RESET} ${COLORS[entry.level]}${levelStr}${RESET} ${componentStr} ${entry.msg}${contextStr}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// OUTPUT
// ─────────────────────────────────────────────────────────────────────────────────

function writeLog(entry: LogEntry): void {
  if (globalConfig.silent) {
    return;
  }

  const output = globalConfig.pretty ? prettyPrint(entry) : toJson(entry);

  if (entry.level === 'error' || entry.level === 'fatal') {
    console.error(output);
  } else if (entry.level === 'warn') {
    console.warn(output);
  } else {
    console.log(output);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

function createLoggerImpl(options: LoggerOptions = {}): ILogger {
  const { component, context: baseContext = {} } = options;

  const enabled = (level: LogLevel): boolean => LOG_LEVELS[level] >= LOG_LEVELS[getEffectiveLevel()];

  const emit = (level: LogLevel, message: string, fields: Record<string, unknown>): void => {
    if (!enabled(level)) {
      return;
    }
    writeLog({
      level,
      msg: message,
      time: globalConfig.timestamp ? new Date().toISOString() : undefined,
      component,
      fields: { ...baseContext, ...fields },
    });
  };

  const logWithError = (
    level: LogLevel,
    message: string,
    error?: unknown,
    context: Record<string, unknown> = {}
  ): void => {
    const errorContext = error !== undefined ? formatError(error) : {};
    emit(level, message, { ...context, ...errorContext });
  };

  return {
    trace: (message, context = {}) => emit('trace', message, context),
    debug: (message, context = {}) => emit('debug', message, context),
    info: (message, context = {}) => emit('info', message, context),
    warn: (message, context = {}) => emit('warn', message, context),
    error: (message, error, context) => logWithError('error', message, error, context),
    fatal: (message, error, context) => logWithError('fatal', message, error, context),

    child: (childOptions: LoggerOptions): ILogger => {
      return createLoggerImpl({
        component: childOptions.component ?? component,
        context: { ...baseContext, ...childOptions.context },
      });
    },

    isLevelEnabled: enabled,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PUBLIC API
// ─────────────────────────────────────────────────────────────────────────────────

let rootLogger: ILogger | null = null;

/**
 * Get the root logger or create a child logger.
 */
export function getLogger(options?: LoggerOptions): ILogger {
  if (!rootLogger) {
    rootLogger = createLoggerImpl();
  }

  if (options) {
    return rootLogger.child(options);
  }

  return rootLogger;
}

/**
 * Reset the root logger and its configuration (for testing).
 */
export function resetLogger(): void {
  globalConfig = { ...DEFAULT_LOGGER_CONFIG };
  rootLogger = null;
}

/**
 * Pre-created component loggers.
 * Usage: loggers.eval.info('Evaluation complete');
 */
export const loggers = {
  get lexicon(): ILogger { return getLogger({ component: 'lexicon' }); },
  get vocabulary(): ILogger { return getLogger({ component: 'vocabulary' }); },
  get ner(): ILogger { return getLogger({ component: 'ner' }); },
  get pipeline(): ILogger { return getLogger({ component: 'pipeline' }); },
  get eval(): ILogger { return getLogger({ component: 'eval' }); },
};

// ─────────────────────────────────────────────────────────────────────────────────
// UTILITY FUNCTIONS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Run a synchronous step and log how long it took.
 */
export function withTiming<T>(name: string, fn: () => T, logger?: ILogger): T {
  const log = logger ?? getLogger({ component: 'perf' });
  const start = performance.now();

  try {
    const result = fn();
    log.debug(`${name} completed`, { durationMs: (performance.now() - start).toFixed(2) });
    return result;
  } catch (error) {
    log.error(`${name} failed`, error, { durationMs: (performance.now() - start).toFixed(2) });
    throw error;
  }
}
