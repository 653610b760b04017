// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  LogLevel,
  LoggerConfig,
  LoggerOptions,
  ILogger,
} from './logger.js';

export {
  LOG_LEVELS,
  configureLogger,
  getLoggerConfig,
  getLogger,
  resetLogger,
  loggers,
  withTiming,
} from './logger.js';
