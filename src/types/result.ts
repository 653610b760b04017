// ═══════════════════════════════════════════════════════════════════════════════
// RESULT PATTERN — Type-Safe Error Handling
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// CORE RESULT TYPE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Success variant of Result.
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly error?: never;
}

/**
 * Failure variant of Result.
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
  readonly value?: never;
}

/**
 * Result type representing either success (Ok) or failure (Err).
 *
 * Loaders use it for expected failures (a missing vocabulary file, an
 * unreadable lexicon) so callers can degrade instead of aborting the batch.
 *
 * @example
 * ```typescript
 * const result = readTable(path);
 * if (result.ok) {
 *   rows.push(...result.value);
 * } else {
 *   logger.warn(result.error.message, result.error.context);
 * }
 * ```
 */
export type Result<T, E = AppError> = Ok<T> | Err<E>;

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTRUCTORS
// ─────────────────────────────────────────────────────────────────────────────────

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// ─────────────────────────────────────────────────────────────────────────────────
// COMMON ERROR TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Standard application error with code and context.
 */
export interface AppError {
  readonly code: ErrorCode;
  readonly message: string;
  readonly cause?: Error;
  readonly context?: Record<string, unknown>;
}

/**
 * Create an AppError.
 */
export function appError(
  code: ErrorCode,
  message: string,
  options?: { cause?: Error; context?: Record<string, unknown> }
): AppError {
  return {
    code,
    message,
    cause: options?.cause,
    context: options?.context,
  };
}

/**
 * Error codes raised by loaders, the pipeline and the evaluator.
 */
export const ErrorCode = {
  // Configuration / reference data (non-fatal, logged as warnings)
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  DATA_FILE_MISSING: 'DATA_FILE_MISSING',
  REFERENTIAL_INTEGRITY: 'REFERENTIAL_INTEGRITY',

  // Offsets (entity excluded where detected)
  INVALID_OFFSETS: 'INVALID_OFFSETS',

  // Input files (fatal for the offending file)
  FORMAT_ERROR: 'FORMAT_ERROR',

  // Evaluation
  NO_ALIGNED_CASES: 'NO_ALIGNED_CASES',

  // Internal
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

/**
 * Thrown Error carrying an AppError. Used where a failure must propagate
 * to the caller (malformed JSON/JSONL, nothing to evaluate).
 */
export class ClinicalError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(error: AppError) {
    super(error.message, error.cause ? { cause: error.cause } : undefined);
    this.name = 'ClinicalError';
    this.code = error.code;
    this.context = error.context;
  }

  toAppError(): AppError {
    return appError(this.code, this.message, {
      cause: this.cause instanceof Error ? this.cause : undefined,
      context: this.context,
    });
  }
}

/**
 * Malformed input file. Fatal for that file; no partial recovery.
 */
export class FormatError extends ClinicalError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(appError(ErrorCode.FORMAT_ERROR, message, { cause, context }));
    this.name = 'FormatError';
  }
}
