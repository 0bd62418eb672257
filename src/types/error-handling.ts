/**
 * Error Handling Types for the Control Coverage Engine
 *
 * Errors fall into four groups:
 * - degraded input from collaborators (recovered locally, recorded as notes)
 * - validation errors on override requests (rejected, nothing mutated)
 * - concurrency conflicts on stale writes (rejected, caller re-reads)
 * - corrupted state that breaks the partition invariant (fatal)
 */

// ==================== Error Category Enum ====================

export enum ErrorCategory {
  /** Request failed a precondition */
  INVALID_INPUT = 'INVALID_INPUT',
  /** Control is not in a list the requested transition may start from */
  INVALID_TRANSITION = 'INVALID_TRANSITION',
  /** Control or assessment does not exist */
  NOT_FOUND = 'NOT_FOUND',
  /** Write based on a stale read */
  CONCURRENCY_CONFLICT = 'CONCURRENCY_CONFLICT',
  /** Stored state violates the partition invariant */
  CORRUPTED_STATE = 'CORRUPTED_STATE',
  /** Classifier or extractor did not answer in time */
  TIMEOUT = 'TIMEOUT',
  UNKNOWN = 'UNKNOWN',
}

// ==================== Error Response Interface ====================

/**
 * Error response handed to transport layers
 */
export interface ErrorResponse {
  category: ErrorCategory;
  errorCode: string;
  message: string;
  retryable: boolean;
  context?: Record<string, unknown>;
  timestamp: Date;
}

// ==================== Retry Configuration ====================

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitter: boolean;
  retryableCategories: ErrorCategory[];
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 50,
  maxDelayMs: 1000,
  backoffMultiplier: 2,
  jitter: true,
  retryableCategories: [
    ErrorCategory.CONCURRENCY_CONFLICT,
  ],
};

// ==================== Custom Error Classes ====================

/**
 * Base error class for engine errors
 */
export class CoverageEngineError extends Error {
  public readonly category: ErrorCategory;
  public readonly errorCode: string;
  public readonly retryable: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    category: ErrorCategory = ErrorCategory.UNKNOWN,
    errorCode: string = 'ERR_UNKNOWN',
    retryable: boolean = false,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CoverageEngineError';
    this.category = category;
    this.errorCode = errorCode;
    this.retryable = retryable;
    this.context = context;
  }

  toErrorResponse(): ErrorResponse {
    return {
      category: this.category,
      errorCode: this.errorCode,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
      timestamp: new Date(),
    };
  }
}

export type ValidationErrorCode = 'MISSING_REASON' | 'INVALID_INPUT';

/**
 * Request rejected before any state changed
 */
export class ValidationError extends CoverageEngineError {
  constructor(
    message: string,
    errorCode: ValidationErrorCode | 'INVALID_TRANSITION' = 'INVALID_INPUT',
    context?: Record<string, unknown>,
    category: ErrorCategory = ErrorCategory.INVALID_INPUT
  ) {
    super(message, category, errorCode, false, context);
    this.name = 'ValidationError';
  }
}

/**
 * Control sits in a list the requested transition may not start from
 */
export class InvalidTransitionError extends ValidationError {
  public readonly controlId: string;
  public readonly currentStatus: string;
  public readonly action: string;

  constructor(controlId: string, currentStatus: string, action: string) {
    super(
      `Cannot ${action.replace(/_/g, ' ')} for control ${controlId} in status ${currentStatus}`,
      'INVALID_TRANSITION',
      { controlId, currentStatus, action },
      ErrorCategory.INVALID_TRANSITION
    );
    this.name = 'InvalidTransitionError';
    this.controlId = controlId;
    this.currentStatus = currentStatus;
    this.action = action;
  }
}

export class NotFoundError extends CoverageEngineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCategory.NOT_FOUND, 'NOT_FOUND', false, context);
    this.name = 'NotFoundError';
  }
}

/**
 * Write rejected because the stored version moved on since the read
 */
export class ConcurrencyConflictError extends CoverageEngineError {
  public readonly expectedVersion: number;
  public readonly actualVersion: number;

  constructor(assessmentId: string, expectedVersion: number, actualVersion: number) {
    super(
      `Assessment ${assessmentId} was modified concurrently (expected version ${expectedVersion}, found ${actualVersion})`,
      ErrorCategory.CONCURRENCY_CONFLICT,
      'CONCURRENCY_CONFLICT',
      true,
      { assessmentId, expectedVersion, actualVersion }
    );
    this.name = 'ConcurrencyConflictError';
    this.expectedVersion = expectedVersion;
    this.actualVersion = actualVersion;
  }
}

/**
 * Stored state breaks the partition; requires manual repair
 */
export class CorruptedStateError extends CoverageEngineError {
  public readonly violations: string[];

  constructor(message: string, violations: string[] = []) {
    super(message, ErrorCategory.CORRUPTED_STATE, 'CORRUPTED_STATE', false, { violations });
    this.name = 'CorruptedStateError';
    this.violations = violations;
  }
}

export class CollaboratorTimeoutError extends CoverageEngineError {
  public readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, ErrorCategory.TIMEOUT, 'TIMEOUT', false, {
      label,
      timeoutMs,
    });
    this.name = 'CollaboratorTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

// ==================== Utility Functions ====================

export function categorizeError(error: unknown): ErrorCategory {
  if (error instanceof CoverageEngineError) {
    return error.category;
  }
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (message.includes('timeout') || message.includes('timed out')) {
      return ErrorCategory.TIMEOUT;
    }
  }
  return ErrorCategory.UNKNOWN;
}

export function createErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof CoverageEngineError) {
    return error.toErrorResponse();
  }
  return {
    category: categorizeError(error),
    errorCode: 'ERR_UNKNOWN',
    message: error instanceof Error ? error.message : String(error),
    retryable: false,
    timestamp: new Date(),
  };
}

export function isRetryableError(error: unknown, config: RetryConfig = DEFAULT_RETRY_CONFIG): boolean {
  if (error instanceof CoverageEngineError) {
    return error.retryable && config.retryableCategories.includes(error.category);
  }
  return config.retryableCategories.includes(categorizeError(error));
}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
