/**
 * Error Handling Service for the Control Coverage Engine
 *
 * Provides:
 * - Retry strategy with exponential backoff for retryable engine errors
 * - Timeout bound for collaborator calls
 */

import {
  RetryConfig,
  DEFAULT_RETRY_CONFIG,
  CollaboratorTimeoutError,
  isRetryableError,
} from '../types/error-handling.js';

// ==================== Retry Strategy ====================

/**
 * Result of a retry operation
 */
export interface RetryResult<T> {
  success: boolean;
  result?: T;
  error?: Error;
  attempts: number;
  totalTimeMs: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Calculate delay with exponential backoff and optional jitter
 */
export function calculateDelay(attempt: number, config: RetryConfig): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(config.backoffMultiplier, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  if (config.jitter) {
    // 0-25% on top of the capped delay
    const jitter = cappedDelay * Math.random() * 0.25;
    return Math.floor(cappedDelay + jitter);
  }

  return Math.floor(cappedDelay);
}

/**
 * Execute an operation, retrying errors whose category the config lists as
 * retryable. Non-retryable errors are rethrown immediately.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): Promise<T> {
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!isRetryableError(error, config)) {
        throw lastError;
      }

      if (attempt < config.maxAttempts) {
        await sleep(calculateDelay(attempt, config));
      }
    }
  }

  throw lastError || new Error('Operation failed after all retry attempts');
}

/**
 * Execute an operation with retry logic and return a detailed result
 */
export async function withRetryResult<T>(
  operation: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): Promise<RetryResult<T>> {
  let lastError: Error | undefined;
  let attempts = 0;
  const startTime = Date.now();

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    attempts = attempt;
    try {
      const result = await operation(attempt);
      return {
        success: true,
        result,
        attempts,
        totalTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!isRetryableError(error, config)) {
        break;
      }

      if (attempt < config.maxAttempts) {
        await sleep(calculateDelay(attempt, config));
      }
    }
  }

  return {
    success: false,
    error: lastError,
    attempts,
    totalTimeMs: Date.now() - startTime,
  };
}

// ==================== Timeout ====================

/**
 * Rejects with CollaboratorTimeoutError when the operation does not settle
 * within timeoutMs. The operation itself is not cancelled.
 */
export async function withTimeout<T>(
  operation: () => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new CollaboratorTimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation(), timeout]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
  }
}

/**
 * Runs the tasks with at most `limit` in flight, keeping result order
 */
export async function runWithConcurrency<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  limit: number
): Promise<T[]> {
  const results: T[] = new Array(tasks.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < tasks.length) {
      const index = next++;
      results[index] = await tasks[index]();
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(limit, tasks.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}
