/**
 * Shared helpers: ModuleResult construction, timeouts and retries
 */

import type {
  ModuleError,
  ModuleResult,
  ModuleResultMetadata,
  PipelineErrorCode,
  TaskId,
} from '../types/index.js';
import type { Logger } from '../observability/index.js';

// ============================================================================
// ModuleResult helpers
// ============================================================================

/**
 * Build result metadata for a module call that started at `startTime`
 */
export function resultMetadata(taskId: TaskId, module: string, startTime: number): ModuleResultMetadata {
  return {
    taskId,
    module,
    timestamp: new Date().toISOString(),
    duration: Date.now() - startTime,
  };
}

export function succeed<T>(data: T, metadata: ModuleResultMetadata): ModuleResult<T> {
  return { success: true, data, metadata };
}

export function fail<T = never>(
  code: PipelineErrorCode,
  message: string,
  metadata: ModuleResultMetadata,
  details?: unknown
): ModuleResult<T> {
  const error: ModuleError = { code, message };
  if (details !== undefined) {
    error.details = details;
  }
  return { success: false, error, metadata };
}

/**
 * Extract a readable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Timeouts
// ============================================================================

/**
 * Raised when a bounded call does not settle in time
 */
export class TimeoutError extends Error {
  readonly code = 'TIMEOUT' as const;

  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Raised when a call is abandoned because its signal was aborted
 */
export class AbortedError extends Error {
  constructor(operation: string) {
    super(`${operation} was cancelled`);
    this.name = 'AbortedError';
  }
}

/**
 * Run an operation bounded by a timer. The operation receives a signal that
 * is aborted when the timer fires or when `parentSignal` aborts.
 *
 * @throws TimeoutError when `timeoutMs` elapses first
 * @throws AbortedError when `parentSignal` is already aborted
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  parentSignal?: AbortSignal
): Promise<T> {
  if (parentSignal?.aborted) {
    throw new AbortedError(label);
  }

  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(new AbortedError(label));
  parentSignal?.addEventListener('abort', onParentAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      Promise.resolve().then(() => operation(controller.signal)),
      timeout,
    ]);
  } finally {
    clearTimeout(timer);
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
}

// ============================================================================
// Retry Logic
// ============================================================================

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxRetries: number;
  /** Backoff per attempt; the last entry repeats */
  delaysMs: number[];
  logger: Logger;
  context: string;
  /** Return false to stop retrying on this error */
  shouldRetry?: (error: Error) => boolean;
  signal?: AbortSignal;
}

/**
 * Execute function with retry logic and backoff
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { maxRetries, delaysMs, logger, context, shouldRetry, signal } = options;
  let lastError: Error | null = null;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (signal?.aborted) {
      throw new AbortedError(context);
    }
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      logger.warn(`${context} attempt ${attempt + 1} failed`, {
        error: lastError.message,
        attempt: attempt + 1,
        maxAttempts: maxRetries + 1,
      });

      if (shouldRetry && !shouldRetry(lastError)) {
        break;
      }

      if (attempt < maxRetries) {
        const delayMs = delaysMs[attempt] ?? delaysMs[delaysMs.length - 1] ?? 1000;
        logger.info(`Retrying ${context} in ${delayMs}ms`);
        await sleep(delayMs);
      }
    }
  }

  throw lastError ?? new Error(`${context} failed after ${maxRetries + 1} attempts`);
}
