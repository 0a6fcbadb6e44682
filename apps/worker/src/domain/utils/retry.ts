/**
 * Retry loop with linear backoff and pluggable delays.
 * Fully testable with dependency injection for delays.
 */

import { calculateLinearBackoff } from "./backoff.js";

export interface RetryOptions {
  /** Retries after the first attempt (total attempts = maxRetries + 1) */
  maxRetries: number;
  /** Base delay in ms between retries */
  baseDelayMs?: number;
  /** Maximum delay in ms (default: uncapped) */
  maxDelayMs?: number;
  /** Aborts the pending wait; the loop stops at the next suspension point */
  signal?: AbortSignal;
  /** Callback for each retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

export type RetryResult<T> =
  | { success: true; value: T; attempts: number }
  | { success: false; error: Error; attempts: number; aborted: boolean };

export interface DelayProvider {
  delay(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Raised by delay providers when the wait is cancelled.
 */
export class AbortedError extends Error {
  constructor(message = "Operation aborted") {
    super(message);
    this.name = "AbortError";
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Default delay provider using setTimeout.
 */
export class TimeoutDelayProvider implements DelayProvider {
  async delay(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new AbortedError();
    }

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer);
        reject(new AbortedError());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}

/**
 * Mock delay provider for testing (instant delays).
 */
export class InstantDelayProvider implements DelayProvider {
  public delays: number[] = [];

  async delay(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new AbortedError();
    }
    this.delays.push(ms);
    // No actual delay
  }

  /** Sum of every requested delay */
  total(): number {
    return this.delays.reduce((sum, ms) => sum + ms, 0);
  }
}

const DEFAULT_OPTIONS: Required<Pick<RetryOptions, "baseDelayMs" | "maxDelayMs">> = {
  baseDelayMs: 100,
  maxDelayMs: Number.POSITIVE_INFINITY,
};

/**
 * Execute an operation with retry logic.
 *
 * @param operation - Async operation to execute, receives the 1-indexed attempt number
 * @param delayProvider - Delay implementation (for testing)
 * @returns Result with success status, value or error, and attempt count
 *
 * @example
 * const result = await executeWithRetry(
 *   () => probe(),
 *   { maxRetries: 5, baseDelayMs: 2000 }
 * );
 * if (!result.success && result.aborted) {
 *   // cancelled during a wait
 * }
 */
export async function executeWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
  delayProvider: DelayProvider = new TimeoutDelayProvider()
): Promise<RetryResult<T>> {
  const config = { ...DEFAULT_OPTIONS, ...options };
  let lastError: Error = new AbortedError();

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    if (config.signal?.aborted) {
      return { success: false, error: lastError, attempts: attempt, aborted: true };
    }

    try {
      const value = await operation(attempt + 1);
      return {
        success: true,
        value,
        attempts: attempt + 1,
      };
    } catch (error) {
      lastError = toError(error);

      if (isAbortError(lastError)) {
        return { success: false, error: lastError, attempts: attempt + 1, aborted: true };
      }

      if (attempt < config.maxRetries) {
        const delayMs = calculateLinearBackoff(attempt, {
          baseDelayMs: config.baseDelayMs,
          maxDelayMs: config.maxDelayMs,
        });

        if (options.onRetry) {
          options.onRetry(attempt + 1, lastError, delayMs);
        }

        try {
          await delayProvider.delay(delayMs, config.signal);
        } catch (delayError) {
          if (isAbortError(delayError)) {
            return { success: false, error: lastError, attempts: attempt + 1, aborted: true };
          }
          throw delayError;
        }
      }
    }
  }

  return {
    success: false,
    error: lastError,
    attempts: config.maxRetries + 1,
    aborted: false,
  };
}
