/**
 * Pure backoff math. No timers, no side effects.
 */

export interface BackoffOptions {
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: uncapped) */
  maxDelayMs?: number;
}

/**
 * Calculate linear backoff delay: base * (attempt + 1).
 *
 * @param attempt - The attempt number (0-indexed, so first retry is attempt 0)
 * @returns Delay in milliseconds
 *
 * @example
 * // Provider selection: 2s, 4s, 6s, 8s, 10s
 * calculateLinearBackoff(0, { baseDelayMs: 2000 }) // 2000
 * calculateLinearBackoff(4, { baseDelayMs: 2000 }) // 10000
 */
export function calculateLinearBackoff(attempt: number, options?: BackoffOptions): number {
  const baseDelayMs = options?.baseDelayMs ?? 1000;
  const maxDelayMs = options?.maxDelayMs ?? Number.POSITIVE_INFINITY;

  return Math.min(baseDelayMs * (attempt + 1), maxDelayMs);
}
