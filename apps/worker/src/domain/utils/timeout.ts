/**
 * Race a promise against a timer and, when given, an abort signal.
 * The timer and the abort listener are released once the race settles.
 */

import { AbortedError } from "./retry.js";

export class TimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
  signal?: AbortSignal
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;
  const interrupt = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
    if (signal?.aborted) {
      reject(new AbortedError(`${label} aborted`));
    } else if (signal) {
      onAbort = () => reject(new AbortedError(`${label} aborted`));
      signal.addEventListener("abort", onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([promise, interrupt]);
  } finally {
    clearTimeout(timer);
    if (signal && onAbort) {
      signal.removeEventListener("abort", onAbort);
    }
  }
}
