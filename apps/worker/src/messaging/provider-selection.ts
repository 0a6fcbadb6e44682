/**
 * Transport provider selection.
 *
 * Providers are tried in priority order (highest first, ties keep declaration
 * order). Each gets `maxRetries + 1` probes with linear backoff between them;
 * with the defaults a provider that never comes up costs 2+4+6+8+10 = 30s
 * before the next one is tried. A provider is selected only when the probe
 * succeeds, the bus is created and the bus reports healthy.
 */

import {
  AbortedError,
  executeWithRetry,
  isAbortError,
  type DelayProvider,
} from "../domain/utils/retry.js";
import { TimeoutError, withTimeout } from "../domain/utils/timeout.js";
import { log, logFailure } from "../logger.js";
import { providerAttemptsTotal } from "../metrics.js";
import { ProviderUnavailableError } from "./errors.js";
import type { MessageBus, TransportProvider } from "./types.js";

export interface ProviderSelectionOptions {
  /** Retries per provider after the first probe (default: 5) */
  maxRetries?: number;
  /** Linear backoff base in ms (default: 2000) */
  baseDelayMs?: number;
  /** Upper bound for each canConnect / createBus / isHealthy call (default: 5000) */
  probeTimeoutMs?: number;
  signal?: AbortSignal;
  delayProvider?: DelayProvider;
}

export type ProviderSelection =
  | {
      status: "selected";
      provider: TransportProvider;
      bus: MessageBus;
      /** Probes spent on the selected provider */
      attempts: number;
      attemptedProviders: string[];
    }
  | { status: "exhausted"; attemptedProviders: string[]; lastError?: Error }
  | { status: "cancelled"; attemptedProviders: string[] };

export const DEFAULT_SELECTION_OPTIONS = {
  maxRetries: 5,
  baseDelayMs: 2000,
  probeTimeoutMs: 5000,
} as const;

/**
 * Order providers by descending priority. Stable: equal priorities keep input order.
 */
export function orderProviders(providers: readonly TransportProvider[]): TransportProvider[] {
  return providers
    .map((provider, index) => ({ provider, index }))
    .sort((a, b) => b.provider.priority - a.provider.priority || a.index - b.index)
    .map(({ provider }) => provider);
}

/**
 * Walk the ordered providers until one yields a healthy bus.
 */
export async function selectProvider(
  providers: readonly TransportProvider[],
  options: ProviderSelectionOptions = {}
): Promise<ProviderSelection> {
  const maxRetries = options.maxRetries ?? DEFAULT_SELECTION_OPTIONS.maxRetries;
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_SELECTION_OPTIONS.baseDelayMs;
  const probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_SELECTION_OPTIONS.probeTimeoutMs;
  const { signal, delayProvider } = options;

  const attemptedProviders: string[] = [];
  let lastError: Error | undefined;

  for (const provider of orderProviders(providers)) {
    if (signal?.aborted) {
      return { status: "cancelled", attemptedProviders };
    }

    attemptedProviders.push(provider.name);
    log.provider.info({ provider: provider.name, priority: provider.priority }, "trying provider");

    const result = await executeWithRetry(
      () => tryProvider(provider, probeTimeoutMs, signal),
      {
        maxRetries,
        baseDelayMs,
        signal,
        onRetry: (attempt, error, delayMs) => {
          log.provider.debug(
            { provider: provider.name, attempt, retryInMs: delayMs, error: error.message },
            "not ready"
          );
        },
      },
      delayProvider
    );

    if (result.success && signal?.aborted) {
      await closeQuietly(result.value, provider);
      log.provider.info({ provider: provider.name, attempts: result.attempts }, "selection cancelled");
      return { status: "cancelled", attemptedProviders };
    }

    if (result.success) {
      log.provider.info(
        { provider: provider.name, attempts: result.attempts },
        "provider selected"
      );
      return {
        status: "selected",
        provider,
        bus: result.value,
        attempts: result.attempts,
        attemptedProviders,
      };
    }

    if (result.aborted) {
      log.provider.info({ provider: provider.name, attempts: result.attempts }, "selection cancelled");
      return { status: "cancelled", attemptedProviders };
    }

    lastError = result.error;
    log.provider.warn(
      { provider: provider.name, attempts: result.attempts, error: result.error.message },
      "provider exhausted, moving on"
    );
  }

  return lastError
    ? { status: "exhausted", attemptedProviders, lastError }
    : { status: "exhausted", attemptedProviders };
}

/**
 * One probe: canConnect, then createBus, then isHealthy.
 * Each step is bounded by the probe timeout and interrupted by the signal.
 * Throws ProviderUnavailableError on any miss; abort errors pass through untouched.
 * A bus is never left open unless it is returned.
 */
async function tryProvider(
  provider: TransportProvider,
  probeTimeoutMs: number,
  signal: AbortSignal | undefined
): Promise<MessageBus> {
  const step = <T>(promise: Promise<T>, label: string): Promise<T> =>
    withTimeout(promise, probeTimeoutMs, `${provider.name} ${label}`, signal);

  let reachable: boolean;
  try {
    reachable = await step(provider.canConnect(signal), "canConnect");
  } catch (error) {
    throw providerFailure(provider, error);
  }
  if (!reachable) {
    providerAttemptsTotal.inc({ provider: provider.name, outcome: "unavailable" });
    throw new ProviderUnavailableError(provider.name, "unavailable");
  }

  const creating = provider.createBus(signal);
  let bus: MessageBus;
  try {
    bus = await step(creating, "createBus");
  } catch (error) {
    if (error instanceof TimeoutError || isAbortError(error)) {
      closeWhenSettled(creating, provider);
    }
    throw providerFailure(provider, error);
  }

  let healthy: boolean;
  try {
    healthy = await step(bus.isHealthy(signal), "isHealthy");
  } catch (error) {
    await closeQuietly(bus, provider);
    throw providerFailure(provider, error);
  }
  if (!healthy) {
    await closeQuietly(bus, provider);
    providerAttemptsTotal.inc({ provider: provider.name, outcome: "unhealthy" });
    throw new ProviderUnavailableError(provider.name, "unhealthy");
  }

  if (signal?.aborted) {
    await closeQuietly(bus, provider);
    throw new AbortedError(`${provider.name} selection aborted`);
  }

  providerAttemptsTotal.inc({ provider: provider.name, outcome: "selected" });
  return bus;
}

/**
 * Close a bus whose creation outlived the attempt that asked for it.
 */
function closeWhenSettled(creating: Promise<MessageBus>, provider: TransportProvider): void {
  creating
    .then((late) => {
      log.provider.debug({ provider: provider.name }, "closing bus created after its attempt ended");
      return closeQuietly(late, provider);
    })
    .catch((error: unknown) => {
      log.provider.debug(
        { provider: provider.name, error: error instanceof Error ? error.message : String(error) },
        "abandoned bus creation failed"
      );
    });
}

function providerFailure(provider: TransportProvider, error: unknown): Error {
  if (isAbortError(error)) {
    return error instanceof Error ? error : new Error(String(error));
  }
  const reason = error instanceof TimeoutError ? "timeout" : "error";
  providerAttemptsTotal.inc({ provider: provider.name, outcome: reason });
  return new ProviderUnavailableError(provider.name, reason, { cause: error });
}

async function closeQuietly(bus: MessageBus, provider: TransportProvider): Promise<void> {
  if (!bus.close) {
    return;
  }
  try {
    await bus.close();
  } catch (error) {
    logFailure("provider", "closing rejected bus failed", error, { provider: provider.name });
  }
}
