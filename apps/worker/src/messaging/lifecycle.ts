/**
 * Messaging lifecycle orchestrator.
 *
 * Runs once per process in the background:
 *
 *   buffering -> selecting-provider -> live
 *                                   -> failed   (proxy keeps buffering)
 *
 * Going live flips the proxy, drains the buffer and binds consumers, in that
 * order. Nothing in here throws to the host: an unexpected error ends the run
 * in `failed` and raises the failure signal.
 */

import type { DelayProvider } from "../domain/utils/retry.js";
import type { TimeProvider } from "../domain/utils/time.js";
import { SystemTimeProvider } from "../domain/utils/time.js";
import { createTimer, log, logFailure, withTraceAsync } from "../logger.js";
import { goLiveDuration, lifecyclePhase } from "../metrics.js";
import { LifecycleViolationError } from "./errors.js";
import type { ConsumerBindingReport, HandlerRegistry } from "./handler-registry.js";
import type { MessageBuffer } from "./message-buffer.js";
import type { AdaptiveMessageProxy } from "./message-proxy.js";
import { selectProvider } from "./provider-selection.js";
import { LIFECYCLE_PHASES, type LifecyclePhase, type MessageBus, type TransportProvider } from "./types.js";

// =============================================================================
// Signals
// =============================================================================

export interface ReadyEvent {
  providerName: string;
  handlerCount: number;
  consumersBound: string[];
  consumersFailed: string[];
  /** Buffered messages the bus accepted during drain */
  drained: number;
  readyAt: Date;
}

export type FailureReason = "no-provider" | "cancelled" | "error";

export interface FailedEvent {
  reason: FailureReason;
  failedAt: Date;
  cancelled: boolean;
  attemptedProviders: string[];
  error?: Error;
}

export interface PhaseChangeEvent {
  from: LifecyclePhase;
  to: LifecyclePhase;
  at: Date;
}

export type LifecycleOutcome =
  | { phase: "live"; ready: ReadyEvent }
  | { phase: "failed"; failure: FailedEvent };

export interface LifecycleStatus {
  phase: LifecyclePhase;
  provider: string | null;
  buffered: number;
  handlers: number;
  consumers: string[];
  startedAt: Date | null;
  readyAt: Date | null;
  failedAt: Date | null;
}

type Listener<E> = (event: E) => void;

// Forward-only transition graph
const TRANSITIONS: Record<LifecyclePhase, readonly LifecyclePhase[]> = {
  buffering: ["selecting-provider"],
  "selecting-provider": ["live", "failed"],
  live: [],
  failed: [],
};

export interface MessagingLifecycleOptions {
  providers: readonly TransportProvider[];
  maxRetries?: number;
  baseDelayMs?: number;
  probeTimeoutMs?: number;
  delayProvider?: DelayProvider;
  timeProvider?: TimeProvider;
}

export class MessagingLifecycle {
  private phase: LifecyclePhase = "buffering";
  private run: Promise<LifecycleOutcome> | null = null;
  private bus: MessageBus | null = null;
  private providerName: string | null = null;
  private startedAt: Date | null = null;
  private ready: ReadyEvent | null = null;
  private failure: FailedEvent | null = null;

  private readonly readyListeners = new Set<Listener<ReadyEvent>>();
  private readonly failedListeners = new Set<Listener<FailedEvent>>();
  private readonly phaseListeners = new Set<Listener<PhaseChangeEvent>>();
  private readonly timeProvider: TimeProvider;

  constructor(
    private readonly proxy: AdaptiveMessageProxy,
    private readonly registry: HandlerRegistry,
    private readonly buffer: MessageBuffer,
    private readonly options: MessagingLifecycleOptions
  ) {
    this.timeProvider = options.timeProvider ?? new SystemTimeProvider();
    this.recordPhase();
  }

  /**
   * Start the background run. Later calls return the same promise and ignore their signal.
   * The promise never rejects.
   */
  start(signal?: AbortSignal): Promise<LifecycleOutcome> {
    if (!this.run) {
      this.run = withTraceAsync(() => this.execute(signal));
    }
    return this.run;
  }

  private async execute(signal: AbortSignal | undefined): Promise<LifecycleOutcome> {
    const timer = createTimer();
    this.startedAt = this.now();
    const attemptedProviders: string[] = [];

    try {
      log.lifecycle.info(
        {
          handlers: this.registry.allEntries().map((entry) => entry.messageType),
          buffered: this.buffer.count(),
          providers: this.options.providers.map((provider) => provider.name),
        },
        "starting"
      );
      this.transition("selecting-provider");

      const selection = await selectProvider(this.options.providers, {
        maxRetries: this.options.maxRetries,
        baseDelayMs: this.options.baseDelayMs,
        probeTimeoutMs: this.options.probeTimeoutMs,
        signal,
        delayProvider: this.options.delayProvider,
      });
      attemptedProviders.push(...selection.attemptedProviders);

      switch (selection.status) {
        case "cancelled":
          return this.fail({ reason: "cancelled", attemptedProviders });
        case "exhausted":
          return this.fail({
            reason: "no-provider",
            attemptedProviders,
            ...(selection.lastError && { error: selection.lastError }),
          });
        case "selected":
          return await this.goLive(selection.provider.name, selection.bus, timer);
      }
    } catch (error) {
      logFailure("lifecycle", "run failed unexpectedly", error, { phase: this.phase });
      return this.failUnexpectedly(error, attemptedProviders);
    }
  }

  private async goLive(
    providerName: string,
    bus: MessageBus,
    timer: () => number
  ): Promise<LifecycleOutcome> {
    this.bus = bus;
    this.providerName = providerName;

    // Proxy flip and buffer stop happen synchronously inside goLive()
    const draining = this.proxy.goLive(bus);
    this.transition("live");

    // Live is terminal: from here on failures are reported, never rolled back
    let drained = 0;
    try {
      drained = await draining;
    } catch (error) {
      logFailure("lifecycle", "drain failed", error, { bus: bus.name });
    }

    let report: ConsumerBindingReport;
    try {
      report = await this.registry.createConsumers(bus);
    } catch (error) {
      logFailure("lifecycle", "consumer creation failed", error, { bus: bus.name });
      const bound = this.registry.boundTypes();
      report = {
        bound,
        failed: this.registry
          .allEntries()
          .map((entry) => entry.messageType)
          .filter((type) => !bound.includes(type)),
      };
    }

    const ready: ReadyEvent = {
      providerName,
      handlerCount: this.registry.size(),
      consumersBound: report.bound,
      consumersFailed: report.failed,
      drained,
      readyAt: this.now(),
    };
    this.ready = ready;
    goLiveDuration.observe(timer());
    log.lifecycle.info(
      {
        provider: providerName,
        drained,
        consumers: report.bound.length,
        bindingFailures: report.failed.length,
      },
      "live"
    );
    this.emit(this.readyListeners, ready, "ready");
    return { phase: "live", ready };
  }

  private fail(details: Omit<FailedEvent, "failedAt" | "cancelled">): LifecycleOutcome {
    const failure: FailedEvent = {
      ...details,
      failedAt: this.now(),
      cancelled: details.reason === "cancelled",
    };
    this.failure = failure;
    this.transition("failed");
    log.lifecycle.error(
      {
        reason: failure.reason,
        attemptedProviders: failure.attemptedProviders,
        buffered: this.buffer.count(),
        ...(failure.error && { error: failure.error.message }),
      },
      "failed, messages stay buffered"
    );
    this.emit(this.failedListeners, failure, "failed");
    return { phase: "failed", failure };
  }

  private failUnexpectedly(error: unknown, attemptedProviders: string[]): LifecycleOutcome {
    if (this.ready) {
      return { phase: "live", ready: this.ready };
    }
    if (this.failure) {
      return { phase: "failed", failure: this.failure };
    }

    if (this.getPhase() === "buffering") {
      this.transition("selecting-provider");
    }
    return this.fail({
      reason: "error",
      attemptedProviders,
      error: error instanceof Error ? error : new Error(String(error)),
    });
  }

  private transition(to: LifecyclePhase): void {
    const from = this.phase;
    if (!TRANSITIONS[from].includes(to)) {
      throw new LifecycleViolationError(`Illegal lifecycle transition ${from} -> ${to}`);
    }
    this.phase = to;
    this.recordPhase();
    log.lifecycle.debug({ from, to }, "phase changed");
    this.emit(this.phaseListeners, { from, to, at: this.now() }, "phase-change");
  }

  private recordPhase(): void {
    for (const phase of LIFECYCLE_PHASES) {
      lifecyclePhase.set({ phase }, phase === this.phase ? 1 : 0);
    }
  }

  private emit<E>(listeners: Set<Listener<E>>, event: E, signal: string): void {
    for (const listener of listeners) {
      try {
        listener(event);
      } catch (error) {
        logFailure("lifecycle", "listener threw", error, { signal });
      }
    }
  }

  private now(): Date {
    return new Date(this.timeProvider.now());
  }

  // ===========================================================================
  // Subscriptions
  // ===========================================================================

  /** Called once when live. Fires immediately if already live. */
  onReady(listener: Listener<ReadyEvent>): () => void {
    return this.subscribe(this.readyListeners, listener, this.ready, "ready");
  }

  /** Called once when the run fails. Fires immediately if already failed. */
  onFailed(listener: Listener<FailedEvent>): () => void {
    return this.subscribe(this.failedListeners, listener, this.failure, "failed");
  }

  onPhaseChange(listener: Listener<PhaseChangeEvent>): () => void {
    this.phaseListeners.add(listener);
    return () => {
      this.phaseListeners.delete(listener);
    };
  }

  private subscribe<E>(
    listeners: Set<Listener<E>>,
    listener: Listener<E>,
    emitted: E | null,
    signal: string
  ): () => void {
    if (emitted !== null) {
      this.emit(new Set([listener]), emitted, signal);
      return () => {};
    }
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  // ===========================================================================
  // Diagnostics and shutdown
  // ===========================================================================

  getPhase(): LifecyclePhase {
    return this.phase;
  }

  getStatus(): LifecycleStatus {
    return {
      phase: this.phase,
      provider: this.providerName,
      buffered: this.buffer.count(),
      handlers: this.registry.size(),
      consumers: this.registry.boundTypes(),
      startedAt: this.startedAt,
      readyAt: this.ready?.readyAt ?? null,
      failedAt: this.failure?.failedAt ?? null,
    };
  }

  /**
   * Stop consumers and close the live bus. Safe to call in any phase.
   */
  async stop(): Promise<void> {
    await this.registry.stopConsumers();

    const bus = this.bus;
    if (bus?.close) {
      try {
        await bus.close();
        log.lifecycle.info({ bus: bus.name }, "bus closed");
      } catch (error) {
        logFailure("lifecycle", "bus close failed", error, { bus: bus.name });
      }
    }
  }
}
