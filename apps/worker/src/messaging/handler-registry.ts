/**
 * Handler Registry - message type name to handler, built up during startup.
 *
 * Each entry carries a closure bound at registration time to the typed
 * descriptor and handler, so binding consumers needs no type inspection.
 * Duplicate registrations are reported, never overwritten.
 */

import { log, logFailure } from "../logger.js";
import { consumerBindingsTotal } from "../metrics.js";
import { ConsumerBindingFailedError } from "./errors.js";
import type { ConsumerHandle, MessageBus, MessageHandler, MessageType } from "./types.js";

export interface HandlerEntry {
  readonly messageType: string;
  readonly registeredAt: Date;
  readonly bind: (bus: MessageBus) => Promise<ConsumerHandle>;
}

export type RegistrationResult = "registered" | "already-registered";

export interface ConsumerBindingReport {
  bound: string[];
  failed: string[];
}

export class HandlerRegistry {
  private readonly entries = new Map<string, HandlerEntry>();
  private readonly consumers = new Map<string, ConsumerHandle>();
  // In-flight bindings, so a late registration racing createConsumers binds once
  private readonly pendingBindings = new Map<string, Promise<ConsumerHandle | null>>();

  register<T>(messageType: MessageType<T>, handler: MessageHandler<T>): RegistrationResult {
    if (this.entries.has(messageType.name)) {
      log.registry.info({ messageType: messageType.name }, "skipped (already registered)");
      return "already-registered";
    }

    this.entries.set(messageType.name, {
      messageType: messageType.name,
      registeredAt: new Date(),
      bind: (bus) => bus.createConsumer(messageType, handler),
    });
    log.registry.info({ messageType: messageType.name }, "registered");
    return "registered";
  }

  has(messageType: string): boolean {
    return this.entries.has(messageType);
  }

  size(): number {
    return this.entries.size;
  }

  isBound(messageType: string): boolean {
    return this.consumers.has(messageType);
  }

  /** Snapshot of every registered entry, in registration order */
  allEntries(): HandlerEntry[] {
    return [...this.entries.values()];
  }

  /** Message types with an active consumer */
  boundTypes(): string[] {
    return [...this.consumers.keys()];
  }

  /**
   * Bind a consumer for every entry that does not have one yet.
   * Each binding is independent: a failure is logged and the rest continue.
   */
  async createConsumers(bus: MessageBus): Promise<ConsumerBindingReport> {
    const report: ConsumerBindingReport = { bound: [], failed: [] };

    for (const entry of this.allEntries()) {
      const handle = await this.bindEntry(entry, bus);
      if (handle) {
        report.bound.push(entry.messageType);
      } else {
        report.failed.push(entry.messageType);
      }
    }

    log.registry.info(
      { bus: bus.name, bound: report.bound.length, failed: report.failed.length },
      "consumers created"
    );
    return report;
  }

  /**
   * Bind a single registered type. Returns false when the type is unknown or binding failed.
   */
  async bind(messageType: string, bus: MessageBus): Promise<boolean> {
    const entry = this.entries.get(messageType);
    if (!entry) {
      return false;
    }
    return (await this.bindEntry(entry, bus)) !== null;
  }

  /**
   * Stop every active consumer. Failures are logged; all consumers get a chance to stop.
   */
  async stopConsumers(): Promise<void> {
    const handles = [...this.consumers.values()];
    this.consumers.clear();

    const results = await Promise.allSettled(handles.map((handle) => handle.stop()));
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        logFailure("registry", "consumer stop failed", result.reason, {
          messageType: handles[index]?.messageType,
        });
      }
    });
  }

  private async bindEntry(entry: HandlerEntry, bus: MessageBus): Promise<ConsumerHandle | null> {
    const existing = this.consumers.get(entry.messageType);
    if (existing) {
      return existing;
    }

    const inFlight = this.pendingBindings.get(entry.messageType);
    if (inFlight) {
      return inFlight;
    }

    const binding = this.attemptBind(entry, bus);
    this.pendingBindings.set(entry.messageType, binding);
    try {
      return await binding;
    } finally {
      this.pendingBindings.delete(entry.messageType);
    }
  }

  private async attemptBind(entry: HandlerEntry, bus: MessageBus): Promise<ConsumerHandle | null> {
    try {
      const handle = await entry.bind(bus);
      this.consumers.set(entry.messageType, handle);
      consumerBindingsTotal.inc({ status: "bound" });
      log.registry.debug({ messageType: entry.messageType, bus: bus.name }, "consumer bound");
      return handle;
    } catch (error) {
      const failure = new ConsumerBindingFailedError(entry.messageType, error);
      consumerBindingsTotal.inc({ status: "failed" });
      logFailure("registry", "consumer binding failed", failure, {
        messageType: entry.messageType,
        bus: bus.name,
      });
      return null;
    }
  }
}
