/**
 * Adaptive message proxy - the single entry point application code sends through.
 *
 * While buffering, sends land in the MessageBuffer and registrations in the
 * HandlerRegistry. `goLive()` stops the buffer, installs the bus and flips
 * the phase in one synchronous step before the drain's first await, so a
 * concurrent send is routed to exactly one destination.
 */

import { log, logFailure } from "../logger.js";
import { lifecycleViolationsTotal, messagesSentTotal } from "../metrics.js";
import { dispatchToBus, parsePayload } from "./dispatch.js";
import { LifecycleViolationError } from "./errors.js";
import type { HandlerRegistry, RegistrationResult } from "./handler-registry.js";
import type { MessageBuffer } from "./message-buffer.js";
import type { MessageBus, MessageHandler, MessageType, SendOptions } from "./types.js";

type ProxyState =
  | { phase: "buffering" }
  | { phase: "live"; bus: MessageBus };

export interface MessageProxyOptions {
  /** Bind handlers registered after go-live straight to the live bus (default: true) */
  lateBinding?: boolean;
}

export class AdaptiveMessageProxy {
  private state: ProxyState = { phase: "buffering" };
  private readonly lateBinding: boolean;

  constructor(
    private readonly buffer: MessageBuffer,
    private readonly registry: HandlerRegistry,
    options: MessageProxyOptions = {}
  ) {
    this.lateBinding = options.lateBinding ?? true;
  }

  /**
   * Send a message. Resolves once buffered (before go-live) or once the bus
   * accepted it (after). Never throws because a transport is missing; throws
   * `MessageValidationError` for a payload that fails its schema.
   */
  async send<T>(messageType: MessageType<T>, payload: T, options?: SendOptions): Promise<void> {
    const message = parsePayload(messageType, payload);
    const state = this.currentState();

    if (state.phase === "live") {
      messagesSentTotal.inc({ route: "bus" });
      return dispatchToBus(state.bus, messageType, message, options?.queue);
    }

    try {
      this.buffer.enqueue(messageType, message, options);
      messagesSentTotal.inc({ route: "buffer" });
    } catch (error) {
      if (!(error instanceof LifecycleViolationError)) {
        throw error;
      }

      // The buffer closed under us: the bus must already be installed
      const latest = this.currentState();
      lifecycleViolationsTotal.inc();
      logFailure("lifecycle", "buffer rejected send, redirecting to bus", error, {
        messageType: messageType.name,
        phase: latest.phase,
      });
      if (latest.phase !== "live") {
        throw error;
      }

      messagesSentTotal.inc({ route: "redirect" });
      return dispatchToBus(latest.bus, messageType, message, options?.queue);
    }
  }

  /**
   * Register a handler. Before go-live the consumer is created during the
   * transition; after go-live it is bound immediately when late binding is on.
   */
  async registerHandler<T>(
    messageType: MessageType<T>,
    handler: MessageHandler<T>
  ): Promise<RegistrationResult> {
    const result = this.registry.register(messageType, handler);
    const state = this.currentState();

    if (result === "registered" && state.phase === "live") {
      if (this.lateBinding) {
        await this.registry.bind(messageType.name, state.bus);
      } else {
        log.registry.warn(
          { messageType: messageType.name },
          "registered after go-live; no consumer until restart"
        );
      }
    }

    return result;
  }

  /**
   * Switch to the live bus and drain the buffer into it. Callable once.
   *
   * @returns Number of buffered messages the bus accepted
   */
  async goLive(bus: MessageBus): Promise<number> {
    const state = this.currentState();
    if (state.phase === "live") {
      throw new LifecycleViolationError(`Proxy is already live on "${state.bus.name}"`);
    }

    // Buffer closes no later than the proxy starts treating itself as live
    this.buffer.stopAccepting();
    this.state = { phase: "live", bus };
    log.lifecycle.info({ bus: bus.name, buffered: this.buffer.count() }, "proxy live");

    return this.buffer.drainTo(bus);
  }

  isLive(): boolean {
    return this.currentState().phase === "live";
  }

  getBus(): MessageBus | null {
    const state = this.currentState();
    return state.phase === "live" ? state.bus : null;
  }

  private currentState(): ProxyState {
    return this.state;
  }
}
