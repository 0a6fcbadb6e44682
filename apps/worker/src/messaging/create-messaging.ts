/**
 * Composition root for the messaging subsystem.
 *
 * Builds one buffer, registry, proxy and lifecycle and hands them back
 * together. Pass the returned object to whoever needs to send; there is no
 * module-level instance.
 */

import type { Config } from "@warmstart/config";
import type { DelayProvider } from "../domain/utils/retry.js";
import type { TimeProvider } from "../domain/utils/time.js";
import { HandlerRegistry, type RegistrationResult } from "./handler-registry.js";
import {
  MessagingLifecycle,
  type FailedEvent,
  type LifecycleOutcome,
  type LifecycleStatus,
  type PhaseChangeEvent,
  type ReadyEvent,
} from "./lifecycle.js";
import { MessageBuffer } from "./message-buffer.js";
import { AdaptiveMessageProxy } from "./message-proxy.js";
import type { MessageHandler, MessageType, SendOptions, TransportProvider } from "./types.js";

export interface MessagingOptions {
  providers: readonly TransportProvider[];
  maxRetries?: number;
  baseDelayMs?: number;
  probeTimeoutMs?: number;
  bufferWarnThreshold?: number;
  lateBinding?: boolean;
  delayProvider?: DelayProvider;
  timeProvider?: TimeProvider;
}

export interface Messaging {
  send<T>(messageType: MessageType<T>, payload: T, options?: SendOptions): Promise<void>;
  registerHandler<T>(messageType: MessageType<T>, handler: MessageHandler<T>): Promise<RegistrationResult>;
  start(signal?: AbortSignal): Promise<LifecycleOutcome>;
  stop(): Promise<void>;
  onReady(listener: (event: ReadyEvent) => void): () => void;
  onFailed(listener: (event: FailedEvent) => void): () => void;
  onPhaseChange(listener: (event: PhaseChangeEvent) => void): () => void;
  getStatus(): LifecycleStatus;

  readonly proxy: AdaptiveMessageProxy;
  readonly lifecycle: MessagingLifecycle;
  readonly buffer: MessageBuffer;
  readonly registry: HandlerRegistry;
}

export function createMessaging(options: MessagingOptions): Messaging {
  const buffer = new MessageBuffer({
    warnThreshold: options.bufferWarnThreshold,
    timeProvider: options.timeProvider,
  });
  const registry = new HandlerRegistry();
  const proxy = new AdaptiveMessageProxy(buffer, registry, { lateBinding: options.lateBinding });
  const lifecycle = new MessagingLifecycle(proxy, registry, buffer, {
    providers: options.providers,
    maxRetries: options.maxRetries,
    baseDelayMs: options.baseDelayMs,
    probeTimeoutMs: options.probeTimeoutMs,
    delayProvider: options.delayProvider,
    timeProvider: options.timeProvider,
  });

  return {
    send: (messageType, payload, sendOptions) => proxy.send(messageType, payload, sendOptions),
    registerHandler: (messageType, handler) => proxy.registerHandler(messageType, handler),
    start: (signal) => lifecycle.start(signal),
    stop: () => lifecycle.stop(),
    onReady: (listener) => lifecycle.onReady(listener),
    onFailed: (listener) => lifecycle.onFailed(listener),
    onPhaseChange: (listener) => lifecycle.onPhaseChange(listener),
    getStatus: () => lifecycle.getStatus(),
    proxy,
    lifecycle,
    buffer,
    registry,
  };
}

/**
 * Messaging tunables from config. Providers come from `createTransportProviders`.
 */
export function messagingOptionsFromConfig(
  config: Config
): Omit<MessagingOptions, "providers" | "delayProvider" | "timeProvider"> {
  return {
    maxRetries: config.MESSAGING_MAX_RETRIES,
    baseDelayMs: config.MESSAGING_RETRY_BASE_DELAY_MS,
    probeTimeoutMs: config.MESSAGING_PROBE_TIMEOUT_MS,
    bufferWarnThreshold: config.MESSAGING_BUFFER_WARN_THRESHOLD,
    lateBinding: config.MESSAGING_LATE_BINDING,
  };
}
