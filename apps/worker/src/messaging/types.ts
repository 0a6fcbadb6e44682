/**
 * Messaging contracts shared by the proxy, the lifecycle and the transports.
 */

import type { z } from "zod";

// =============================================================================
// Message Types
// =============================================================================

/**
 * Stable descriptor for one kind of message.
 *
 * `name` is the registry key and the transport routing key (NATS subject
 * suffix, Redis channel suffix). `schema` validates payloads on send and
 * decodes them on receive.
 */
export interface MessageType<T> {
  readonly name: string;
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/** Payload type carried by a message type */
export type PayloadOf<M> = M extends MessageType<infer T> ? T : never;

const MESSAGE_TYPE_NAME = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

/**
 * Define a message type once and share the descriptor between senders and handlers.
 *
 * @example
 * const OrderPlaced = defineMessageType(
 *   "orders.placed",
 *   z.object({ orderId: z.string(), total: z.number() })
 * );
 */
export function defineMessageType<T>(
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): MessageType<T> {
  if (!MESSAGE_TYPE_NAME.test(name)) {
    throw new Error(
      `Invalid message type name "${name}": use letters, digits, ".", "_" or "-"`
    );
  }
  return Object.freeze({ name, schema });
}

export type MessageHandler<T> = (payload: T) => Promise<void>;

export interface SendOptions {
  /** Route to a named queue instead of the type's default destination */
  queue?: string;
}

// =============================================================================
// Bus (live transport)
// =============================================================================

export interface ConsumerHandle {
  readonly messageType: string;
  stop(): Promise<void>;
}

export interface MessageBus {
  /** Transport name for logging */
  readonly name: string;

  sendMessage<T>(messageType: MessageType<T>, payload: T): Promise<void>;

  /** Optional: queue-specific routing; falls back to sendMessage when absent */
  sendToQueue?<T>(queue: string, messageType: MessageType<T>, payload: T): Promise<void>;

  createConsumer<T>(messageType: MessageType<T>, handler: MessageHandler<T>): Promise<ConsumerHandle>;

  isHealthy(signal?: AbortSignal): Promise<boolean>;

  /** Optional: release connections */
  close?(): Promise<void>;
}

// =============================================================================
// Transport Provider
// =============================================================================

export interface TransportProvider {
  /** Provider name for logging and status */
  readonly name: string;
  /** Higher goes first; ties keep declaration order */
  readonly priority: number;

  /** Side-effect-free reachability probe */
  canConnect(signal?: AbortSignal): Promise<boolean>;

  /** Only called after a successful probe */
  createBus(signal?: AbortSignal): Promise<MessageBus>;
}

// =============================================================================
// Lifecycle
// =============================================================================

export const LIFECYCLE_PHASES = ["buffering", "selecting-provider", "live", "failed"] as const;
export type LifecyclePhase = (typeof LIFECYCLE_PHASES)[number];
