/**
 * Pre-live message buffer.
 *
 * Holds every message sent before a transport exists, in enqueue order, and
 * hands them to the bus exactly once when the lifecycle goes live. After
 * `stopAccepting()` (or the start of `drainTo()`), `enqueue` throws
 * `LifecycleViolationError`: the proxy is expected to route to the bus by then.
 */

import { ResizableBuffer } from "../domain/buffer/index.js";
import { SystemTimeProvider, type TimeProvider } from "../domain/utils/time.js";
import { log, logFailure, logWarning } from "../logger.js";
import { bufferedMessages, drainedMessagesTotal } from "../metrics.js";
import { dispatchToBus } from "./dispatch.js";
import { DrainForwardingFailedError, LifecycleViolationError } from "./errors.js";
import type { MessageBus, MessageType, SendOptions } from "./types.js";

export interface BufferedMessage {
  /** Message type name */
  readonly messageType: string;
  readonly payload: unknown;
  readonly enqueuedAt: Date;
  readonly queue?: string;
  /** Bound at enqueue time to the typed descriptor */
  readonly forward: (bus: MessageBus) => Promise<void>;
}

export interface MessageBufferOptions {
  /** Buffered count that triggers a one-time high-water warning */
  warnThreshold?: number;
  timeProvider?: TimeProvider;
}

const DEFAULT_WARN_THRESHOLD = 10_000;

export class MessageBuffer {
  private readonly queue: ResizableBuffer<BufferedMessage>;
  private readonly timeProvider: TimeProvider;
  private readonly failures: DrainForwardingFailedError[] = [];
  private accepting = true;
  private warned = false;

  constructor(options: MessageBufferOptions = {}) {
    this.queue = new ResizableBuffer(options.warnThreshold ?? DEFAULT_WARN_THRESHOLD);
    this.timeProvider = options.timeProvider ?? new SystemTimeProvider();
  }

  enqueue<T>(messageType: MessageType<T>, payload: T, options?: SendOptions): BufferedMessage {
    if (!this.accepting) {
      throw new LifecycleViolationError(
        `Buffer no longer accepts messages; "${messageType.name}" must go to the live bus`,
        { messageType: messageType.name }
      );
    }

    const queue = options?.queue;
    const message: BufferedMessage = Object.freeze({
      messageType: messageType.name,
      payload,
      enqueuedAt: new Date(this.timeProvider.now()),
      ...(queue !== undefined && { queue }),
      forward: (bus: MessageBus) => dispatchToBus(bus, messageType, payload, queue),
    });

    this.queue.push(message);
    bufferedMessages.set(this.queue.size());

    if (!this.warned && this.queue.isFull()) {
      this.warned = true;
      logWarning("buffer", "high-water mark reached, transport still not live", {
        buffered: this.queue.size(),
        threshold: this.queue.getMaxSize(),
      });
    }

    return message;
  }

  /** Stop accepting new messages. Idempotent. */
  stopAccepting(): void {
    this.accepting = false;
  }

  /**
   * Forward everything queued to the bus, oldest first.
   * Stops accepting before anything else; a second call forwards nothing.
   *
   * @returns Number of messages the bus accepted
   */
  async drainTo(bus: MessageBus): Promise<number> {
    this.stopAccepting();
    const pending = this.queue.swap();
    bufferedMessages.set(0);

    if (pending.length === 0) {
      return 0;
    }

    log.buffer.info({ count: pending.length, bus: bus.name }, "draining");

    let forwarded = 0;
    for (const message of pending) {
      try {
        await message.forward(bus);
        forwarded++;
        drainedMessagesTotal.inc({ status: "forwarded" });
      } catch (error) {
        // One poisoned message must not block the rest
        const failure = new DrainForwardingFailedError(message.messageType, message.enqueuedAt, error);
        this.failures.push(failure);
        drainedMessagesTotal.inc({ status: "failed" });
        logFailure("buffer", "drain forward failed", failure, {
          messageType: message.messageType,
          enqueuedAt: message.enqueuedAt.toISOString(),
          bus: bus.name,
        });
      }
    }

    log.buffer.info({ forwarded, failed: pending.length - forwarded, bus: bus.name }, "drained");
    return forwarded;
  }

  count(): number {
    return this.queue.size();
  }

  isAccepting(): boolean {
    return this.accepting;
  }

  /** Enqueue time of the oldest held message */
  oldestEnqueuedAt(): Date | null {
    return this.queue.peek()?.enqueuedAt ?? null;
  }

  /** Messages that failed to forward during drain */
  drainFailures(): readonly DrainForwardingFailedError[] {
    return this.failures;
  }
}
