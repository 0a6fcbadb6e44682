/**
 * In-process transport. Always reachable unless told otherwise; useful as the
 * lowest-priority fallback and as the bus in tests.
 *
 * Queue-routed sends go to the named queue only, as they do on NATS and Redis:
 * consumers of the message type never see them.
 */

import { log, logFailure } from "../logger.js";
import type {
  ConsumerHandle,
  MessageBus,
  MessageHandler,
  MessageType,
  TransportProvider,
} from "../messaging/types.js";

export interface SentMessage {
  messageType: string;
  payload: unknown;
  queue?: string;
}

type Delivery = (payload: unknown) => Promise<void>;

export class InMemoryBus implements MessageBus {
  readonly name: string;
  /** Every message accepted, in send order */
  readonly sent: SentMessage[] = [];
  private readonly consumers = new Map<string, Set<Delivery>>();
  private closed = false;

  constructor(name = "Local") {
    this.name = name;
  }

  async sendMessage<T>(messageType: MessageType<T>, payload: T): Promise<void> {
    this.assertOpen();
    this.sent.push({ messageType: messageType.name, payload });
    await this.deliver(messageType.name, payload);
  }

  async sendToQueue<T>(queue: string, messageType: MessageType<T>, payload: T): Promise<void> {
    this.assertOpen();
    this.sent.push({ messageType: messageType.name, payload, queue });
  }

  async createConsumer<T>(
    messageType: MessageType<T>,
    handler: MessageHandler<T>
  ): Promise<ConsumerHandle> {
    this.assertOpen();

    const delivery: Delivery = async (payload) => {
      const parsed = messageType.schema.safeParse(payload);
      if (!parsed.success) {
        log.bus.warn({ bus: this.name, messageType: messageType.name }, "dropped invalid payload");
        return;
      }
      await handler(parsed.data);
    };

    const deliveries = this.consumers.get(messageType.name) ?? new Set<Delivery>();
    deliveries.add(delivery);
    this.consumers.set(messageType.name, deliveries);

    return {
      messageType: messageType.name,
      stop: async () => {
        deliveries.delete(delivery);
      },
    };
  }

  async isHealthy(): Promise<boolean> {
    return !this.closed;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.consumers.clear();
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Count of consumers bound for a message type */
  consumerCount(messageType: string): number {
    return this.consumers.get(messageType)?.size ?? 0;
  }

  /** Messages routed to one queue, in order */
  queued(queue: string): SentMessage[] {
    return this.sent.filter((message) => message.queue === queue);
  }

  /** Messages sent for one type, in order */
  sentOf(messageType: string): SentMessage[] {
    return this.sent.filter((message) => message.messageType === messageType);
  }

  private async deliver(messageType: string, payload: unknown): Promise<void> {
    const deliveries = this.consumers.get(messageType);
    if (!deliveries) {
      return;
    }

    for (const delivery of [...deliveries]) {
      try {
        await delivery(payload);
      } catch (error) {
        // Handler failures belong to the consumer, not the sender
        logFailure("bus", "handler failed", error, { bus: this.name, messageType });
      }
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error(`Bus "${this.name}" is closed`);
    }
  }
}

export interface InMemoryTransportProviderOptions {
  name?: string;
  priority?: number;
  /** Whether canConnect reports reachable (default: true) */
  available?: boolean;
}

export class InMemoryTransportProvider implements TransportProvider {
  readonly name: string;
  readonly priority: number;
  private available: boolean;
  private bus: InMemoryBus | null = null;

  constructor(options: InMemoryTransportProviderOptions = {}) {
    this.name = options.name ?? "Local";
    this.priority = options.priority ?? 0;
    this.available = options.available ?? true;
  }

  async canConnect(): Promise<boolean> {
    return this.available;
  }

  async createBus(): Promise<InMemoryBus> {
    this.bus = new InMemoryBus(this.name);
    return this.bus;
  }

  setAvailable(available: boolean): void {
    this.available = available;
  }

  /** The last bus handed out, if any */
  getBus(): InMemoryBus | null {
    return this.bus;
  }
}
