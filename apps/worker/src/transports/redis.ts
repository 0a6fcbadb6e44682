import { Redis, type RedisOptions } from "ioredis";
import type { Config } from "@warmstart/config";
import { calculateLinearBackoff } from "../domain/utils/backoff.js";
import { log, logFailure } from "../logger.js";
import type {
  ConsumerHandle,
  MessageBus,
  MessageHandler,
  MessageType,
  TransportProvider,
} from "../messaging/types.js";

export type RedisTransportConfig = Pick<
  Config,
  "REDIS_URL" | "REDIS_CHANNEL_PREFIX" | "REDIS_PRIORITY"
>;

type ChannelListener = (message: string) => Promise<void>;

/**
 * Redis / Dragonfly pub/sub bus.
 *
 * Channels: `<prefix>:<type>` and `<prefix>:queue:<queue>`. Payloads are JSON.
 * Subscriptions live on a duplicate connection, since a subscribed client
 * cannot publish.
 */
export class RedisBus implements MessageBus {
  readonly name = "Redis";
  private readonly listeners = new Map<string, Set<ChannelListener>>();

  constructor(
    private readonly publisher: Redis,
    private readonly subscriber: Redis,
    private readonly channelPrefix: string
  ) {
    this.subscriber.on("message", (channel: string, message: string) => {
      this.dispatch(channel, message);
    });
    this.publisher.on("error", (error: Error) => {
      logFailure("bus", "Redis publisher error", error, {});
    });
    this.subscriber.on("error", (error: Error) => {
      logFailure("bus", "Redis subscriber error", error, {});
    });
  }

  channelFor(messageType: string): string {
    return `${this.channelPrefix}:${messageType}`;
  }

  queueChannelFor(queue: string): string {
    return `${this.channelPrefix}:queue:${queue}`;
  }

  async sendMessage<T>(messageType: MessageType<T>, payload: T): Promise<void> {
    await this.publisher.publish(this.channelFor(messageType.name), JSON.stringify(payload));
  }

  async sendToQueue<T>(queue: string, messageType: MessageType<T>, payload: T): Promise<void> {
    await this.publisher.publish(this.queueChannelFor(queue), JSON.stringify(payload));
    log.bus.debug({ queue, messageType: messageType.name }, "published to queue");
  }

  async createConsumer<T>(
    messageType: MessageType<T>,
    handler: MessageHandler<T>
  ): Promise<ConsumerHandle> {
    const channel = this.channelFor(messageType.name);

    const listener: ChannelListener = async (message) => {
      let decoded: unknown;
      try {
        decoded = JSON.parse(message);
      } catch (error) {
        logFailure("bus", "undecodable message", error, { channel });
        return;
      }

      const parsed = messageType.schema.safeParse(decoded);
      if (!parsed.success) {
        log.bus.warn({ channel, messageType: messageType.name }, "dropped invalid payload");
        return;
      }
      await handler(parsed.data);
    };

    const channelListeners = this.listeners.get(channel) ?? new Set<ChannelListener>();
    if (channelListeners.size === 0) {
      await this.subscriber.subscribe(channel);
      log.bus.info({ channel }, "subscribed");
    }
    channelListeners.add(listener);
    this.listeners.set(channel, channelListeners);

    return {
      messageType: messageType.name,
      stop: async () => {
        channelListeners.delete(listener);
        if (channelListeners.size === 0) {
          this.listeners.delete(channel);
          await this.subscriber.unsubscribe(channel);
        }
      },
    };
  }

  async isHealthy(): Promise<boolean> {
    try {
      return (await this.publisher.ping()) === "PONG";
    } catch (error) {
      log.bus.debug({ error: error instanceof Error ? error.message : String(error) }, "Redis ping failed");
      return false;
    }
  }

  async close(): Promise<void> {
    this.listeners.clear();
    await Promise.all([this.subscriber.quit(), this.publisher.quit()]);
    log.bus.info({}, "Redis connections closed");
  }

  private dispatch(channel: string, message: string): void {
    const channelListeners = this.listeners.get(channel);
    if (!channelListeners) {
      return;
    }
    for (const listener of channelListeners) {
      listener(message).catch((error) => {
        logFailure("bus", "handler failed", error, { channel });
      });
    }
  }
}

export class RedisTransportProvider implements TransportProvider {
  readonly name = "Redis";
  readonly priority: number;

  constructor(
    private readonly config: RedisTransportConfig,
    private readonly probeTimeoutMs = 5000
  ) {
    this.priority = config.REDIS_PRIORITY;
  }

  /**
   * One-shot connection with no reconnects: connect, PING, disconnect.
   */
  async canConnect(): Promise<boolean> {
    const redis = new Redis(this.config.REDIS_URL, {
      lazyConnect: true,
      connectTimeout: this.probeTimeoutMs,
      maxRetriesPerRequest: 1,
      retryStrategy: () => null,
    });
    // Probe failures surface through the connect() rejection
    redis.on("error", (error: Error) => {
      log.provider.debug({ error: error.message }, "Redis probe error");
    });

    try {
      await redis.connect();
      return (await redis.ping()) === "PONG";
    } catch (error) {
      log.provider.debug(
        { error: error instanceof Error ? error.message : String(error) },
        "Redis not reachable"
      );
      return false;
    } finally {
      redis.disconnect();
    }
  }

  async createBus(): Promise<RedisBus> {
    const options: RedisOptions = {
      lazyConnect: true,
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      keepAlive: 30000,
      retryStrategy: (times: number) => calculateLinearBackoff(times - 1, { baseDelayMs: 50, maxDelayMs: 2000 }),
    };

    log.provider.info({ channelPrefix: this.config.REDIS_CHANNEL_PREFIX }, "connecting to Redis");
    const publisher = new Redis(this.config.REDIS_URL, options);
    const subscriber = publisher.duplicate();
    // Attaches the error listeners before either client connects
    const bus = new RedisBus(publisher, subscriber, this.config.REDIS_CHANNEL_PREFIX);

    try {
      await publisher.connect();
      await subscriber.connect();
    } catch (error) {
      // Neither client outlives a failed connect
      publisher.disconnect();
      subscriber.disconnect();
      throw error;
    }

    return bus;
  }
}
