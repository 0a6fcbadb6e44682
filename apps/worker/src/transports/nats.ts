import {
  connect,
  JSONCodec,
  type ConnectionOptions,
  type NatsConnection,
  type Subscription,
  type TlsOptions,
} from "nats";
import { readFileSync } from "node:fs";
import type { Config } from "@warmstart/config";
import { log, logFailure } from "../logger.js";
import type {
  ConsumerHandle,
  MessageBus,
  MessageHandler,
  MessageType,
  TransportProvider,
} from "../messaging/types.js";

export type NatsTransportConfig = Pick<
  Config,
  | "NATS_SERVERS"
  | "NATS_SUBJECT_PREFIX"
  | "NATS_QUEUE_GROUP"
  | "NATS_PRIORITY"
  | "NATS_TLS_ENABLED"
  | "NATS_TLS_CA_FILE"
  | "NATS_TLS_CERT_FILE"
  | "NATS_TLS_KEY_FILE"
  | "WORKER_ID"
>;

/**
 * Build connection options. TLS material is read from disk when enabled.
 */
export function buildConnectionOptions(config: NatsTransportConfig): ConnectionOptions {
  const servers = config.NATS_SERVERS.split(",")
    .map((server) => server.trim())
    .filter((server) => server.length > 0);

  const connectionOptions: ConnectionOptions = {
    servers,
    name: `worker-${config.WORKER_ID}`,
    reconnect: true,
    maxReconnectAttempts: -1,
    reconnectTimeWait: 1000,
    reconnectJitter: 1000,
    reconnectJitterTLS: 2000,
    pingInterval: 30000,
    maxPingOut: 3,
  };

  if (config.NATS_TLS_ENABLED) {
    const tlsOptions: TlsOptions = {};

    if (config.NATS_TLS_CA_FILE) {
      tlsOptions.ca = readFileSync(config.NATS_TLS_CA_FILE, "utf-8");
    }

    // Client certificate for mutual TLS
    if (config.NATS_TLS_CERT_FILE && config.NATS_TLS_KEY_FILE) {
      tlsOptions.cert = readFileSync(config.NATS_TLS_CERT_FILE, "utf-8");
      tlsOptions.key = readFileSync(config.NATS_TLS_KEY_FILE, "utf-8");
    }

    connectionOptions.tls = tlsOptions;
  }

  return connectionOptions;
}

/**
 * Core NATS pub/sub bus.
 *
 * Subjects: `<prefix>.<type>` for plain sends, `<prefix>.queue.<queue>` for
 * queue routing. Consumers join one queue group so each message is handled
 * by a single worker.
 */
export class NatsBus implements MessageBus {
  readonly name = "NATS";
  private readonly codec = JSONCodec<unknown>();
  private readonly subscriptions = new Set<Subscription>();
  private isClosing = false;

  constructor(
    private readonly nc: NatsConnection,
    private readonly subjectPrefix: string,
    private readonly queueGroup: string
  ) {
    this.watchStatus();
  }

  subjectFor(messageType: string): string {
    return `${this.subjectPrefix}.${messageType}`;
  }

  queueSubjectFor(queue: string): string {
    return `${this.subjectPrefix}.queue.${queue}`;
  }

  async sendMessage<T>(messageType: MessageType<T>, payload: T): Promise<void> {
    this.nc.publish(this.subjectFor(messageType.name), this.codec.encode(payload));
  }

  async sendToQueue<T>(queue: string, messageType: MessageType<T>, payload: T): Promise<void> {
    this.nc.publish(this.queueSubjectFor(queue), this.codec.encode(payload));
    log.bus.debug({ queue, messageType: messageType.name }, "published to queue");
  }

  async createConsumer<T>(
    messageType: MessageType<T>,
    handler: MessageHandler<T>
  ): Promise<ConsumerHandle> {
    const subject = this.subjectFor(messageType.name);
    const sub = this.nc.subscribe(subject, { queue: this.queueGroup });
    this.subscriptions.add(sub);

    this.consume(sub, messageType, handler).catch((error) => {
      logFailure("bus", "consumer loop ended", error, { subject });
    });

    log.bus.info({ subject, queue: this.queueGroup }, "subscribed");

    return {
      messageType: messageType.name,
      stop: async () => {
        this.subscriptions.delete(sub);
        await sub.drain();
      },
    };
  }

  async isHealthy(): Promise<boolean> {
    if (this.nc.isClosed()) {
      return false;
    }
    try {
      await this.nc.flush();
      return true;
    } catch (error) {
      log.bus.debug({ error: error instanceof Error ? error.message : String(error) }, "NATS flush failed");
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.nc.isClosed()) {
      return;
    }
    this.isClosing = true;
    await this.nc.drain();
    log.bus.info({}, "NATS connection drained");
  }

  private async consume<T>(
    sub: Subscription,
    messageType: MessageType<T>,
    handler: MessageHandler<T>
  ): Promise<void> {
    for await (const msg of sub) {
      let decoded: unknown;
      try {
        decoded = this.codec.decode(msg.data);
      } catch (error) {
        logFailure("bus", "undecodable message", error, { subject: msg.subject });
        continue;
      }

      const parsed = messageType.schema.safeParse(decoded);
      if (!parsed.success) {
        log.bus.warn({ subject: msg.subject, messageType: messageType.name }, "dropped invalid payload");
        continue;
      }

      try {
        await handler(parsed.data);
      } catch (error) {
        logFailure("bus", "handler failed", error, {
          subject: msg.subject,
          messageType: messageType.name,
        });
      }
    }
  }

  private watchStatus(): void {
    const watch = async () => {
      for await (const status of this.nc.status()) {
        log.bus.info({ status: status.type, data: status.data }, "NATS status update");
      }
    };
    watch().catch((error) => {
      logFailure("bus", "NATS status watcher stopped", error, {});
    });

    this.nc
      .closed()
      .then((error) => {
        if (error) {
          logFailure("bus", "NATS connection closed with error", error, {});
        } else if (!this.isClosing) {
          log.bus.warn({}, "NATS connection closed unexpectedly");
        }
      })
      .catch((error) => {
        logFailure("bus", "NATS close watcher failed", error, {});
      });
  }
}

export class NatsTransportProvider implements TransportProvider {
  readonly name = "NATS";
  readonly priority: number;

  constructor(
    private readonly config: NatsTransportConfig,
    private readonly probeTimeoutMs = 5000
  ) {
    this.priority = config.NATS_PRIORITY;
  }

  /**
   * Single non-reconnecting connection, flushed and closed again.
   */
  async canConnect(): Promise<boolean> {
    const options = buildConnectionOptions(this.config);
    try {
      const nc = await connect({
        ...options,
        name: `${options.name ?? "worker"}-probe`,
        reconnect: false,
        timeout: this.probeTimeoutMs,
      });
      try {
        await nc.flush();
      } finally {
        await nc.close();
      }
      return true;
    } catch (error) {
      log.provider.debug(
        { servers: options.servers, error: error instanceof Error ? error.message : String(error) },
        "NATS not reachable"
      );
      return false;
    }
  }

  async createBus(): Promise<NatsBus> {
    const options = buildConnectionOptions(this.config);
    log.provider.info(
      { servers: options.servers, tls: this.config.NATS_TLS_ENABLED },
      "connecting to NATS"
    );
    const nc = await connect(options);
    return new NatsBus(nc, this.config.NATS_SUBJECT_PREFIX, this.config.NATS_QUEUE_GROUP);
  }
}
