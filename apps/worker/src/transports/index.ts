import type { Config } from "@warmstart/config";
import type { TransportProvider } from "../messaging/types.js";
import { InMemoryTransportProvider } from "./memory.js";
import { NatsTransportProvider } from "./nats.js";
import { RedisTransportProvider } from "./redis.js";

export { InMemoryBus, InMemoryTransportProvider } from "./memory.js";
export { NatsBus, NatsTransportProvider, buildConnectionOptions } from "./nats.js";
export { RedisBus, RedisTransportProvider } from "./redis.js";

/**
 * Providers named in MESSAGING_PROVIDERS, in declaration order.
 * Selection reorders them by priority.
 */
export function createTransportProviders(config: Config): TransportProvider[] {
  const seen = new Set<string>();
  const providers: TransportProvider[] = [];

  for (const kind of config.MESSAGING_PROVIDERS) {
    if (seen.has(kind)) {
      continue;
    }
    seen.add(kind);

    switch (kind) {
      case "nats":
        providers.push(new NatsTransportProvider(config, config.MESSAGING_PROBE_TIMEOUT_MS));
        break;
      case "redis":
        providers.push(new RedisTransportProvider(config, config.MESSAGING_PROBE_TIMEOUT_MS));
        break;
      case "memory":
        providers.push(new InMemoryTransportProvider({ priority: config.MEMORY_PRIORITY }));
        break;
    }
  }

  return providers;
}
