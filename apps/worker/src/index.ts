import { config } from "./config.js";
import { withTimeout } from "./domain/utils/timeout.js";
import { log } from "./logger.js";
import { buildStatusServer } from "./api.js";
import { WorkerStarted } from "./messages.js";
import { createMessaging, messagingOptionsFromConfig } from "./messaging/index.js";
import { createTransportProviders } from "./transports/index.js";

const providers = createTransportProviders(config);
const messaging = createMessaging({
  providers,
  ...messagingOptionsFromConfig(config),
});

// Registered and sent before any transport exists; both are held until go-live
await messaging.registerHandler(WorkerStarted, async (payload) => {
  log.system.info({ workerId: payload.workerId, providers: payload.providers }, "worker announced");
});
await messaging.send(WorkerStarted, {
  workerId: config.WORKER_ID,
  startedAt: new Date().toISOString(),
  providers: providers.map((provider) => provider.name),
});

messaging.onReady((event) => {
  log.system.info(
    { provider: event.providerName, drained: event.drained, consumers: event.consumersBound.length },
    "messaging ready"
  );
});
messaging.onFailed((event) => {
  // Messaging degrades to accept-and-hold; alerting hooks in here
  log.system.error(
    { reason: event.reason, attemptedProviders: event.attemptedProviders },
    "messaging unavailable, sends stay buffered"
  );
});

const lifecycleAbort = new AbortController();
const lifecycleRun = messaging.start(lifecycleAbort.signal);

const app = buildStatusServer(messaging, config);

try {
  await app.listen({ port: config.PORT, host: "0.0.0.0" });

  log.system.info(
    {
      port: config.PORT,
      env: config.NODE_ENV,
      workerId: config.WORKER_ID,
      providers: providers.map((provider) => `${provider.name}:${provider.priority}`),
    },
    "worker started"
  );
} catch (err) {
  log.system.error({ error: err instanceof Error ? err.message : String(err) }, "startup failed");
  process.exit(1);
}

// Graceful shutdown with timeout protection
const SHUTDOWN_TIMEOUT_MS = 30000;

async function step(promise: Promise<unknown>, timeoutMs: number, name: string): Promise<void> {
  try {
    await withTimeout(promise, timeoutMs, name);
  } catch (error) {
    log.system.warn(
      { error: error instanceof Error ? error.message : String(error), component: name },
      "shutdown step failed"
    );
  }
}

async function shutdown(): Promise<void> {
  log.system.info({ buffered: messaging.buffer.count() }, "shutting down");
  const shutdownStart = Date.now();

  // Phase 1: Stop accepting new work
  await step(app.close(), 2000, "Fastify");

  // Phase 2: Stop provider selection if it is still running
  lifecycleAbort.abort();
  await step(lifecycleRun, 2000, "MessagingLifecycle");

  // Phase 3: Stop consumers and close the bus
  await step(messaging.stop(), 5000, "Messaging");

  log.system.info({ durationMs: Date.now() - shutdownStart }, "shutdown complete");
  process.exit(0);
}

// Force exit if graceful shutdown takes too long
let shutdownInProgress = false;
function initiateShutdown(): void {
  if (shutdownInProgress) {
    log.system.warn({}, "shutdown already in progress, forcing exit");
    process.exit(1);
  }
  shutdownInProgress = true;

  const forceExitTimer = setTimeout(() => {
    log.system.error({}, "shutdown timeout exceeded, forcing exit");
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forceExitTimer.unref(); // Don't keep process alive

  shutdown().catch((error) => {
    log.system.error({ error: error instanceof Error ? error.message : String(error) }, "shutdown failed");
    process.exit(1);
  });
}

process.on("SIGTERM", initiateShutdown);
process.on("SIGINT", initiateShutdown);
