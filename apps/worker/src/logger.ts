import pino from "pino";
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";
import { config } from "./config.js";

const isDev = config.NODE_ENV === "development";

// =============================================================================
// Trace Context (Correlation IDs)
// =============================================================================
// AsyncLocalStorage propagates traceId through async operations without
// passing it around by hand. Each lifecycle run gets one trace:
//
//   await withTraceAsync(() => lifecycle.run(signal));
//   // every provider probe, drain and binding log carries the same traceId
// =============================================================================

interface TraceContext {
  traceId: string;
}

const traceStorage = new AsyncLocalStorage<TraceContext>();

/**
 * Generate a short, unique trace ID (12 chars, base64url)
 */
export function generateTraceId(): string {
  return randomBytes(9).toString("base64url").slice(0, 12);
}

/**
 * Get the current trace ID from context, or undefined if not in a trace
 */
export function getTraceId(): string | undefined {
  return traceStorage.getStore()?.traceId;
}

/**
 * Run an async function with a trace context. All logs within will include the traceId.
 * If no traceId is provided, a new one is generated.
 */
export async function withTraceAsync<T>(
  fn: () => Promise<T>,
  traceId?: string
): Promise<T> {
  const ctx: TraceContext = { traceId: traceId ?? generateTraceId() };
  return traceStorage.run(ctx, fn);
}

// =============================================================================
// Structured Logger
// =============================================================================
//
// Usage patterns:
//
// SUCCESS (short, info level):
//   log.lifecycle.info({ provider: "NATS", drained: 3 }, "live")
//
// FAILURE (detailed, error level):
//   log.buffer.error({ messageType, enqueuedAt, error: err.message }, "drain forward failed")
//
// DEBUG (verbose, only in dev):
//   log.provider.debug({ provider, attempt, retryInMs }, "not ready")
//
// =============================================================================

const baseConfig: pino.LoggerOptions = {
  level: config.LOG_LEVEL ?? (isDev ? "debug" : "info"),

  formatters: {
    level: (label) => ({ level: label }),
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  // Mixin adds traceId to every log entry automatically
  mixin() {
    const traceId = traceStorage.getStore()?.traceId;
    return traceId ? { traceId } : {};
  },
};

// Pretty printing only in development; tests and production log JSON
export const logger = isDev
  ? pino({
      ...baseConfig,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
          messageFormat: "{component} | {msg}",
          singleLine: true,
        },
      },
    })
  : pino(baseConfig);

// =============================================================================
// Component Loggers
// =============================================================================

export const log = {
  // Phase transitions, go-live, ready/failed signals
  lifecycle: logger.child({ component: "lifecycle" }),

  // Pre-live message buffer and drain
  buffer: logger.child({ component: "buffer" }),

  // Handler registration and consumer binding
  registry: logger.child({ component: "registry" }),

  // Provider probing and selection
  provider: logger.child({ component: "provider" }),

  // Live transport operations (NATS, Redis, in-memory)
  bus: logger.child({ component: "bus" }),

  // Health / metrics endpoints
  api: logger.child({ component: "api" }),

  // Process-level events
  system: logger.child({ component: "system" }),
};

export type LogComponent = keyof typeof log;

// =============================================================================
// Convenience Functions
// =============================================================================

/**
 * Log a failure with full context for debugging
 */
export function logFailure(
  component: LogComponent,
  event: string,
  error: Error | unknown,
  context: Record<string, unknown>
): void {
  const err = error instanceof Error ? error : new Error(String(error));

  log[component].error({
    ...context,
    error: err.message,
    errorName: err.name,
    ...(isDev && { stack: err.stack }),
  }, event);
}

/**
 * Log a warning for unexpected but non-critical issues
 */
export function logWarning(
  component: LogComponent,
  event: string,
  context: Record<string, unknown>
): void {
  log[component].warn(context, event);
}

/**
 * Create a timer for measuring operation duration.
 * Returns elapsed seconds as a number, for histograms and logs alike.
 */
export function createTimer(): () => number {
  const start = process.hrtime.bigint();
  return () => Number(process.hrtime.bigint() - start) / 1_000_000_000;
}

export default log;
