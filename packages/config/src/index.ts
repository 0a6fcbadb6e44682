import { z } from "zod";

// =============================================================================
// Helpers
// =============================================================================

/**
 * Parse string booleans from environment variables.
 * z.coerce.boolean() treats any non-empty string as true, including "false"
 */
const stringBoolean = z
  .union([z.boolean(), z.string()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    return val.toLowerCase() === "true";
  });

/** Comma-separated list, trimmed and lowercased, empty entries removed */
const stringList = z
  .union([z.array(z.string()), z.string()])
  .transform((val) => {
    const items = Array.isArray(val) ? val : val.split(",");
    return items.map((item) => item.trim().toLowerCase()).filter((item) => item.length > 0);
  });

export const TRANSPORT_KINDS = ["nats", "redis", "memory"] as const;
export type TransportKind = (typeof TRANSPORT_KINDS)[number];

// =============================================================================
// Config Schema - Grouped by Domain
// =============================================================================

export const configSchema = z.object({
  // ===========================================================================
  // Environment
  // ===========================================================================
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  WORKER_ID: z.string().default("worker-1"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),

  // ===========================================================================
  // Server (health + metrics only)
  // ===========================================================================
  PORT: z.coerce.number().default(6001),

  // ===========================================================================
  // Messaging Lifecycle
  // ===========================================================================
  /** Transports to try, in declaration order (ties on priority keep this order) */
  MESSAGING_PROVIDERS: stringList
    .pipe(z.array(z.enum(TRANSPORT_KINDS)))
    .default("nats,memory"),
  /** Retries per provider after the first probe */
  MESSAGING_MAX_RETRIES: z.coerce.number().int().min(0).max(50).default(5),
  /** Linear backoff base: waits are base * 1, base * 2, ... */
  MESSAGING_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  /** Upper bound for a single canConnect / createBus / isHealthy call */
  MESSAGING_PROBE_TIMEOUT_MS: z.coerce.number().int().min(1).default(5000),
  /** Buffered message count that triggers a high-water warning */
  MESSAGING_BUFFER_WARN_THRESHOLD: z.coerce.number().int().min(1).default(10_000),
  /** Bind handlers registered after go-live straight to the live bus */
  MESSAGING_LATE_BINDING: stringBoolean.default(true),

  // ===========================================================================
  // NATS
  // ===========================================================================
  NATS_SERVERS: z.string().default("nats://localhost:4222"),
  NATS_SUBJECT_PREFIX: z.string().min(1).default("warmstart"),
  NATS_QUEUE_GROUP: z.string().min(1).default("warmstart-workers"),
  NATS_PRIORITY: z.coerce.number().int().default(100),
  NATS_TLS_ENABLED: stringBoolean.default(false),
  NATS_TLS_CA_FILE: z.string().optional(),
  NATS_TLS_CERT_FILE: z.string().optional(),
  NATS_TLS_KEY_FILE: z.string().optional(),

  // ===========================================================================
  // Redis / Dragonfly pub/sub
  // ===========================================================================
  REDIS_URL: z.string().default("redis://localhost:6379"),
  REDIS_CHANNEL_PREFIX: z.string().min(1).default("warmstart"),
  REDIS_PRIORITY: z.coerce.number().int().default(50),

  // ===========================================================================
  // In-process transport
  // ===========================================================================
  MEMORY_PRIORITY: z.coerce.number().int().default(0),
});

// =============================================================================
// Config Loading
// =============================================================================

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const result = configSchema.safeParse(process.env);

  if (!result.success) {
    console.error("Missing or invalid environment variables:");
    console.error(result.error.format());
    process.exit(1);
  }

  const config = result.data;
  cachedConfig = config;
  return config;
}

/** For testing: reset cached config */
export function resetConfig(): void {
  cachedConfig = null;
}
