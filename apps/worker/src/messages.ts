import { z } from "zod";
import { defineMessageType } from "./messaging/index.js";

/**
 * Announced once per process. Sent at boot, before any transport is up,
 * so it always travels through the buffer.
 */
export const WorkerStarted = defineMessageType(
  "worker.started",
  z.object({
    workerId: z.string().min(1),
    startedAt: z.string().datetime(),
    providers: z.array(z.string()).default([]),
  })
);

export type WorkerStartedPayload = z.infer<typeof WorkerStarted.schema>;
