import { describe, it, expect } from "vitest";
import { z } from "zod";
import { configSchema } from "@warmstart/config";
import { messagingOptionsFromConfig } from "../../../messaging/create-messaging.js";
import { dispatchToBus, parsePayload } from "../../../messaging/dispatch.js";
import { MessageValidationError } from "../../../messaging/errors.js";
import { defineMessageType } from "../../../messaging/types.js";
import { InMemoryBus } from "../../../transports/memory.js";
import { Order } from "./fakes.js";

describe("defineMessageType", () => {
  it("should freeze the descriptor", () => {
    const type = defineMessageType("orders.placed", z.object({ id: z.string() }));

    expect(type.name).toBe("orders.placed");
    expect(Object.isFrozen(type)).toBe(true);
  });

  it.each(["", "orders placed", ".hidden", "orders/placed"])("should reject the name %j", (name) => {
    expect(() => defineMessageType(name, z.string())).toThrow(/Invalid message type name/);
  });
});

describe("parsePayload", () => {
  it("should apply schema defaults", () => {
    const Ping = defineMessageType("ping", z.object({ attempt: z.number().default(1) }));

    expect(parsePayload(Ping, {})).toEqual({ attempt: 1 });
  });

  it("should list every issue with its path", () => {
    const Shipment = defineMessageType(
      "shipment",
      z.object({ id: z.string(), weight: z.number().positive() })
    );

    try {
      parsePayload(Shipment, { weight: -1 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MessageValidationError);
      expect(error).toMatchObject({
        issues: ["id: Required", "weight: Number must be greater than 0"],
      });
    }
  });
});

describe("dispatchToBus", () => {
  it("should fall back to sendMessage when the bus has no queue routing", async () => {
    const bus = new InMemoryBus();
    const plainBus = {
      name: bus.name,
      sendMessage: bus.sendMessage.bind(bus),
      createConsumer: bus.createConsumer.bind(bus),
      isHealthy: bus.isHealthy.bind(bus),
    };

    await dispatchToBus(plainBus, Order, { id: 3 }, "priority");

    expect(bus.sent).toEqual([{ messageType: "Order", payload: { id: 3 } }]);
  });
});

describe("messagingOptionsFromConfig", () => {
  it("should map config keys to lifecycle options", () => {
    const config = configSchema.parse({
      MESSAGING_MAX_RETRIES: "3",
      MESSAGING_RETRY_BASE_DELAY_MS: "500",
      MESSAGING_LATE_BINDING: "false",
    });

    expect(messagingOptionsFromConfig(config)).toEqual({
      maxRetries: 3,
      baseDelayMs: 500,
      probeTimeoutMs: 5000,
      bufferWarnThreshold: 10_000,
      lateBinding: false,
    });
  });
});
