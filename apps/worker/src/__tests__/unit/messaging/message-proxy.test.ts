import { describe, it, expect, vi } from "vitest";
import { LifecycleViolationError, MessageValidationError } from "../../../messaging/errors.js";
import { HandlerRegistry } from "../../../messaging/handler-registry.js";
import { MessageBuffer, type BufferedMessage } from "../../../messaging/message-buffer.js";
import { AdaptiveMessageProxy } from "../../../messaging/message-proxy.js";
import type { MessageType, SendOptions } from "../../../messaging/types.js";
import { InMemoryBus } from "../../../transports/memory.js";
import { FlakyBus, Order } from "./fakes.js";

function setup(options: { lateBinding?: boolean } = {}) {
  const buffer = new MessageBuffer();
  const registry = new HandlerRegistry();
  const proxy = new AdaptiveMessageProxy(buffer, registry, options);
  return { buffer, registry, proxy };
}

/**
 * Runs a hook just before each enqueue, to interleave a go-live between the
 * proxy's phase read and the buffer write.
 */
class InterleavingBuffer extends MessageBuffer {
  beforeEnqueue: (() => void) | null = null;

  override enqueue<T>(messageType: MessageType<T>, payload: T, options?: SendOptions): BufferedMessage {
    const hook = this.beforeEnqueue;
    this.beforeEnqueue = null;
    hook?.();
    return super.enqueue(messageType, payload, options);
  }
}

describe("AdaptiveMessageProxy", () => {
  describe("while buffering", () => {
    it("should buffer sends", async () => {
      const { buffer, proxy } = setup();

      await proxy.send(Order, { id: 1 });
      await proxy.send(Order, { id: 2 });

      expect(buffer.count()).toBe(2);
      expect(proxy.isLive()).toBe(false);
      expect(proxy.getBus()).toBeNull();
    });

    it("should reject a payload that fails its schema", async () => {
      const { buffer, proxy } = setup();
      const sending = proxy.send(Order, { id: Number.NaN });

      await expect(sending).rejects.toBeInstanceOf(MessageValidationError);
      await expect(sending).rejects.toMatchObject({
        code: "MESSAGE_VALIDATION_FAILED",
        messageType: "Order",
        issues: ["id: Expected number, received nan"],
      });
      expect(buffer.count()).toBe(0);
    });

    it("should register handlers without binding them", async () => {
      const { registry, proxy } = setup();

      await expect(proxy.registerHandler(Order, async () => {})).resolves.toBe("registered");

      expect(registry.has("Order")).toBe(true);
      expect(registry.isBound("Order")).toBe(false);
    });
  });

  describe("goLive", () => {
    it("should drain buffered messages and route later sends to the bus", async () => {
      const { buffer, proxy } = setup();
      const bus = new InMemoryBus();
      await proxy.send(Order, { id: 1 });
      await proxy.send(Order, { id: 2 });

      const drained = await proxy.goLive(bus);
      await proxy.send(Order, { id: 3 });

      expect(drained).toBe(2);
      expect(buffer.count()).toBe(0);
      expect(bus.sent.map((message) => message.payload)).toEqual([{ id: 1 }, { id: 2 }, { id: 3 }]);
      expect(proxy.isLive()).toBe(true);
      expect(proxy.getBus()).toBe(bus);
    });

    it("should flip routing before the drain resolves", async () => {
      const { buffer, proxy } = setup();
      const bus = new InMemoryBus();
      await proxy.send(Order, { id: 1 });

      const draining = proxy.goLive(bus);
      expect(buffer.isAccepting()).toBe(false);
      expect(proxy.isLive()).toBe(true);

      await proxy.send(Order, { id: 2 });
      await draining;

      expect(bus.sent.map((message) => message.payload)).toEqual(
        expect.arrayContaining([{ id: 1 }, { id: 2 }])
      );
      expect(bus.sent).toHaveLength(2);
    });

    it("should refuse a second go-live", async () => {
      const { proxy } = setup();
      await proxy.goLive(new InMemoryBus("first"));

      await expect(proxy.goLive(new InMemoryBus("second"))).rejects.toBeInstanceOf(
        LifecycleViolationError
      );
      expect(proxy.getBus()?.name).toBe("first");
    });
  });

  describe("once live", () => {
    it("should use queue routing when the bus supports it", async () => {
      const { proxy } = setup();
      const bus = new InMemoryBus();
      await proxy.goLive(bus);

      await proxy.send(Order, { id: 5 }, { queue: "billing" });

      expect(bus.sent).toEqual([{ messageType: "Order", payload: { id: 5 }, queue: "billing" }]);
    });

    it("should propagate bus errors to the caller", async () => {
      const { proxy } = setup();
      const bus = new FlakyBus();
      bus.failSendWhen = () => true;
      await proxy.goLive(bus);

      await expect(proxy.send(Order, { id: 1 })).rejects.toThrow("send rejected");
    });

    it("should bind a late registration immediately", async () => {
      const { registry, proxy } = setup();
      const bus = new InMemoryBus();
      const handler = vi.fn().mockResolvedValue(undefined);
      await proxy.goLive(bus);

      await proxy.registerHandler(Order, handler);
      await proxy.send(Order, { id: 8 });

      expect(registry.isBound("Order")).toBe(true);
      expect(handler).toHaveBeenCalledWith({ id: 8 });
    });

    it("should leave a late registration unbound when late binding is off", async () => {
      const { registry, proxy } = setup({ lateBinding: false });
      const bus = new InMemoryBus();
      await proxy.goLive(bus);

      await expect(proxy.registerHandler(Order, async () => {})).resolves.toBe("registered");

      expect(registry.has("Order")).toBe(true);
      expect(bus.consumerCount("Order")).toBe(0);
    });

    it("should not rebind a duplicate registration", async () => {
      const { proxy } = setup();
      const bus = new InMemoryBus();
      await proxy.registerHandler(Order, async () => {});
      await proxy.goLive(bus);

      await expect(proxy.registerHandler(Order, async () => {})).resolves.toBe("already-registered");
      expect(bus.consumerCount("Order")).toBe(0);
    });
  });

  describe("go-live racing a send", () => {
    it("should redirect a send the buffer rejects to the live bus", async () => {
      const buffer = new InterleavingBuffer();
      const proxy = new AdaptiveMessageProxy(buffer, new HandlerRegistry());
      const bus = new InMemoryBus();
      let draining: Promise<number> | null = null;
      buffer.beforeEnqueue = () => {
        draining = proxy.goLive(bus);
      };

      await proxy.send(Order, { id: 1 });

      expect(bus.sent).toEqual([{ messageType: "Order", payload: { id: 1 } }]);
      await expect(draining).resolves.toBe(0);
    });

    it("should surface the violation when no bus is installed", async () => {
      const { buffer, proxy } = setup();
      buffer.stopAccepting();

      await expect(proxy.send(Order, { id: 1 })).rejects.toBeInstanceOf(LifecycleViolationError);
    });
  });
});
