import { describe, it, expect, vi } from "vitest";
import { InstantDelayProvider, type DelayProvider } from "../../../domain/utils/retry.js";
import { createMessaging } from "../../../messaging/create-messaging.js";
import type { LifecycleOutcome, PhaseChangeEvent } from "../../../messaging/lifecycle.js";
import { InMemoryTransportProvider } from "../../../transports/memory.js";
import { FlakyBus, Invoice, mulberry32, Order, ScriptedProvider } from "./fakes.js";

function abortOnFirstDelay(controller: AbortController): DelayProvider {
  const instant = new InstantDelayProvider();
  return {
    delay: (ms, signal) => {
      controller.abort();
      return instant.delay(ms, signal);
    },
  };
}

describe("MessagingLifecycle", () => {
  describe("go-live", () => {
    it("should drain buffered orders in order and bind the order consumer", async () => {
      const provider = new InMemoryTransportProvider();
      const messaging = createMessaging({ providers: [provider] });
      await messaging.registerHandler(Order, async () => {});
      await messaging.send(Order, { id: 1 });
      await messaging.send(Order, { id: 2 });
      await messaging.send(Order, { id: 3 });

      expect(messaging.buffer.count()).toBe(3);

      const outcome = await messaging.start();

      expect(outcome.phase).toBe("live");
      expect(messaging.buffer.count()).toBe(0);
      const bus = provider.getBus();
      expect(bus?.name).toBe("Local");
      expect(bus?.sentOf("Order").map((message) => message.payload)).toEqual([
        { id: 1 },
        { id: 2 },
        { id: 3 },
      ]);
      expect(bus?.sent).toHaveLength(3);
      expect(bus?.consumerCount("Order")).toBe(1);
    });

    it("should emit a ready event with the run summary", async () => {
      const messaging = createMessaging({ providers: [new InMemoryTransportProvider()] });
      const onReady = vi.fn();
      messaging.onReady(onReady);
      await messaging.registerHandler(Order, async () => {});
      await messaging.send(Invoice, { number: "INV-1" });

      const outcome = await messaging.start();

      expect(onReady).toHaveBeenCalledTimes(1);
      expect(onReady).toHaveBeenCalledWith({
        providerName: "Local",
        handlerCount: 1,
        consumersBound: ["Order"],
        consumersFailed: [],
        drained: 1,
        readyAt: expect.any(Date),
      });
      expect(outcome).toEqual({ phase: "live", ready: onReady.mock.calls[0]?.[0] });
    });

    it("should walk the phases forward", async () => {
      const messaging = createMessaging({ providers: [new InMemoryTransportProvider()] });
      const phases: PhaseChangeEvent[] = [];
      messaging.onPhaseChange((event) => phases.push(event));

      expect(messaging.lifecycle.getPhase()).toBe("buffering");
      await messaging.start();

      expect(phases.map(({ from, to }) => `${from}->${to}`)).toEqual([
        "buffering->selecting-provider",
        "selecting-provider->live",
      ]);
      expect(messaging.lifecycle.getPhase()).toBe("live");
    });

    it("should prefer the higher priority provider", async () => {
      const a = new ScriptedProvider("A", 10, [false]);
      const b = new ScriptedProvider("B", 5);
      const delays = new InstantDelayProvider();
      const messaging = createMessaging({ providers: [b, a], delayProvider: delays });

      const outcome = await messaging.start();

      expect(outcome.phase === "live" && outcome.ready.providerName).toBe("B");
      expect(a.probes).toBe(6);
      expect(delays.total()).toBe(30_000);
      expect(messaging.getStatus().provider).toBe("B");
    });

    it("should bind a handler registered after go-live", async () => {
      const provider = new InMemoryTransportProvider();
      const messaging = createMessaging({ providers: [provider] });
      const handler = vi.fn().mockResolvedValue(undefined);
      await messaging.start();

      await messaging.registerHandler(Invoice, handler);
      await messaging.send(Invoice, { number: "INV-42" });

      expect(handler).toHaveBeenCalledWith({ number: "INV-42" });
      expect(messaging.getStatus().consumers).toEqual(["Invoice"]);
    });

    it("should report consumers that failed to bind", async () => {
      const provider = new InMemoryTransportProvider();
      const bus = new FlakyBus("Local");
      bus.failBindingFor.add("Invoice");
      vi.spyOn(provider, "createBus").mockResolvedValue(bus);
      const messaging = createMessaging({ providers: [provider] });
      await messaging.registerHandler(Order, async () => {});
      await messaging.registerHandler(Invoice, async () => {});

      const outcome = await messaging.start();

      expect(outcome).toMatchObject({
        phase: "live",
        ready: { consumersBound: ["Order"], consumersFailed: ["Invoice"] },
      });
    });
  });

  describe("failure", () => {
    it("should fail when no provider comes up and keep buffering", async () => {
      const provider = new InMemoryTransportProvider({ available: false });
      const onFailed = vi.fn();
      const messaging = createMessaging({
        providers: [provider],
        maxRetries: 1,
        delayProvider: new InstantDelayProvider(),
      });
      messaging.onFailed(onFailed);

      const outcome = await messaging.start();
      await messaging.send(Order, { id: 1 });

      expect(outcome.phase).toBe("failed");
      expect(onFailed).toHaveBeenCalledWith(
        expect.objectContaining({
          reason: "no-provider",
          cancelled: false,
          attemptedProviders: ["Local"],
        })
      );
      expect(messaging.buffer.count()).toBe(1);
      expect(messaging.proxy.isLive()).toBe(false);
      expect(messaging.getStatus()).toMatchObject({ phase: "failed", provider: null, buffered: 1 });
    });

    it("should not probe again after failing", async () => {
      const provider = new ScriptedProvider("A", 1, [false]);
      const messaging = createMessaging({
        providers: [provider],
        maxRetries: 0,
        delayProvider: new InstantDelayProvider(),
      });

      await messaging.start();
      await messaging.start();

      expect(provider.probes).toBe(1);
    });

    it("should end cancelled when aborted during backoff", async () => {
      const controller = new AbortController();
      const messaging = createMessaging({
        providers: [new ScriptedProvider("A", 1, [false])],
        delayProvider: abortOnFirstDelay(controller),
      });

      const outcome = await messaging.start(controller.signal);
      await messaging.send(Order, { id: 1 });

      expect(outcome).toMatchObject({
        phase: "failed",
        failure: { reason: "cancelled", cancelled: true, attemptedProviders: ["A"] },
      });
      expect(messaging.buffer.count()).toBe(1);
    });

    it("should interrupt a real backoff wait when aborted", async () => {
      const controller = new AbortController();
      const messaging = createMessaging({
        providers: [new ScriptedProvider("A", 1, [false])],
        baseDelayMs: 60_000,
      });

      const run = messaging.start(controller.signal);
      controller.abort();
      const outcome = await run;

      expect(outcome.phase === "failed" && outcome.failure.cancelled).toBe(true);
    });

    it("should stay buffering when aborted while a provider is answering", async () => {
      const controller = new AbortController();
      const provider = new ScriptedProvider("A", 1, [true]);
      provider.onCanConnect = () => controller.abort();
      const messaging = createMessaging({
        providers: [provider],
        delayProvider: new InstantDelayProvider(),
      });
      await messaging.send(Order, { id: 1 });

      const outcome = await messaging.start(controller.signal);

      expect(outcome).toMatchObject({
        phase: "failed",
        failure: { reason: "cancelled", cancelled: true, attemptedProviders: ["A"] },
      });
      expect(messaging.proxy.isLive()).toBe(false);
      expect(messaging.buffer.count()).toBe(1);
      expect(provider.buses.every((bus) => bus.isClosed())).toBe(true);
    });

    it("should end in failed when the run throws unexpectedly", async () => {
      const messaging = createMessaging({ providers: [new InMemoryTransportProvider()] });
      vi.spyOn(messaging.registry, "allEntries").mockImplementation(() => {
        throw new Error("registry exploded");
      });

      const outcome = await messaging.start();

      expect(outcome.phase).toBe("failed");
      if (outcome.phase !== "failed") return;
      expect(outcome.failure.reason).toBe("error");
      expect(outcome.failure.error?.message).toBe("registry exploded");
      expect(messaging.lifecycle.getPhase()).toBe("failed");
    });
  });

  describe("signals", () => {
    it("should replay ready to a late subscriber", async () => {
      const messaging = createMessaging({ providers: [new InMemoryTransportProvider()] });
      await messaging.start();
      const onReady = vi.fn();

      messaging.onReady(onReady);

      expect(onReady).toHaveBeenCalledTimes(1);
    });

    it("should keep notifying after a listener throws", async () => {
      const messaging = createMessaging({ providers: [new InMemoryTransportProvider()] });
      const second = vi.fn();
      messaging.onReady(() => {
        throw new Error("listener bug");
      });
      messaging.onReady(second);

      const outcome = await messaging.start();

      expect(outcome.phase).toBe("live");
      expect(second).toHaveBeenCalledTimes(1);
    });

    it("should stop notifying after unsubscribe", async () => {
      const messaging = createMessaging({ providers: [new InMemoryTransportProvider()] });
      const onPhase = vi.fn();
      const unsubscribe = messaging.onPhaseChange(onPhase);
      unsubscribe();

      await messaging.start();

      expect(onPhase).not.toHaveBeenCalled();
    });
  });

  describe("start", () => {
    it("should run only once", async () => {
      const provider = new ScriptedProvider("A", 1);
      const messaging = createMessaging({ providers: [provider] });

      const first = messaging.start();
      const second = messaging.start();

      expect(second).toBe(first);
      await first;
      expect(provider.probes).toBe(1);
    });

    it("should report status before starting", () => {
      const messaging = createMessaging({ providers: [] });

      expect(messaging.getStatus()).toEqual({
        phase: "buffering",
        provider: null,
        buffered: 0,
        handlers: 0,
        consumers: [],
        startedAt: null,
        readyAt: null,
        failedAt: null,
      });
    });
  });

  describe("stop", () => {
    it("should stop consumers and close the bus", async () => {
      const provider = new InMemoryTransportProvider();
      const messaging = createMessaging({ providers: [provider] });
      await messaging.registerHandler(Order, async () => {});
      await messaging.start();

      await messaging.stop();

      expect(provider.getBus()?.consumerCount("Order")).toBe(0);
      expect(provider.getBus()?.isClosed()).toBe(true);
    });

    it("should be safe before go-live", async () => {
      const messaging = createMessaging({ providers: [] });

      await expect(messaging.stop()).resolves.toBeUndefined();
    });
  });

  describe("no loss under interleaving", () => {
    it.each([1, 7, 42, 1337, 9001])("should deliver every send exactly once (seed %i)", async (seed) => {
      const random = mulberry32(seed);
      const notReadyProbes = Math.floor(random() * 4);
      const provider = new ScriptedProvider("Local", 1, [
        ...Array.from({ length: notReadyProbes }, () => false),
        true,
      ]);
      const messaging = createMessaging({
        providers: [provider],
        delayProvider: new InstantDelayProvider(),
      });

      const total = 200;
      const startAt = Math.floor(random() * total);
      const sends: Promise<void>[] = [];
      let run: Promise<LifecycleOutcome> | undefined;

      for (let id = 0; id < total; id++) {
        if (id === startAt) {
          run = messaging.start();
        }
        sends.push(messaging.send(Order, { id }));
        if (random() < 0.3) {
          await Promise.resolve();
        }
        if (random() < 0.05) {
          await new Promise((resolve) => setTimeout(resolve, 0));
        }
      }
      await Promise.all(sends);
      const outcome = await (run ?? messaging.start());

      expect(outcome.phase).toBe("live");
      if (outcome.phase !== "live") return;

      const ids = (provider.lastBus()?.sent ?? []).map((message) => Order.schema.parse(message.payload).id);
      expect(ids).toHaveLength(total);
      expect([...ids].sort((x, y) => x - y)).toEqual(Array.from({ length: total }, (_, i) => i));

      // Buffered sends are exactly the earliest ids, forwarded in enqueue order
      const drained = outcome.ready.drained;
      expect(ids.filter((id) => id < drained)).toEqual(Array.from({ length: drained }, (_, i) => i));
      expect(messaging.buffer.count()).toBe(0);
    });
  });
});
