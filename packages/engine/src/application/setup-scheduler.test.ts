import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { BrokerRejectedError, TransientGatewayError } from "../domain/errors.js";
import { LONG_5R, createEngineHarness, type HarnessOptions } from "../test-helpers.js";

let stateDir: string;

beforeEach(async () => {
  stateDir = await mkdtemp(join(tmpdir(), "ratchet-scheduler-"));
});

afterEach(async () => {
  await rm(stateDir, { recursive: true, force: true });
});

function harness(options: Omit<HarnessOptions, "stateDir"> = {}) {
  return createEngineHarness({ stateDir, setups: [LONG_5R], ...options });
}

describe("SetupScheduler", () => {
  it("places one order for the day and records it", async () => {
    const h = harness();
    await h.cycle();

    const state = h.holder.snapshot();
    expect(state.pendingOrders.T1).toMatchObject({ symbol: "EURUSD", volume: 0.1, placedAt: "2024-03-04T09:00:00.000Z" });
    expect(state.symbols.EURUSD).toEqual({ lastSeenDayStart: "2024-03-04T00:00:00.000Z", placedForDay: "2024-03-04" });
    expect(h.provider.requests).toEqual([{ symbol: "EURUSD", dayKey: "2024-03-04" }]);
  });

  it("skips a second request for a day already placed", async () => {
    const h = harness();
    await h.cycle();

    h.scheduler.enqueue("EURUSD", "2024-03-04");
    await h.scheduler.idle();

    expect(h.paper.callsTo("sendPendingLimit")).toHaveLength(1);
    expect(h.sink.ofType("order_skipped").map((e) => e.payload)).toEqual([
      { symbol: "EURUSD", dayKey: "2024-03-04", reason: "already_placed" },
    ]);
  });

  it("skips a symbol that already has an entry today", async () => {
    const h = harness();
    h.paper.openPosition({
      symbol: "EURUSD",
      direction: "long",
      openPrice: 1.1,
      volume: 0.1,
      stopLoss: 1.095,
      takeProfit: 1.125,
      tag: "test",
    });
    await h.cycle();

    expect(h.paper.callsTo("sendPendingLimit")).toHaveLength(0);
    expect(h.sink.ofType("order_skipped")[0].payload).toEqual({
      symbol: "EURUSD",
      dayKey: "2024-03-04",
      reason: "already_traded_today",
    });
    expect(h.holder.snapshot().symbols.EURUSD.placedForDay).toBe("2024-03-04");
  });

  it("skips an order that duplicates one already resting", async () => {
    const h = harness();
    h.paper.addPendingOrder({
      symbol: "EURUSD",
      direction: "long",
      entryPrice: 1.10005,
      stopLoss: 1.095,
      takeProfit: 1.125,
      volume: 0.1,
      tag: "test",
      validUntil: null,
    });
    await h.cycle();

    expect(h.paper.callsTo("sendPendingLimit")).toHaveLength(0);
    expect(h.sink.ofType("order_skipped")[0].payload).toMatchObject({ reason: "duplicate", existing: "T1", entryPrice: 1.1 });
  });

  it("records that no setup was found", async () => {
    const h = harness({ setups: [] });
    await h.cycle();

    expect(h.sink.ofType("no_setup").map((e) => e.payload)).toEqual([{ symbol: "EURUSD", dayKey: "2024-03-04" }]);
    expect(h.paper.callsTo("sendPendingLimit")).toHaveLength(0);
  });

  it("rejects a buy limit at or above the ask before sending", async () => {
    const h = harness({ setups: [{ ...LONG_5R, entryPrice: 1.103 }] });
    await h.cycle();

    expect(h.paper.callsTo("sendPendingLimit")).toHaveLength(0);
    expect(h.sink.ofType("order_invalid")[0].payload).toMatchObject({ reason: "buy limit 1.103 not below ask 1.1022" });
    expect(h.sink.ofType("order_skipped")).toHaveLength(0);
    expect(h.holder.snapshot().pendingOrders).toEqual({});
  });

  it("retries a transient send failure", async () => {
    const h = harness();
    h.paper.failNext("sendPendingLimit", new TransientGatewayError("requote"));
    await h.cycle();

    expect(h.sink.ofType("order_placement_attempt")).toHaveLength(2);
    expect(h.sink.ofType("order_placement_result").map((e) => e.payload.ok)).toEqual([false, true]);
    expect(Object.keys(h.holder.snapshot().pendingOrders)).toEqual(["T1"]);
  });

  it("gives up after the configured attempts", async () => {
    const h = harness();
    for (let i = 0; i < 3; i++) {
      h.paper.failNext("sendPendingLimit", new TransientGatewayError("busy"));
    }
    await h.cycle();

    expect(h.sink.ofType("order_placement_failed").map((e) => e.payload)).toEqual([
      { symbol: "EURUSD", attempts: 3, error: "busy" },
    ]);
    const state = h.holder.snapshot();
    expect(state.pendingOrders).toEqual({});
    expect(state.symbols.EURUSD.placedForDay).toBeNull();
  });

  it("does not retry a rejection", async () => {
    const h = harness();
    h.paper.failNext("sendPendingLimit", new BrokerRejectedError("market closed"));
    await h.cycle();

    expect(h.paper.callsTo("sendPendingLimit")).toHaveLength(1);
    expect(h.sink.ofType("order_placement_failed")[0].payload).toMatchObject({ attempts: 1, error: "market closed" });
  });

  it("skips when the balance cannot size a trade", async () => {
    const h = harness({ broker: { balance: 0 } });
    await h.cycle();

    expect(h.sink.ofType("order_skipped")[0].payload).toEqual({ symbol: "EURUSD", dayKey: "2024-03-04", reason: "sizing_failed" });
  });

  it("skips a request that arrives on a weekend", async () => {
    const h = harness({ broker: { serverTime: new Date("2024-03-09T10:00:00.000Z") } });
    h.scheduler.enqueue("EURUSD", "2024-03-09");
    await h.scheduler.idle();

    expect(h.provider.requests).toEqual([]);
    expect(h.sink.ofType("order_skipped")[0].payload).toMatchObject({ reason: "weekend" });
  });

  it("reports an unexpected failure as a skip", async () => {
    const h = harness();
    h.paper.failNext("getQuote", new BrokerRejectedError("symbol disabled"));
    await h.cycle();

    expect(h.sink.ofType("order_skipped")[0].payload).toEqual({
      symbol: "EURUSD",
      dayKey: "2024-03-04",
      reason: "error",
      error: "symbol disabled",
      retrying: false,
    });
  });

  it("retries a broker read that fails once", async () => {
    const h = harness();
    h.paper.failNext("getAccountBalance", new TransientGatewayError("timeout"));
    await h.cycle();

    expect(h.paper.callsTo("getAccountBalance")).toHaveLength(2);
    expect(h.sink.ofType("order_skipped")).toHaveLength(0);
    expect(Object.keys(h.holder.snapshot().pendingOrders)).toEqual(["T1"]);
  });

  it("carries the day over to the next pass when the broker stays down", async () => {
    const h = harness();
    for (let i = 0; i < 3; i++) {
      h.paper.failNext("getQuote", new TransientGatewayError("bridge unreachable"));
    }
    await h.cycle();

    expect(h.sink.ofType("order_skipped").map((e) => e.payload)).toEqual([
      { symbol: "EURUSD", dayKey: "2024-03-04", reason: "error", error: "bridge unreachable", retrying: true },
    ]);
    expect(h.holder.snapshot().symbols.EURUSD.placedForDay).toBeNull();

    await h.cycle();

    expect(h.paper.callsTo("sendPendingLimit")).toHaveLength(1);
    expect(h.provider.requests).toHaveLength(2);
    expect(Object.keys(h.holder.snapshot().pendingOrders)).toEqual(["T1"]);
    expect(h.holder.snapshot().symbols.EURUSD.placedForDay).toBe("2024-03-04");
  });

  it("drops a deferred day once the server has moved on", async () => {
    const h = harness();
    for (let i = 0; i < 3; i++) {
      h.paper.failNext("getQuote", new TransientGatewayError("bridge unreachable"));
    }
    await h.cycle();

    h.scheduler.retryDeferred({ serverTime: "2024-03-05T09:00:00.000Z", weekend: false, actions: [], failedSteps: [] });
    await h.scheduler.idle();

    expect(h.provider.requests).toHaveLength(1);
    expect(h.paper.callsTo("sendPendingLimit")).toHaveLength(0);
  });
});
