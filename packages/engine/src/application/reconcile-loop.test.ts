import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createEmitter } from "../adapters/event-log.js";
import { PaperBroker } from "../adapters/paper-broker.js";
import { StateStore } from "../adapters/state-store.js";
import { TransientGatewayError } from "../domain/errors.js";
import { emptyState } from "../domain/persistent-state.js";
import { FX_SPEC, MONDAY_9AM, MemoryEventSink, buildConfig } from "../test-helpers.js";
import type { CycleReport } from "./reconcile-cycle.js";
import { ReconcileLoop } from "./reconcile-loop.js";
import { StateHolder } from "./state-holder.js";

let stateDir: string;

beforeEach(async () => {
  stateDir = await mkdtemp(join(tmpdir(), "ratchet-loop-"));
});

afterEach(async () => {
  await rm(stateDir, { recursive: true, force: true });
});

function build(options: { serverTime?: Date; config?: Record<string, unknown> } = {}) {
  const paper = new PaperBroker({
    serverTime: options.serverTime ?? MONDAY_9AM,
    symbols: { EURUSD: { spec: FX_SPEC, bid: 1.102, ask: 1.1022 } },
  });
  const store = new StateStore(stateDir);
  const holder = new StateHolder(store, emptyState());
  const onCycle = vi.fn<(report: CycleReport) => void>();
  const onGatewayDown = vi.fn<() => void>();
  const onNewDay = vi.fn<(symbol: string, dayKey: string) => void>();
  const loop = new ReconcileLoop({
    holder,
    gateway: paper,
    config: buildConfig({ intervalMs: 5, ...options.config }),
    emit: createEmitter(new MemoryEventSink()),
    onNewDay,
    onCycle,
    onGatewayDown,
  });
  return { paper, store, holder, loop, onCycle, onGatewayDown, onNewDay };
}

describe("ReconcileLoop", () => {
  it("check() runs one pass and persists the result", async () => {
    const { loop, store, onNewDay, onCycle } = build();

    const report = await loop.check();

    expect(report.actions).toEqual(["new_day:EURUSD"]);
    expect(onNewDay).toHaveBeenCalledWith("EURUSD", "2024-03-04");
    expect(onCycle).toHaveBeenCalledWith(report);
    expect(existsSync(store.filePath)).toBe(true);
    expect(store.load().state.symbols.EURUSD.lastSeenDayStart).toBe("2024-03-04T00:00:00.000Z");
  });

  it("keeps cycling until stopped", async () => {
    const { loop, onCycle } = build();

    const running = loop.start();
    await vi.waitFor(() => expect(onCycle.mock.calls.length).toBeGreaterThanOrEqual(2));
    await loop.stop();
    await running;

    const cycles = onCycle.mock.calls.length;
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(onCycle).toHaveBeenCalledTimes(cycles);
  });

  it("raises the gateway-down alert on the third consecutive failure", async () => {
    const { loop, paper, onGatewayDown, onCycle } = build();
    for (let i = 0; i < 3; i++) {
      paper.failNext("getServerTime", new TransientGatewayError("bridge unreachable"));
    }

    const running = loop.start();
    await vi.waitFor(() => expect(onCycle).toHaveBeenCalled());
    await loop.stop();
    await running;

    expect(onGatewayDown).toHaveBeenCalledTimes(1);
    expect(paper.callsTo("getServerTime").length).toBeGreaterThanOrEqual(4);
  });

  it("stop() interrupts the long weekend sleep", async () => {
    const { loop, onCycle } = build({
      serverTime: new Date("2024-03-09T10:00:00.000Z"),
      config: { weekendIntervalMs: 60_000 },
    });

    const running = loop.start();
    await vi.waitFor(() => expect(onCycle).toHaveBeenCalledTimes(1));
    await loop.stop();
    await running;

    expect(onCycle.mock.calls[0][0].weekend).toBe(true);
    expect(onCycle).toHaveBeenCalledTimes(1);
  });
});
