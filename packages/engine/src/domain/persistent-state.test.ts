import { describe, it, expect } from "vitest";
import { PersistentStateSchema, emptyState, rebuildTrackers, symbolState } from "./persistent-state.js";
import { createTrackedPosition } from "./tracked-position.js";

function tracked(positionId: string, phase: "OPENED" | "TP_COMPRESSED" | "PARTIAL_TAKEN" | "CLOSED") {
  return createTrackedPosition({
    positionId,
    symbol: "EURUSD",
    direction: "long",
    openPrice: 1.1,
    volume: 0.2,
    stopLossAtOpen: 1.095,
    originalTakeProfit: 1.125,
    openedAt: "2024-03-04T09:00:00.000Z",
    triggerR: 3,
    phase,
  });
}

describe("PersistentStateSchema", () => {
  it("accepts an empty state", () => {
    expect(PersistentStateSchema.safeParse(emptyState()).success).toBe(true);
  });

  it("rejects a document from another version", () => {
    expect(PersistentStateSchema.safeParse({ ...emptyState(), version: 2 }).success).toBe(false);
  });

  it("round-trips a tracked position through JSON", () => {
    const state = { ...emptyState(), positions: { P1: tracked("P1", "TP_COMPRESSED") } };
    const parsed = PersistentStateSchema.parse(JSON.parse(JSON.stringify(state)));
    expect(parsed.positions.P1?.originalTakeProfit).toBe(1.125);
    expect(parsed.positions.P1?.phase).toBe("TP_COMPRESSED");
  });
});

describe("symbolState", () => {
  it("defaults an unseen symbol", () => {
    expect(symbolState(emptyState(), "EURUSD")).toEqual({ lastSeenDayStart: null, placedForDay: null });
  });
});

describe("rebuildTrackers", () => {
  it("keeps phase and original target", () => {
    const state = { ...emptyState(), positions: { P1: tracked("P1", "TP_COMPRESSED") } };
    const trackers = rebuildTrackers(state);
    expect(trackers.get("P1")?.phase).toBe("TP_COMPRESSED");
    expect(trackers.get("P1")?.originalTakeProfit).toBe(1.125);
  });

  it("lifts a position with a completed partial", () => {
    const state = { ...emptyState(), positions: { P1: tracked("P1", "TP_COMPRESSED") }, completedPartials: ["P1"] };
    expect(rebuildTrackers(state).get("P1")?.phase).toBe("PARTIAL_TAKEN");
  });

  it("drops closed records", () => {
    const state = { ...emptyState(), positions: { P1: tracked("P1", "CLOSED") } };
    expect(rebuildTrackers(state).size).toBe(0);
  });
});
