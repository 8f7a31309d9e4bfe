import { describe, it, expect } from "vitest";
import { advancePhase, createTrackedPosition, currentR, rewardMultiple } from "./tracked-position.js";
import { StateInconsistencyError } from "./errors.js";

const baseLong = {
  positionId: "P1",
  symbol: "EURUSD",
  direction: "long" as const,
  openPrice: 1.1,
  volume: 0.2,
  stopLossAtOpen: 1.095,
  originalTakeProfit: 1.125,
  openedAt: "2024-03-04T09:00:00.000Z",
  triggerR: 3,
};

describe("createTrackedPosition", () => {
  it("derives risk distance and the 3R threshold for a long", () => {
    const pos = createTrackedPosition(baseLong);
    expect(pos.riskDistance).toBe(0.005);
    expect(pos.thresholdPrice).toBe(1.115);
    expect(pos.phase).toBe("OPENED");
    expect(pos.originalVolume).toBe(0.2);
    expect(pos.protectionApplied).toBe(false);
    expect(pos.lastDeferral).toBeNull();
  });

  it("mirrors the threshold for a short", () => {
    const pos = createTrackedPosition({
      ...baseLong,
      direction: "short",
      openPrice: 1.2,
      stopLossAtOpen: 1.205,
      originalTakeProfit: 1.19,
    });
    expect(pos.riskDistance).toBe(0.005);
    expect(pos.thresholdPrice).toBe(1.185);
  });

  it("has zero risk when the position carries no stop", () => {
    const pos = createTrackedPosition({ ...baseLong, stopLossAtOpen: 0 });
    expect(pos.riskDistance).toBe(0);
    expect(pos.thresholdPrice).toBe(1.1);
  });

  it("keeps a supplied phase", () => {
    const pos = createTrackedPosition({ ...baseLong, phase: "PARTIAL_TAKEN", protectionApplied: true });
    expect(pos.phase).toBe("PARTIAL_TAKEN");
    expect(pos.protectionApplied).toBe(true);
  });
});

describe("rewardMultiple", () => {
  it("reads 5R from a 1.1250 target", () => {
    expect(rewardMultiple(createTrackedPosition(baseLong))).toBe(5);
  });

  it("reads 2R for a short", () => {
    const pos = createTrackedPosition({
      ...baseLong,
      direction: "short",
      openPrice: 1.2,
      stopLossAtOpen: 1.205,
      originalTakeProfit: 1.19,
    });
    expect(rewardMultiple(pos)).toBe(2);
  });

  it("is zero without a target", () => {
    expect(rewardMultiple(createTrackedPosition({ ...baseLong, originalTakeProfit: 0 }))).toBe(0);
  });

  it("is zero with a target on the losing side", () => {
    expect(rewardMultiple(createTrackedPosition({ ...baseLong, originalTakeProfit: 1.09 }))).toBe(0);
  });

  it("is zero without risk", () => {
    expect(rewardMultiple(createTrackedPosition({ ...baseLong, stopLossAtOpen: 0 }))).toBe(0);
  });
});

describe("currentR", () => {
  it("measures progress in risk units", () => {
    const pos = createTrackedPosition(baseLong);
    expect(currentR(pos, 1.11)).toBeCloseTo(2, 9);
    expect(currentR(pos, 1.095)).toBeCloseTo(-1, 9);
  });
});

describe("advancePhase", () => {
  it("moves forward", () => {
    const pos = advancePhase(createTrackedPosition(baseLong), "TP_COMPRESSED");
    expect(pos.phase).toBe("TP_COMPRESSED");
  });

  it("allows staying in the same phase", () => {
    const pos = createTrackedPosition({ ...baseLong, phase: "PARTIAL_TAKEN" });
    expect(advancePhase(pos, "PARTIAL_TAKEN").phase).toBe("PARTIAL_TAKEN");
  });

  it("refuses to regress", () => {
    const pos = createTrackedPosition({ ...baseLong, phase: "PARTIAL_TAKEN" });
    expect(() => advancePhase(pos, "OPENED")).toThrow(StateInconsistencyError);
  });
});
