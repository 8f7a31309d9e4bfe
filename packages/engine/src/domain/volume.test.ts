import { describe, it, expect } from "vitest";
import { planPartialClose } from "./volume.js";
import { RoundingInfeasibleError } from "./errors.js";

const spec = { volumeMin: 0.01, volumeStep: 0.01 };

function failureOf(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (err) {
    return err instanceof RoundingInfeasibleError ? err.reason : "other";
  }
}

describe("planPartialClose", () => {
  it("halves an even volume", () => {
    expect(planPartialClose(0.2, 0.5, spec)).toEqual({ closeVolume: 0.1, remainingVolume: 0.1 });
  });

  it("rounds the close leg down to the step", () => {
    expect(planPartialClose(0.15, 0.5, spec)).toEqual({ closeVolume: 0.07, remainingVolume: 0.08 });
  });

  it("handles whole-lot steps", () => {
    expect(planPartialClose(3, 0.5, { volumeMin: 1, volumeStep: 1 })).toEqual({ closeVolume: 1, remainingVolume: 2 });
  });

  it("refuses a close that rounds to nothing", () => {
    expect(failureOf(() => planPartialClose(0.01, 0.5, spec))).toBe("close_below_minimum");
  });

  it("refuses a close under the broker minimum", () => {
    expect(failureOf(() => planPartialClose(0.03, 0.5, { volumeMin: 0.02, volumeStep: 0.01 }))).toBe("close_below_minimum");
  });

  it("refuses to leave a remainder under the minimum", () => {
    expect(failureOf(() => planPartialClose(0.1, 0.8, { volumeMin: 0.05, volumeStep: 0.01 }))).toBe("remainder_below_minimum");
  });

  it("refuses to close the whole position", () => {
    expect(failureOf(() => planPartialClose(0.1, 1, spec))).toBe("no_remainder");
  });
});
