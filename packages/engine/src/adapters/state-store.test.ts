import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { StateStore } from "./state-store.js";
import { emptyState } from "../domain/persistent-state.js";
import { createTrackedPosition } from "../domain/tracked-position.js";

const tmpDir = join(tmpdir(), "ratchet-state-store-test");

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("StateStore", () => {
  it("starts fresh without a file", () => {
    const outcome = new StateStore(tmpDir).load();
    expect(outcome.kind).toBe("fresh");
    expect(outcome.state).toEqual(emptyState());
  });

  it("saves and loads a state", () => {
    const store = new StateStore(join(tmpDir, "nested"));
    const position = createTrackedPosition({
      positionId: "P1",
      symbol: "EURUSD",
      direction: "long",
      openPrice: 1.1,
      volume: 0.2,
      stopLossAtOpen: 1.095,
      originalTakeProfit: 1.125,
      openedAt: "2024-03-04T09:00:00.000Z",
      triggerR: 3,
      phase: "TP_COMPRESSED",
    });
    const state = { ...emptyState(), positions: { P1: position }, lastWeekendNoticeDate: "2024-03-09" };
    store.save(state);

    const outcome = store.load();
    expect(outcome.kind).toBe("loaded");
    expect(outcome.state).toEqual(state);
  });

  it("moves a corrupt file aside instead of overwriting it", () => {
    fs.mkdirSync(tmpDir, { recursive: true });
    const store = new StateStore(tmpDir);
    fs.writeFileSync(store.filePath, "{ not json", "utf8");

    const outcome = store.load(new Date(1_700_000_000_000));
    expect(outcome.kind).toBe("quarantined");
    expect(outcome.state).toEqual(emptyState());
    const movedTo = `${store.filePath}.corrupt-1700000000000`;
    expect(fs.readFileSync(movedTo, "utf8")).toBe("{ not json");
    expect(fs.existsSync(store.filePath)).toBe(false);
  });

  it("quarantines a document that fails validation", () => {
    fs.mkdirSync(tmpDir, { recursive: true });
    const store = new StateStore(tmpDir);
    fs.writeFileSync(store.filePath, JSON.stringify({ version: 1, symbols: [] }), "utf8");

    const outcome = store.load(new Date(1_700_000_000_000));
    expect(outcome.kind).toBe("quarantined");
    if (outcome.kind === "quarantined") {
      expect(outcome.reason).toContain("symbols");
    }
  });
});
