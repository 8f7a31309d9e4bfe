import { describe, it, expect } from "vitest";
import { isMainModule } from "./is-main.js";

describe("isMainModule", () => {
  it("matches the entry script's file URL", () => {
    expect(isMainModule("file:///srv/engine/dist/daemon.js", ["node", "/srv/engine/dist/daemon.js"])).toBe(true);
  });

  it("rejects another module", () => {
    expect(isMainModule("file:///srv/engine/dist/index.js", ["node", "/srv/engine/dist/daemon.js"])).toBe(false);
  });

  it("returns false when there is no entry script", () => {
    expect(isMainModule("file:///srv/engine/dist/daemon.js", ["node"])).toBe(false);
  });
});
