import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { FileSetupProvider } from "./file-setup-provider.js";

const tmpDir = join(tmpdir(), "ratchet-setup-provider-test");

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function writeDay(day: string, body: unknown): void {
  fs.mkdirSync(tmpDir, { recursive: true });
  fs.writeFileSync(join(tmpDir, `${day}.json`), JSON.stringify(body), "utf8");
}

describe("FileSetupProvider", () => {
  it("returns null without a file for the day", async () => {
    expect(await new FileSetupProvider(tmpDir).getSetup("EURUSD", "2024-03-04")).toBeNull();
  });

  it("returns the symbol's setup with a default validity", async () => {
    writeDay("2024-03-04", [
      { symbol: "GBPUSD", direction: "short", entryPrice: 1.27, stopLoss: 1.275, takeProfit: 1.26, estimatedR: 2 },
      { symbol: "EURUSD", direction: "long", entryPrice: 1.1, stopLoss: 1.095, takeProfit: 1.125, estimatedR: 5 },
    ]);
    expect(await new FileSetupProvider(tmpDir).getSetup("EURUSD", "2024-03-04")).toEqual({
      symbol: "EURUSD",
      direction: "long",
      entryPrice: 1.1,
      stopLoss: 1.095,
      takeProfit: 1.125,
      estimatedR: 5,
      validUntil: null,
    });
  });

  it("returns null for a symbol not in the file", async () => {
    writeDay("2024-03-04", []);
    expect(await new FileSetupProvider(tmpDir).getSetup("EURUSD", "2024-03-04")).toBeNull();
  });

  it("rejects a malformed file", async () => {
    writeDay("2024-03-04", [{ symbol: "EURUSD", direction: "up" }]);
    await expect(new FileSetupProvider(tmpDir).getSetup("EURUSD", "2024-03-04")).rejects.toThrow("2024-03-04.json");
  });
});
