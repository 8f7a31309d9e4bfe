import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { formatZodErrors } from "@ratchet/kit";
import type { Setup, SetupProvider } from "../types/setup.js";
import { logger } from "../lib/logger.js";

const log = logger.createChild("setupProvider");

const SetupSchema = z.object({
  symbol: z.string().min(1),
  direction: z.enum(["long", "short"]),
  entryPrice: z.number(),
  stopLoss: z.number(),
  takeProfit: z.number(),
  estimatedR: z.number(),
  validUntil: z.string().nullable().default(null),
});

const SetupFileSchema = z.array(SetupSchema);

/**
 * Reads `<dir>/<YYYY-MM-DD>.json`, an array of setups written by the pattern
 * layer. The first entry for a symbol wins; a missing file means no setups.
 */
export class FileSetupProvider implements SetupProvider {
  private dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  async getSetup(symbol: string, dayKey: string): Promise<Setup | null> {
    const filePath = path.join(this.dir, `${dayKey}.json`);
    if (!fs.existsSync(filePath)) return null;

    const raw: unknown = JSON.parse(await fs.promises.readFile(filePath, "utf8"));
    const result = SetupFileSchema.safeParse(raw);
    if (!result.success) {
      const issues = formatZodErrors(result.error);
      log.warn({ action: "setupFileInvalid", filePath, issues }, "Setup file failed validation");
      throw new Error(`${filePath}: ${issues.join("; ")}`);
    }
    return result.data.find((s) => s.symbol === symbol) ?? null;
  }
}
