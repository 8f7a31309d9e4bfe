import { z } from "zod";
import { parseEnv } from "@ratchet/kit";
import dotenv from "dotenv";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = dirname(fileURLToPath(import.meta.url));

const BridgeEnvSchema = z.object({
  BRIDGE_URL: z.string().url(),
  BRIDGE_TOKEN: z.string().min(1),
});

export type BridgeEnv = z.infer<typeof BridgeEnvSchema>;

/**
 * Load the package's .env and return the terminal bridge credentials.
 * Only the bridge broker needs them; paper runs never call this.
 */
export function loadBridgeEnv(): BridgeEnv {
  dotenv.config({ path: join(__dirname, "../../.env") });
  return parseEnv(BridgeEnvSchema);
}
