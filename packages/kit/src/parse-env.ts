import type { z } from "zod";
import { formatZodErrors } from "./zod-helpers.js";

/** Validates an env record (process.env by default), throwing one line per failing variable. */
export function parseEnv<T extends z.ZodTypeAny>(
  schema: T,
  source: NodeJS.ProcessEnv = process.env,
): z.output<T> {
  const result = schema.safeParse(source);
  if (!result.success) {
    throw new Error(`Invalid environment:\n${formatZodErrors(result.error).join("\n")}`);
  }
  return result.data;
}
