import { TimeoutError } from "p-timeout";
import { EngineError } from "../domain/errors.js";

export type GatewayErrorClass = "transient" | "permanent";

const NETWORK_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ERR_GOT_REQUEST_ERROR",
]);

const TRANSIENT_PATTERNS: RegExp[] = [
  /timeout|timed out/i,
  /ECONNREFUSED|ECONNRESET|socket hang up|fetch failed/i,
  /no connection|terminal (busy|not ready)|requote|price changed|off quotes/i,
];

function codeOf(err: unknown): string | null {
  if (typeof err !== "object" || err === null || !("code" in err)) return null;
  return typeof err.code === "string" ? err.code : null;
}

/** HTTP status carried by a got HTTPError, if any. */
export function statusCodeOf(err: unknown): number | null {
  if (typeof err !== "object" || err === null || !("response" in err)) return null;
  const { response } = err;
  if (typeof response !== "object" || response === null || !("statusCode" in response)) return null;
  return typeof response.statusCode === "number" ? response.statusCode : null;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Transient errors are worth another attempt with the same request; anything
 * else (broker refusal, validation, 4xx) is final.
 */
export function classifyGatewayError(err: unknown): GatewayErrorClass {
  if (err instanceof EngineError) {
    return err.kind === "transient_gateway" ? "transient" : "permanent";
  }
  if (err instanceof TimeoutError) return "transient";

  const status = statusCodeOf(err);
  if (status !== null) {
    return status >= 500 || status === 429 ? "transient" : "permanent";
  }

  const code = codeOf(err);
  if (code !== null && NETWORK_CODES.has(code)) return "transient";

  const message = errorMessage(err);
  for (const pattern of TRANSIENT_PATTERNS) {
    if (pattern.test(message)) return "transient";
  }
  return "permanent";
}
