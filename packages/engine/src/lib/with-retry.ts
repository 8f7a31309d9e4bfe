import pRetry, { AbortError } from "p-retry";
import type { RetryPolicy } from "../types/config.js";
import { TransientGatewayError } from "../domain/errors.js";
import { classifyGatewayError } from "./classify-gateway-error.js";

export interface FailedAttempt {
  attempt: number;
  retriesLeft: number;
  error: Error;
}

export interface FixedRetryOptions extends RetryPolicy {
  onFailedAttempt?: (failure: FailedAttempt) => void | Promise<void>;
}

/**
 * Runs `fn` up to `attempts` times with a fixed pause between tries. Only
 * transient gateway errors are retried; anything else rejects at once with
 * the original error.
 */
export function withFixedRetry<T>(fn: (attempt: number) => Promise<T>, options: FixedRetryOptions): Promise<T> {
  const { attempts, delayMs, onFailedAttempt } = options;
  return pRetry(
    async (attempt) => {
      try {
        return await fn(attempt);
      } catch (err) {
        if (classifyGatewayError(err) === "transient") {
          throw err instanceof Error ? err : new TransientGatewayError(String(err));
        }
        throw new AbortError(err instanceof Error ? err : new Error(String(err)));
      }
    },
    {
      retries: Math.max(0, attempts - 1),
      factor: 1,
      minTimeout: delayMs,
      maxTimeout: delayMs,
      randomize: false,
      onFailedAttempt: async (error) => {
        await onFailedAttempt?.({ attempt: error.attemptNumber, retriesLeft: error.retriesLeft, error });
      },
    },
  );
}
