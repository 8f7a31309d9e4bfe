export type EngineErrorKind =
  | "invalid_setup"
  | "transient_gateway"
  | "broker_rejected"
  | "placement_failed"
  | "modification_failed"
  | "rounding_infeasible"
  | "state_inconsistency";

export class EngineError extends Error {
  readonly kind: EngineErrorKind;

  constructor(kind: EngineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** Setup failed validation before anything was sent. Never retried. */
export class InvalidSetupError extends EngineError {
  readonly reason: string;

  constructor(symbol: string, reason: string) {
    super("invalid_setup", `${symbol}: invalid setup (${reason})`);
    this.reason = reason;
  }
}

/** Network, IPC or timeout hiccup talking to the terminal. Safe to retry. */
export class TransientGatewayError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transient_gateway", message, options);
  }
}

/** The broker answered and refused the request. Retrying the same request will not help. */
export class BrokerRejectedError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("broker_rejected", message, options);
  }
}

export class PlacementFailedError extends EngineError {
  readonly attempts: number;

  constructor(symbol: string, attempts: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("placement_failed", `${symbol}: order placement failed after ${attempts} attempt(s): ${detail}`, { cause });
    this.attempts = attempts;
  }
}

export class ModificationFailedError extends EngineError {
  constructor(positionId: string, what: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("modification_failed", `position ${positionId}: ${what} failed: ${detail}`, { cause });
  }
}

export type RoundingFailure = "close_below_minimum" | "no_remainder" | "remainder_below_minimum";

export class RoundingInfeasibleError extends EngineError {
  readonly reason: RoundingFailure;
  readonly volume: number;
  readonly closeVolume: number;

  constructor(reason: RoundingFailure, volume: number, closeVolume: number) {
    super("rounding_infeasible", `cannot split ${volume} lots (rounded close ${closeVolume}): ${reason}`);
    this.reason = reason;
    this.volume = volume;
    this.closeVolume = closeVolume;
  }
}

/** Broker state the local tracker cannot reconcile. Adopt best-effort, never drop persisted state. */
export class StateInconsistencyError extends EngineError {
  constructor(message: string) {
    super("state_inconsistency", message);
  }
}
