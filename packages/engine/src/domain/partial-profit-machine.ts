import type { BrokerPosition, Quote } from "../types/broker.js";
import type { PartialRules, TradingMode } from "../types/config.js";
import { exitSidePrice, priceAtR } from "./price.js";
import { rewardMultiple, type Phase, type TrackedPosition } from "./tracked-position.js";

export type TransitionAction =
  | "finalize"
  | "hold"
  | "compress_take_profit"
  | "adopt_external_partial"
  | "close_partial"
  | "apply_protection";

/** Everything one evaluation pass knows about a position, taken from a single broker snapshot. */
export interface Observation {
  position: TrackedPosition;
  /** null when the broker no longer lists the position */
  broker: BrokerPosition | null;
  /** null when no quote was fetched (or the fetch failed) this pass */
  quote: Quote | null;
  volumeStep: number;
  rules: PartialRules;
}

export interface Transition {
  name: string;
  from: readonly Phase[];
  guard: (obs: Observation) => boolean;
  action: TransitionAction;
  to: Phase;
}

const OPEN_PHASES: readonly Phase[] = ["OPENED", "TP_COMPRESSED", "PARTIAL_TAKEN"];

export function positionGone(obs: Observation): boolean {
  return obs.broker === null;
}

export function rewardExceedsTrigger(obs: Observation): boolean {
  return rewardMultiple(obs.position) > obs.rules.triggerR;
}

/** Broker reports less volume than we track: an earlier close went through but its reply was lost. */
export function volumeReducedExternally(obs: Observation): boolean {
  if (obs.broker === null) return false;
  return obs.broker.volume < obs.position.volume - obs.volumeStep / 2;
}

export function thresholdCrossed(obs: Observation): boolean {
  if (obs.quote === null || obs.position.riskDistance <= 0) return false;
  const { position, rules } = obs;
  const trigger = priceAtR(position.direction, position.openPrice, position.riskDistance, rules.triggerR - rules.earlyTriggerR);
  const price = exitSidePrice(position.direction, obs.quote);
  return position.direction === "long" ? price >= trigger : price <= trigger;
}

export function protectionPending(obs: Observation): boolean {
  return !obs.position.protectionApplied;
}

const CLOSURE_ROW: Transition = {
  name: "closed_at_broker",
  from: OPEN_PHASES,
  guard: positionGone,
  action: "finalize",
  to: "CLOSED",
};

/** Compress, partial at 3R, then breakeven stop with the original target restored. Order matters: first match wins. */
export const CONSERVATIVE_TABLE: readonly Transition[] = [
  CLOSURE_ROW,
  { name: "compress", from: ["OPENED"], guard: rewardExceedsTrigger, action: "compress_take_profit", to: "TP_COMPRESSED" },
  { name: "run_to_target", from: ["OPENED"], guard: () => true, action: "hold", to: "OPENED" },
  { name: "partial_seen", from: ["TP_COMPRESSED"], guard: volumeReducedExternally, action: "adopt_external_partial", to: "PARTIAL_TAKEN" },
  { name: "partial", from: ["TP_COMPRESSED"], guard: thresholdCrossed, action: "close_partial", to: "PARTIAL_TAKEN" },
  { name: "protect", from: ["PARTIAL_TAKEN"], guard: protectionPending, action: "apply_protection", to: "PARTIAL_TAKEN" },
];

/** Positions run untouched to their stop or target. */
export const AGGRESSIVE_TABLE: readonly Transition[] = [CLOSURE_ROW];

export const TRANSITION_TABLES: Record<TradingMode, readonly Transition[]> = {
  conservative: CONSERVATIVE_TABLE,
  aggressive: AGGRESSIVE_TABLE,
};

/** First row whose phase and guard match, or null when the position should be left alone. */
export function selectTransition(table: readonly Transition[], obs: Observation): Transition | null {
  for (const row of table) {
    if (row.from.includes(obs.position.phase) && row.guard(obs)) return row;
  }
  return null;
}
