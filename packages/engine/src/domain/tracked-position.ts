import type { Direction } from "../types/broker.js";
import { normalizePrice, priceAtR } from "./price.js";
import { StateInconsistencyError } from "./errors.js";

export type Phase = "OPENED" | "TP_COMPRESSED" | "PARTIAL_TAKEN" | "CLOSED";

const PHASE_RANK: Record<Phase, number> = {
  OPENED: 0,
  TP_COMPRESSED: 1,
  PARTIAL_TAKEN: 2,
  CLOSED: 3,
};

export interface TrackedPosition {
  positionId: string;
  symbol: string;
  direction: Direction;
  openPrice: number;
  /** Current remaining volume */
  volume: number;
  originalVolume: number;
  stopLossAtOpen: number;
  /** Take-profit from setup time. Never overwritten by the compressed value. */
  originalTakeProfit: number;
  /** |openPrice - stopLossAtOpen|, the 1R unit */
  riskDistance: number;
  /** Price at which the trigger multiple (3R) is reached */
  thresholdPrice: number;
  phase: Phase;
  openedAt: string;
  /** Breakeven stop and restored target are in place (meaningful once PARTIAL_TAKEN) */
  protectionApplied: boolean;
  /** Last reason a partial close was deferred, so repeated deferrals log once */
  lastDeferral: string | null;
  /** Profit of the exit-side deals recorded against this position so far */
  realizedProfit: number;
}

export interface NewTrackedPosition {
  positionId: string;
  symbol: string;
  direction: Direction;
  openPrice: number;
  volume: number;
  stopLossAtOpen: number;
  originalTakeProfit: number;
  openedAt: string;
  triggerR: number;
  phase?: Phase;
  protectionApplied?: boolean;
}

export function createTrackedPosition(input: NewTrackedPosition): TrackedPosition {
  const riskDistance = input.stopLossAtOpen > 0
    ? normalizePrice(Math.abs(input.openPrice - input.stopLossAtOpen))
    : 0;
  return {
    positionId: input.positionId,
    symbol: input.symbol,
    direction: input.direction,
    openPrice: input.openPrice,
    volume: input.volume,
    originalVolume: input.volume,
    stopLossAtOpen: input.stopLossAtOpen,
    originalTakeProfit: input.originalTakeProfit,
    riskDistance,
    thresholdPrice: priceAtR(input.direction, input.openPrice, riskDistance, input.triggerR),
    phase: input.phase ?? "OPENED",
    openedAt: input.openedAt,
    protectionApplied: input.protectionApplied ?? false,
    lastDeferral: null,
    realizedProfit: 0,
  };
}

/**
 * Reward multiple implied by the original take-profit. Zero when the position
 * has no stop, no target, or a target on the losing side.
 */
export function rewardMultiple(position: TrackedPosition): number {
  if (position.riskDistance <= 0 || position.originalTakeProfit <= 0) return 0;
  const reward = position.direction === "long"
    ? position.originalTakeProfit - position.openPrice
    : position.openPrice - position.originalTakeProfit;
  if (reward <= 0) return 0;
  return normalizePrice(reward / position.riskDistance);
}

/** R multiple reached at `price`. */
export function currentR(position: TrackedPosition, price: number): number {
  if (position.riskDistance <= 0) return 0;
  const move = position.direction === "long" ? price - position.openPrice : position.openPrice - price;
  return move / position.riskDistance;
}

/** Moves a position forward; phases never regress. */
export function advancePhase(position: TrackedPosition, to: Phase): TrackedPosition {
  if (PHASE_RANK[to] < PHASE_RANK[position.phase]) {
    throw new StateInconsistencyError(
      `position ${position.positionId}: refusing phase regression ${position.phase} -> ${to}`,
    );
  }
  return { ...position, phase: to };
}
