import type { BrokerGateway, BrokerPosition, Quote, SymbolSpec } from "../types/broker.js";
import type { EngineConfig } from "../types/config.js";
import type { Emit } from "../adapters/event-log.js";
import type { PersistentState } from "../domain/persistent-state.js";
import { ModificationFailedError, RoundingInfeasibleError } from "../domain/errors.js";
import { advancePhase, currentR, type TrackedPosition } from "../domain/tracked-position.js";
import { exitSidePrice } from "../domain/price.js";
import { planPartialClose } from "../domain/volume.js";
import { errorMessage } from "../lib/classify-gateway-error.js";
import { withFixedRetry } from "../lib/with-retry.js";
import { logger } from "../lib/logger.js";

const log = logger.createChild("advancePosition");

export interface AdvanceContext {
  gateway: BrokerGateway;
  config: Pick<EngineConfig, "partial" | "modification">;
  emit: Emit;
  /** In-progress cycle state; trackers are written back here */
  state: PersistentState;
  checkpoint: (state: PersistentState) => void;
}

function put(ctx: AdvanceContext, tracker: TrackedPosition): void {
  ctx.state.positions[tracker.positionId] = tracker;
}

function markPartialDone(ctx: AdvanceContext, positionId: string): void {
  if (!ctx.state.completedPartials.includes(positionId)) {
    ctx.state.completedPartials.push(positionId);
  }
}

function modify(ctx: AdvanceContext, positionId: string, changes: { stopLoss?: number; takeProfit?: number }): Promise<void> {
  return withFixedRetry(() => ctx.gateway.modifyPosition(positionId, changes), {
    ...ctx.config.modification,
    onFailedAttempt: ({ attempt, retriesLeft, error }) => {
      log.warn({ action: "modifyRetry", positionId, changes, attempt, retriesLeft, err: error }, "Position modify failed, retrying");
    },
  });
}

/**
 * Pulls the target in to the trigger multiple. The tracker, carrying the
 * original target, is flushed to disk before the broker is touched.
 */
export async function compressTakeProfit(ctx: AdvanceContext, tracker: TrackedPosition, broker: BrokerPosition): Promise<void> {
  const { positionId, symbol } = tracker;
  const target = tracker.thresholdPrice;
  ctx.checkpoint(ctx.state);

  if (broker.takeProfit !== target) {
    try {
      await modify(ctx, positionId, { takeProfit: target });
    } catch (err) {
      const failure = new ModificationFailedError(positionId, "take-profit compression", err);
      log.warn({ action: "tpCompressFailed", positionId, symbol, target, err: failure }, failure.message);
      await ctx.emit("tp_compress_failed", { positionId, symbol, takeProfit: target, error: errorMessage(err) });
      return;
    }
  }

  put(ctx, advancePhase(tracker, "TP_COMPRESSED"));
  log.info({ action: "tpCompressed", positionId, symbol, from: broker.takeProfit, to: target }, "Take-profit compressed");
  await ctx.emit("tp_compressed", {
    positionId,
    symbol,
    previousTakeProfit: broker.takeProfit,
    takeProfit: target,
    originalTakeProfit: tracker.originalTakeProfit,
  });
}

/**
 * Breakeven stop first, then the original target back. Each leg is skipped
 * when the broker already shows it, so re-running is harmless.
 */
export async function applyProtection(ctx: AdvanceContext, tracker: TrackedPosition, broker: BrokerPosition): Promise<void> {
  const { positionId, symbol } = tracker;
  const breakeven = tracker.openPrice;

  if (broker.stopLoss !== breakeven) {
    try {
      await modify(ctx, positionId, { stopLoss: breakeven });
    } catch (err) {
      const failure = new ModificationFailedError(positionId, "stop to breakeven", err);
      log.warn({ action: "protectionFailed", positionId, stage: "stop_loss", err: failure }, failure.message);
      await ctx.emit("protection_failed", { positionId, symbol, stage: "stop_loss", error: errorMessage(err) });
      return;
    }
    await ctx.emit("sl_to_breakeven", { positionId, symbol, previousStopLoss: broker.stopLoss, stopLoss: breakeven });
  }

  const target = tracker.originalTakeProfit;
  if (target > 0 && broker.takeProfit !== target) {
    try {
      await modify(ctx, positionId, { takeProfit: target });
    } catch (err) {
      const failure = new ModificationFailedError(positionId, "take-profit restore", err);
      log.warn({ action: "protectionFailed", positionId, stage: "take_profit", err: failure }, failure.message);
      await ctx.emit("protection_failed", { positionId, symbol, stage: "take_profit", error: errorMessage(err) });
      return;
    }
    await ctx.emit("tp_restored", { positionId, symbol, previousTakeProfit: broker.takeProfit, takeProfit: target });
  }

  put(ctx, { ...tracker, protectionApplied: true });
  log.info({ action: "protectionApplied", positionId, symbol, stopLoss: breakeven, takeProfit: target }, "Position protected");
}

/**
 * Closes the configured fraction at the threshold. The close is sent once per
 * pass and never retried in place: a close whose reply is lost shows up next
 * pass as reduced broker volume.
 */
export async function closePartialAtThreshold(
  ctx: AdvanceContext,
  tracker: TrackedPosition,
  broker: BrokerPosition,
  quote: Quote,
  spec: SymbolSpec,
): Promise<void> {
  const { positionId, symbol } = tracker;

  let plan: ReturnType<typeof planPartialClose>;
  try {
    plan = planPartialClose(broker.volume, ctx.config.partial.closeFraction, spec);
  } catch (err) {
    if (!(err instanceof RoundingInfeasibleError)) throw err;
    if (tracker.lastDeferral !== err.reason) {
      log.warn({ action: "partialDeferred", positionId, symbol, reason: err.reason, volume: broker.volume }, err.message);
      await ctx.emit("partial_deferred", { positionId, symbol, reason: err.reason, volume: broker.volume, closeVolume: err.closeVolume });
      put(ctx, { ...tracker, lastDeferral: err.reason });
    }
    return;
  }

  const price = exitSidePrice(tracker.direction, quote);
  try {
    await ctx.gateway.closePartial(positionId, plan.closeVolume);
  } catch (err) {
    log.error({ action: "partialCloseFailed", positionId, symbol, volume: plan.closeVolume, err }, "Partial close failed");
    await ctx.emit("partial_close_failed", { positionId, symbol, volume: plan.closeVolume, error: errorMessage(err) });
    return;
  }

  const taken: TrackedPosition = {
    ...advancePhase(tracker, "PARTIAL_TAKEN"),
    volume: plan.remainingVolume,
    protectionApplied: false,
    lastDeferral: null,
  };
  put(ctx, taken);
  markPartialDone(ctx, positionId);
  ctx.checkpoint(ctx.state);
  log.info({ action: "partialClosed", positionId, symbol, ...plan, price }, "Partial profit taken");
  await ctx.emit("partial_close_success", {
    positionId,
    symbol,
    closedVolume: plan.closeVolume,
    remainingVolume: plan.remainingVolume,
    price,
    r: Number(currentR(tracker, price).toFixed(2)),
  });

  await applyProtection(ctx, taken, { ...broker, volume: plan.remainingVolume });
}

/** The broker already shows the reduced volume: record the partial as done and protect. */
export async function adoptExternalPartial(ctx: AdvanceContext, tracker: TrackedPosition, broker: BrokerPosition): Promise<void> {
  const taken: TrackedPosition = {
    ...advancePhase(tracker, "PARTIAL_TAKEN"),
    volume: broker.volume,
    protectionApplied: false,
    lastDeferral: null,
  };
  put(ctx, taken);
  markPartialDone(ctx, tracker.positionId);
  ctx.checkpoint(ctx.state);
  log.warn({ action: "partialDetected", positionId: tracker.positionId, trackedVolume: tracker.volume, brokerVolume: broker.volume }, "Partial close found at broker");
  await ctx.emit("partial_close_detected", {
    positionId: tracker.positionId,
    symbol: tracker.symbol,
    trackedVolume: tracker.volume,
    brokerVolume: broker.volume,
  });

  await applyProtection(ctx, taken, broker);
}
