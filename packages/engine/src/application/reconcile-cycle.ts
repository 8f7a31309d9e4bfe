import type { BrokerGateway, BrokerPosition, Deal, PendingOrderRecord, Quote, SymbolSpec } from "../types/broker.js";
import type { EngineConfig } from "../types/config.js";
import type { Emit } from "../adapters/event-log.js";
import { StateInconsistencyError } from "../domain/errors.js";
import { symbolState, type PersistentState } from "../domain/persistent-state.js";
import { createTrackedPosition, type TrackedPosition } from "../domain/tracked-position.js";
import { TRANSITION_TABLES, selectTransition } from "../domain/partial-profit-machine.js";
import { isPastExpiry, resolvePendingOrder, type PendingResolution } from "../domain/order-resolution.js";
import { advanceCursor, filterNewDeals } from "../domain/deal-cursor.js";
import { dayKey, dayStart, isWeekend } from "../domain/trading-calendar.js";
import { logger } from "../lib/logger.js";
import {
  adoptExternalPartial,
  applyProtection,
  closePartialAtThreshold,
  compressTakeProfit,
  type AdvanceContext,
} from "./advance-position.js";

const log = logger.createChild("reconcileCycle");

export interface CycleDeps {
  gateway: BrokerGateway;
  config: EngineConfig;
  emit: Emit;
  /** Persists an in-progress state mid-cycle */
  checkpoint: (state: PersistentState) => void;
  /** Called once per symbol when its trading day starts (never on weekends) */
  onNewDay: (symbol: string, dayKey: string) => void;
}

export interface CycleReport {
  serverTime: string;
  weekend: boolean;
  actions: string[];
  failedSteps: string[];
}

export interface CycleResult {
  state: PersistentState;
  report: CycleReport;
}

/** Broker truth for one pass. A null list means that fetch failed and the steps needing it stand down. */
interface Snapshot {
  serverTime: Date;
  orders: PendingOrderRecord[] | null;
  positions: BrokerPosition[] | null;
  deals: Deal[] | null;
}

interface CycleContext {
  state: PersistentState;
  deps: CycleDeps;
  report: CycleReport;
  snapshot: Snapshot;
}

/** Runs `fn`, recording a failure against `name` instead of letting it end the cycle. */
async function contain<T>(report: CycleReport, name: string, fn: () => Promise<T>): Promise<T | null> {
  try {
    return await fn();
  } catch (err) {
    log.error({ action: "stepFailed", step: name, err }, "Reconcile step failed");
    report.failedSteps.push(name);
    return null;
  }
}

/**
 * One reconciliation pass: read broker truth once, then settle pending
 * orders, adopt positions, advance the state machine, record deals, retire
 * closed positions and handle the trading-day calendar. The caller persists
 * the returned state.
 */
export async function runReconcileCycle(input: PersistentState, deps: CycleDeps): Promise<CycleResult> {
  const { gateway, config } = deps;
  const state = structuredClone(input);

  const serverTime = await gateway.getServerTime();
  const report: CycleReport = {
    serverTime: serverTime.toISOString(),
    weekend: isWeekend(serverTime),
    actions: [],
    failedSteps: [],
  };

  const lookbackStart = new Date(serverTime.getTime() - config.dealLookbackHours * 3_600_000).toISOString();
  const since = state.lastDealPollCursor?.time ?? lookbackStart;
  const snapshot: Snapshot = {
    serverTime,
    orders: await contain(report, "fetch_orders", () => gateway.listPendingOrders(config.tag)),
    positions: await contain(report, "fetch_positions", () => gateway.listOpenPositions(config.tag)),
    deals: await contain(report, "fetch_deals", () => gateway.listDealsSince(since, config.tag)),
  };

  const ctx: CycleContext = { state, deps, report, snapshot };
  await contain(report, "pending_orders", () => reconcilePendingOrders(ctx));
  await contain(report, "positions", () => adoptPositions(ctx));
  const closing = (await contain(report, "evaluate", () => evaluatePositions(ctx))) ?? [];
  await contain(report, "deals", () => recordDeals(ctx));
  await contain(report, "finalize", () => finalizeClosed(ctx, closing));
  await contain(report, "calendar", () => handleCalendar(ctx));

  return { state, report };
}

// --- 1. pending orders ---

async function reconcilePendingOrders(ctx: CycleContext): Promise<void> {
  const { state, deps, report, snapshot } = ctx;
  const { orders, positions, deals, serverTime } = snapshot;
  if (orders === null || positions === null) return;

  const listed = new Set(orders.map((o) => o.ticket));
  for (const [ticket, order] of Object.entries(state.pendingOrders)) {
    if (listed.has(ticket)) continue;
    const resolution = resolvePendingOrder(order, { positions, deals, serverTime });
    switch (resolution.status) {
      case "filled":
        delete state.pendingOrders[ticket];
        await promoteFilledOrder(ctx, order, resolution);
        break;
      case "expired":
        delete state.pendingOrders[ticket];
        report.actions.push(`order_expired:${ticket}`);
        await deps.emit("pending_order_expired", { ticket, symbol: order.symbol, validUntil: order.validUntil });
        break;
      case "cancelled":
        delete state.pendingOrders[ticket];
        report.actions.push(`order_cancelled:${ticket}`);
        await deps.emit("pending_order_cancelled", { ticket, symbol: order.symbol, reason: "removed_at_broker" });
        break;
      case "unresolved":
        break;
    }
  }

  for (const order of orders) {
    if (!state.pendingOrders[order.ticket]) {
      state.pendingOrders[order.ticket] = order;
      report.actions.push(`order_adopted:${order.ticket}`);
      log.warn({ action: "orderAdopted", ticket: order.ticket, symbol: order.symbol }, "Untracked pending order adopted");
      await deps.emit("pending_order_seen", { ticket: order.ticket, symbol: order.symbol, entryPrice: order.entryPrice, adopted: true });
    }
    if (deps.config.cancelUnfilledAtExpiry && isPastExpiry(order, serverTime)) {
      await cancelExpiredOrder(ctx, order);
    }
  }
}

async function promoteFilledOrder(
  ctx: CycleContext,
  order: PendingOrderRecord,
  fill: Extract<PendingResolution, { status: "filled" }>,
): Promise<void> {
  const { state, deps, report } = ctx;
  const positionId = fill.position?.positionId ?? fill.deal?.positionId;
  if (positionId === undefined || state.positions[positionId]) return;

  const tracker = createTrackedPosition({
    positionId,
    symbol: order.symbol,
    direction: order.direction,
    openPrice: fill.position?.openPrice ?? fill.deal?.price ?? order.entryPrice,
    volume: fill.position?.volume ?? fill.deal?.volume ?? order.volume,
    stopLossAtOpen: order.stopLoss,
    originalTakeProfit: order.takeProfit,
    openedAt: fill.position?.openedAt ?? fill.deal?.time ?? ctx.snapshot.serverTime.toISOString(),
    triggerR: deps.config.partial.triggerR,
  });
  state.positions[positionId] = tracker;
  report.actions.push(`order_filled:${order.ticket}`);
  log.info({ action: "orderFilled", ticket: order.ticket, positionId, symbol: order.symbol }, "Pending order filled");
  await deps.emit("order_filled", {
    ticket: order.ticket,
    positionId,
    symbol: order.symbol,
    openPrice: tracker.openPrice,
    volume: tracker.volume,
    originalTakeProfit: tracker.originalTakeProfit,
  });
}

async function cancelExpiredOrder(ctx: CycleContext, order: PendingOrderRecord): Promise<void> {
  const { state, deps, report } = ctx;
  await deps.emit("pending_order_cancel_attempt", { ticket: order.ticket, symbol: order.symbol, validUntil: order.validUntil });
  try {
    await deps.gateway.cancelOrder(order.ticket);
  } catch (err) {
    log.warn({ action: "cancelFailed", ticket: order.ticket, err }, "Cancel of expired order failed");
    report.failedSteps.push(`cancel:${order.ticket}`);
    return;
  }
  delete state.pendingOrders[order.ticket];
  report.actions.push(`order_cancelled:${order.ticket}`);
  await deps.emit("pending_order_cancelled", { ticket: order.ticket, symbol: order.symbol, reason: "expired" });
}

// --- 2. positions ---

async function adoptPositions(ctx: CycleContext): Promise<void> {
  const { state, deps, report, snapshot } = ctx;
  if (snapshot.positions === null) return;

  for (const broker of snapshot.positions) {
    const known = state.positions[broker.positionId];
    if (known) {
      // TP_COMPRESSED relies on the tracked volume to spot a lost close reply
      if (known.phase !== "TP_COMPRESSED" && known.volume !== broker.volume) {
        state.positions[broker.positionId] = { ...known, volume: broker.volume };
      }
      continue;
    }

    const partialDone = state.completedPartials.includes(broker.positionId);
    const tracker = createTrackedPosition({
      positionId: broker.positionId,
      symbol: broker.symbol,
      direction: broker.direction,
      openPrice: broker.openPrice,
      volume: broker.volume,
      stopLossAtOpen: broker.stopLoss,
      originalTakeProfit: broker.takeProfit,
      openedAt: broker.openedAt,
      triggerR: deps.config.partial.triggerR,
      phase: partialDone ? "PARTIAL_TAKEN" : "OPENED",
    });
    state.positions[broker.positionId] = tracker;

    const possiblyCompressed = tracker.riskDistance > 0 && tracker.originalTakeProfit === tracker.thresholdPrice;
    const warning = new StateInconsistencyError(
      `position ${broker.positionId} (${broker.symbol}) was not tracked; adopted with take-profit ${broker.takeProfit}`,
    );
    log.warn({ action: "positionAdopted", positionId: broker.positionId, phase: tracker.phase, possiblyCompressed, err: warning }, warning.message);
    report.actions.push(`position_adopted:${broker.positionId}`);
    await deps.emit("state_inconsistency", {
      positionId: broker.positionId,
      symbol: broker.symbol,
      reason: "untracked_position",
      possiblyCompressed,
    });
    await deps.emit("position_adopted", {
      positionId: broker.positionId,
      symbol: broker.symbol,
      direction: broker.direction,
      phase: tracker.phase,
      volume: broker.volume,
      originalTakeProfit: tracker.originalTakeProfit,
    });
  }
}

// --- 3. state machine ---

type Lazy<T> = (symbol: string) => Promise<T | null>;

function cachedPerSymbol<T>(report: CycleReport, name: string, fetch: (symbol: string) => Promise<T>): Lazy<T> {
  const cache = new Map<string, T | null>();
  return async (symbol) => {
    const hit = cache.get(symbol);
    if (hit !== undefined) return hit;
    const value = await contain(report, `${name}:${symbol}`, () => fetch(symbol));
    cache.set(symbol, value);
    return value;
  };
}

/** Advances every tracked position; returns the ones the broker no longer lists. */
async function evaluatePositions(ctx: CycleContext): Promise<TrackedPosition[]> {
  const { state, deps, report, snapshot } = ctx;
  if (snapshot.positions === null) return [];

  const { config, gateway } = deps;
  const table = TRANSITION_TABLES[config.mode];
  const brokerById = new Map(snapshot.positions.map((p) => [p.positionId, p]));
  const quoteOf: Lazy<Quote> = cachedPerSymbol(report, "quote", (s) => gateway.getQuote(s));
  const specOf: Lazy<SymbolSpec> = cachedPerSymbol(report, "symbol_spec", (s) => gateway.getSymbolSpec(s));
  const actx: AdvanceContext = { gateway, config, emit: deps.emit, state, checkpoint: deps.checkpoint };
  const closing: TrackedPosition[] = [];

  for (const tracker of Object.values(state.positions)) {
    if (tracker.phase === "CLOSED") continue;
    const broker = brokerById.get(tracker.positionId) ?? null;

    let quote: Quote | null = null;
    let spec: SymbolSpec | null = null;
    if (broker !== null && tracker.phase === "TP_COMPRESSED" && config.mode === "conservative") {
      spec = await specOf(tracker.symbol);
      if (spec === null) continue;
      quote = await quoteOf(tracker.symbol);
    }

    const row = selectTransition(table, {
      position: tracker,
      broker,
      quote,
      volumeStep: spec?.volumeStep ?? 0,
      rules: config.partial,
    });
    const action = row?.action ?? "hold";
    if (action === "hold") continue;
    if (action !== "finalize") report.actions.push(`${action}:${tracker.positionId}`);

    await contain(report, `advance:${tracker.positionId}`, async () => {
      switch (action) {
        case "finalize":
          closing.push(tracker);
          return;
        case "compress_take_profit":
          if (broker !== null) await compressTakeProfit(actx, tracker, broker);
          return;
        case "adopt_external_partial":
          if (broker !== null) await adoptExternalPartial(actx, tracker, broker);
          return;
        case "close_partial":
          if (broker !== null && quote !== null && spec !== null) {
            await closePartialAtThreshold(actx, tracker, broker, quote, spec);
          }
          return;
        case "apply_protection":
          if (broker !== null) await applyProtection(actx, tracker, broker);
          return;
      }
    });
  }
  return closing;
}

// --- 4. deals ---

async function recordDeals(ctx: CycleContext): Promise<void> {
  const { state, deps, snapshot } = ctx;
  if (snapshot.deals === null) return;

  const fresh = filterNewDeals(snapshot.deals, state.lastDealPollCursor);
  for (const deal of fresh) {
    const tracker = state.positions[deal.positionId];
    if (tracker && deal.type !== "entry") {
      state.positions[deal.positionId] = {
        ...tracker,
        realizedProfit: Number((tracker.realizedProfit + deal.profit).toFixed(2)),
      };
    }
    await deps.emit("deal_recorded", { ...deal });
  }
  state.lastDealPollCursor = advanceCursor(state.lastDealPollCursor, fresh);
}

// --- 5. closure ---

async function finalizeClosed(ctx: CycleContext, closing: readonly TrackedPosition[]): Promise<void> {
  const { state, deps, report, snapshot } = ctx;

  for (const closed of closing) {
    const tracker = state.positions[closed.positionId] ?? closed;
    const { positionId, symbol } = tracker;
    const closingDeals = (snapshot.deals ?? []).filter((d) => d.positionId === positionId && d.type !== "entry");

    // closed with the partial missing, or taken but never protected
    const orphaned = tracker.phase === "TP_COMPRESSED" || (tracker.phase === "PARTIAL_TAKEN" && !tracker.protectionApplied);
    if (orphaned) {
      await deps.emit("orphaned_partial_state", { positionId, symbol, phase: tracker.phase, protectionApplied: tracker.protectionApplied });
    }

    delete state.positions[positionId];
    state.completedPartials = state.completedPartials.filter((id) => id !== positionId);
    report.actions.push(`position_closed:${positionId}`);

    const { realizedProfit } = tracker;
    log.info({ action: "positionClosed", positionId, symbol, phase: tracker.phase, realizedProfit }, "Position closed");
    await deps.emit("position_closed", {
      positionId,
      symbol,
      phase: tracker.phase,
      originalTakeProfit: tracker.originalTakeProfit,
      dealsAvailable: snapshot.deals !== null,
      // only this pass's fetch; realizedProfit carries every exit-side deal seen while tracked
      closingDeals: closingDeals.map((d) => ({ dealId: d.dealId, type: d.type, volume: d.volume, price: d.price, profit: d.profit })),
      realizedProfit,
    });
  }
}

// --- 6/7. trading day and weekend ---

async function handleCalendar(ctx: CycleContext): Promise<void> {
  const { state, deps, report, snapshot } = ctx;
  const key = dayKey(snapshot.serverTime);

  if (report.weekend) {
    if (state.lastWeekendNoticeDate !== key) {
      state.lastWeekendNoticeDate = key;
      log.info({ action: "weekend", date: key }, "Weekend: no new orders");
      await deps.emit("weekend_notice", { date: key });
    }
    return;
  }

  const start = dayStart(snapshot.serverTime);
  for (const symbol of deps.config.symbols) {
    const current = symbolState(state, symbol);
    if (current.lastSeenDayStart === start) continue;
    state.symbols[symbol] = { ...current, lastSeenDayStart: start };
    report.actions.push(`new_day:${symbol}`);
    await deps.emit("new_day", { symbol, dayKey: key });
    deps.onNewDay(symbol, key);
  }
}

