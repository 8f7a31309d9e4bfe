import type { BrokerGateway } from "../types/broker.js";
import type { EngineConfig } from "../types/config.js";
import type { SetupProvider } from "../types/setup.js";
import type { Emit } from "../adapters/event-log.js";
import { InvalidSetupError, PlacementFailedError } from "../domain/errors.js";
import { symbolState, type PersistentState } from "../domain/persistent-state.js";
import { sizeByRisk } from "../domain/size-by-risk.js";
import { dayKey as dayKeyOf, dayStart, endOfDay, isWeekend } from "../domain/trading-calendar.js";
import { classifyGatewayError, errorMessage } from "../lib/classify-gateway-error.js";
import { logger } from "../lib/logger.js";
import { withFixedRetry } from "../lib/with-retry.js";
import type { OrderPlacer, PreparedOrder } from "./order-placer.js";
import type { CycleReport } from "./reconcile-cycle.js";
import type { StateHolder } from "./state-holder.js";

const log = logger.createChild("setupScheduler");

export interface SetupSchedulerDeps {
  gateway: BrokerGateway;
  config: Pick<EngineConfig, "tag" | "placement" | "riskPerTradePct" | "duplicateTolerancePoints">;
  emit: Emit;
  holder: StateHolder;
  provider: SetupProvider;
  placer: OrderPlacer;
}

interface Job {
  symbol: string;
  dayKey: string;
}

export type ScheduleOutcome =
  | "placed"
  | "no_setup"
  | "already_placed"
  | "already_traded_today"
  | "duplicate"
  | "weekend"
  | "sizing_failed"
  | "failed";

/**
 * Turns a symbol's new trading day into at most one pending order. Jobs run
 * one at a time off the reconcile loop, each inside a state transaction.
 */
export class SetupScheduler {
  private deps: SetupSchedulerDeps;
  private queue: Job[] = [];
  private draining: Promise<void> | null = null;
  /** symbol -> day whose job hit a broker outage and waits for the next pass */
  private deferred = new Map<string, string>();

  constructor(deps: SetupSchedulerDeps) {
    this.deps = deps;
  }

  enqueue(symbol: string, dayKey: string): void {
    if (this.queue.some((j) => j.symbol === symbol && j.dayKey === dayKey)) return;
    this.queue.push({ symbol, dayKey });
    this.kick();
  }

  /** Re-queues jobs deferred by a broker outage, as long as their day is still the server's day. */
  retryDeferred(report: CycleReport): void {
    if (report.weekend || this.deferred.size === 0) return;
    const today = dayKeyOf(new Date(report.serverTime));
    const jobs = [...this.deferred];
    this.deferred.clear();
    for (const [symbol, dayKey] of jobs) {
      if (dayKey === today) {
        this.enqueue(symbol, dayKey);
      } else {
        log.warn({ action: "deferredDropped", symbol, dayKey, today }, "Deferred setup expired with its day");
      }
    }
  }

  /** Resolves once the queue is empty. */
  async idle(): Promise<void> {
    while (this.draining !== null) {
      await this.draining;
    }
  }

  private kick(): void {
    if (this.draining !== null) return;
    this.draining = this.drain()
      .catch((err: unknown) => {
        log.error({ action: "schedulerCrashed", err }, "Setup queue stopped unexpectedly");
      })
      .finally(() => {
        this.draining = null;
        if (this.queue.length > 0) this.kick();
      });
  }

  private async drain(): Promise<void> {
    for (let job = this.queue.shift(); job !== undefined; job = this.queue.shift()) {
      const { symbol, dayKey } = job;
      const outcome = await this.deps.holder.transact(async (state) => {
        try {
          return { state, result: await this.handle(state, symbol, dayKey) };
        } catch (err) {
          log.error({ action: "scheduleFailed", symbol, dayKey, err }, "Setup scheduling failed");
          // the placer has already logged these
          if (!(err instanceof InvalidSetupError) && !(err instanceof PlacementFailedError)) {
            const retrying = classifyGatewayError(err) === "transient";
            if (retrying) this.deferred.set(symbol, dayKey);
            await this.deps.emit("order_skipped", { symbol, dayKey, reason: "error", error: errorMessage(err), retrying });
          }
          return { state, result: "failed" as const };
        }
      });
      log.info({ action: "scheduled", symbol, dayKey, outcome }, "Setup handled");
    }
  }

  /** Mutates `state` when an order is placed. */
  private async handle(state: PersistentState, symbol: string, dayKey: string): Promise<ScheduleOutcome> {
    const { gateway, config, emit, provider, placer } = this.deps;
    const skip = async (reason: ScheduleOutcome, extra: Record<string, unknown> = {}): Promise<ScheduleOutcome> => {
      await emit("order_skipped", { symbol, dayKey, reason, ...extra });
      return reason;
    };

    if (symbolState(state, symbol).placedForDay === dayKey) {
      return skip("already_placed");
    }

    const serverTime = await this.read(() => gateway.getServerTime());
    if (isWeekend(serverTime)) return skip("weekend");

    const setup = await provider.getSetup(symbol, dayKey);
    if (setup === null) {
      await emit("no_setup", { symbol, dayKey });
      return "no_setup";
    }

    const todaysDeals = await this.read(() => gateway.listDealsSince(dayStart(serverTime), config.tag));
    if (todaysDeals.some((d) => d.symbol === symbol && d.type === "entry")) {
      state.symbols[symbol] = { ...symbolState(state, symbol), placedForDay: dayKey };
      return skip("already_traded_today");
    }

    const prepared = await placer.prepare({ ...setup, validUntil: setup.validUntil ?? endOfDay(serverTime) });
    const spec = await this.read(() => gateway.getSymbolSpec(symbol));

    const tolerance = spec.point * config.duplicateTolerancePoints;
    const match = await this.findDuplicate(prepared, tolerance);
    if (match !== null) {
      return skip("duplicate", { entryPrice: prepared.setup.entryPrice, existing: match, tolerance });
    }

    const sizing = sizeByRisk({
      balance: await this.read(() => gateway.getAccountBalance()),
      riskPct: config.riskPerTradePct,
      entryPrice: prepared.setup.entryPrice,
      stopLoss: prepared.setup.stopLoss,
      spec,
    });
    if (sizing === null) return skip("sizing_failed");

    const order = await placer.submit(prepared, sizing.volume, serverTime);
    state.pendingOrders[order.ticket] = order;
    state.symbols[symbol] = { ...symbolState(state, symbol), placedForDay: dayKey };
    return "placed";
  }

  private read<T>(fn: () => Promise<T>): Promise<T> {
    return withFixedRetry(fn, {
      ...this.deps.config.placement,
      onFailedAttempt: ({ attempt, retriesLeft, error }) => {
        log.warn({ action: "readRetry", attempt, retriesLeft, err: error }, "Broker read failed, retrying");
      },
    });
  }

  /** Ticket or position id already sitting within `tolerance` of the entry on the same side. */
  private async findDuplicate(prepared: PreparedOrder, tolerance: number): Promise<string | null> {
    const { gateway, config } = this.deps;
    const { symbol, direction, entryPrice } = prepared.setup;
    const near = (price: number): boolean =>
      tolerance > 0 ? Math.abs(price - entryPrice) <= tolerance : price === entryPrice;

    const orders = await this.read(() => gateway.listPendingOrders(config.tag));
    const order = orders.find((o) => o.symbol === symbol && o.direction === direction && near(o.entryPrice));
    if (order) return order.ticket;

    const positions = await this.read(() => gateway.listOpenPositions(config.tag));
    const position = positions.find((p) => p.symbol === symbol && p.direction === direction && near(p.openPrice));
    return position ? position.positionId : null;
  }
}
