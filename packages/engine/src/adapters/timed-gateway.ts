import pTimeout from "p-timeout";
import type {
  BrokerGateway,
  BrokerPosition,
  Deal,
  PendingOrderRecord,
  PositionModification,
  Quote,
  SymbolSpec,
} from "../types/broker.js";
import type { Setup } from "../types/setup.js";
import { logger } from "../lib/logger.js";

const log = logger.createChild("gateway");

/** Bounds every broker call by `milliseconds`; a stalled terminal surfaces as a p-timeout TimeoutError. */
export class TimedGateway implements BrokerGateway {
  private inner: BrokerGateway;
  private milliseconds: number;

  constructor(inner: BrokerGateway, milliseconds: number) {
    this.inner = inner;
    this.milliseconds = milliseconds;
  }

  private async bound<T>(method: string, promise: Promise<T>): Promise<T> {
    const started = Date.now();
    try {
      const result = await pTimeout(promise, {
        milliseconds: this.milliseconds,
        message: `${method} timed out after ${this.milliseconds}ms`,
      });
      log.debug({ action: "brokerCall", method, latencyMs: Date.now() - started }, "Broker call done");
      return result;
    } catch (err) {
      log.warn({ action: "brokerCallFailed", method, latencyMs: Date.now() - started, err }, "Broker call failed");
      throw err;
    }
  }

  listPendingOrders(tag: string): Promise<PendingOrderRecord[]> {
    return this.bound("listPendingOrders", this.inner.listPendingOrders(tag));
  }

  listOpenPositions(tag: string): Promise<BrokerPosition[]> {
    return this.bound("listOpenPositions", this.inner.listOpenPositions(tag));
  }

  listDealsSince(since: string, tag: string): Promise<Deal[]> {
    return this.bound("listDealsSince", this.inner.listDealsSince(since, tag));
  }

  getQuote(symbol: string): Promise<Quote> {
    return this.bound("getQuote", this.inner.getQuote(symbol));
  }

  getServerTime(): Promise<Date> {
    return this.bound("getServerTime", this.inner.getServerTime());
  }

  getSymbolSpec(symbol: string): Promise<SymbolSpec> {
    return this.bound("getSymbolSpec", this.inner.getSymbolSpec(symbol));
  }

  getAccountBalance(): Promise<number> {
    return this.bound("getAccountBalance", this.inner.getAccountBalance());
  }

  sendPendingLimit(setup: Setup, volume: number, tag: string): Promise<string> {
    return this.bound("sendPendingLimit", this.inner.sendPendingLimit(setup, volume, tag));
  }

  modifyPosition(positionId: string, changes: PositionModification): Promise<void> {
    return this.bound("modifyPosition", this.inner.modifyPosition(positionId, changes));
  }

  closePartial(positionId: string, volume: number): Promise<void> {
    return this.bound("closePartial", this.inner.closePartial(positionId, volume));
  }

  cancelOrder(ticket: string): Promise<void> {
    return this.bound("cancelOrder", this.inner.cancelOrder(ticket));
  }
}
