import { roundToStep } from "@ratchet/kit";
import type {
  BrokerGateway,
  BrokerPosition,
  Deal,
  DealType,
  Direction,
  PendingOrderRecord,
  PositionModification,
  Quote,
  SymbolSpec,
} from "../types/broker.js";
import type { Setup } from "../types/setup.js";
import { BrokerRejectedError } from "../domain/errors.js";
import { logger } from "../lib/logger.js";

const log = logger.createChild("paperBroker");

export type GatewayMethod = keyof BrokerGateway;

export interface GatewayCall {
  method: GatewayMethod;
  args: unknown[];
}

interface Fault {
  error: Error;
  /** Apply the effect, then fail: a request that went through but whose reply was lost */
  applyAnyway: boolean;
}

export interface PaperSymbol {
  spec: SymbolSpec;
  bid: number;
  ask: number;
}

export interface PaperBrokerOptions {
  symbols: Record<string, PaperSymbol>;
  serverTime: Date;
  balance?: number;
  /** Remove pending orders on their own once past validity, as most terminals do */
  expiresOrders?: boolean;
}

const LOT_EPSILON = 1e-9;

/**
 * In-memory broker for dry runs and tests. Pending limits fill and stops or
 * targets trigger when quotes move through them via setQuote().
 */
export class PaperBroker implements BrokerGateway {
  readonly calls: GatewayCall[] = [];
  private orders = new Map<string, PendingOrderRecord>();
  private positions = new Map<string, BrokerPosition>();
  private deals: Array<{ deal: Deal; tag: string }> = [];
  private quotes = new Map<string, Quote>();
  private specs = new Map<string, SymbolSpec>();
  private faults = new Map<GatewayMethod, Fault[]>();
  private serverTime: Date;
  private balance: number;
  private expiresOrders: boolean;
  private seq = 0;

  constructor(options: PaperBrokerOptions) {
    this.serverTime = options.serverTime;
    this.balance = options.balance ?? 10_000;
    this.expiresOrders = options.expiresOrders ?? true;
    for (const [symbol, { spec, bid, ask }] of Object.entries(options.symbols)) {
      this.specs.set(symbol, spec);
      this.quotes.set(symbol, { bid, ask, time: this.serverTime.toISOString() });
    }
  }

  // --- simulation controls ---

  setServerTime(time: Date): void {
    this.serverTime = time;
    if (!this.expiresOrders) return;
    for (const order of [...this.orders.values()]) {
      if (order.validUntil !== null && time.getTime() >= Date.parse(order.validUntil)) {
        this.orders.delete(order.ticket);
        log.info({ action: "orderExpired", ticket: order.ticket }, "Paper: pending order expired");
      }
    }
  }

  /** Moves the market; fills limits and triggers stops and targets that the new quote reaches. */
  setQuote(symbol: string, bid: number, ask: number): void {
    this.quotes.set(symbol, { bid, ask, time: this.serverTime.toISOString() });
    for (const order of [...this.orders.values()]) {
      if (order.symbol !== symbol) continue;
      const fills = order.direction === "long" ? ask <= order.entryPrice : bid >= order.entryPrice;
      if (fills) this.fill(order);
    }
    for (const position of [...this.positions.values()]) {
      if (position.symbol !== symbol) continue;
      const exit = position.direction === "long" ? bid : ask;
      if (position.stopLoss > 0 && crossed(position.direction, exit, position.stopLoss, "adverse")) {
        this.settle(position, position.volume, position.stopLoss, "exit");
      } else if (position.takeProfit > 0 && crossed(position.direction, exit, position.takeProfit, "favourable")) {
        this.settle(position, position.volume, position.takeProfit, "exit");
      }
    }
  }

  /** Queues a failure for the next call of `method`. */
  failNext(method: GatewayMethod, error: Error, options: { applyAnyway?: boolean } = {}): void {
    const queue = this.faults.get(method) ?? [];
    queue.push({ error, applyAnyway: options.applyAnyway ?? false });
    this.faults.set(method, queue);
  }

  callsTo(method: GatewayMethod): GatewayCall[] {
    return this.calls.filter((c) => c.method === method);
  }

  /** Seeds an open position directly, as if filled outside the engine. */
  openPosition(input: Omit<BrokerPosition, "positionId" | "openedAt" | "orderTicket"> & { orderTicket?: string | null }): BrokerPosition {
    const position: BrokerPosition = {
      ...input,
      positionId: `P${++this.seq}`,
      openedAt: this.serverTime.toISOString(),
      orderTicket: input.orderTicket ?? null,
    };
    this.positions.set(position.positionId, position);
    this.recordDeal(position, position.volume, position.openPrice, "entry", 0);
    return position;
  }

  /** Seeds a resting pending order, as if placed outside the engine. */
  addPendingOrder(input: Omit<PendingOrderRecord, "ticket" | "placedAt">): PendingOrderRecord {
    const order: PendingOrderRecord = { ...input, ticket: `T${++this.seq}`, placedAt: this.serverTime.toISOString() };
    this.orders.set(order.ticket, order);
    return order;
  }

  /** Closes at the current exit-side price, as a manual close or broker stop-out would. */
  closeExternally(positionId: string): void {
    const position = this.positions.get(positionId);
    if (!position) return;
    this.settle(position, position.volume, this.exitPrice(position), "exit");
  }

  // --- BrokerGateway ---

  async listPendingOrders(tag: string): Promise<PendingOrderRecord[]> {
    return this.call("listPendingOrders", [tag], () =>
      [...this.orders.values()].filter((o) => o.tag === tag).map((o) => ({ ...o })));
  }

  async listOpenPositions(tag: string): Promise<BrokerPosition[]> {
    return this.call("listOpenPositions", [tag], () =>
      [...this.positions.values()].filter((p) => p.tag === tag).map((p) => ({ ...p })));
  }

  async listDealsSince(since: string, tag: string): Promise<Deal[]> {
    return this.call("listDealsSince", [since, tag], () =>
      this.deals.filter((d) => d.tag === tag && d.deal.time >= since).map((d) => ({ ...d.deal })));
  }

  async getQuote(symbol: string): Promise<Quote> {
    return this.call("getQuote", [symbol], () => ({ ...this.quoteOf(symbol) }));
  }

  async getServerTime(): Promise<Date> {
    return this.call("getServerTime", [], () => new Date(this.serverTime.getTime()));
  }

  async getSymbolSpec(symbol: string): Promise<SymbolSpec> {
    return this.call("getSymbolSpec", [symbol], () => ({ ...this.specOf(symbol) }));
  }

  async getAccountBalance(): Promise<number> {
    return this.call("getAccountBalance", [], () => this.balance);
  }

  async sendPendingLimit(setup: Setup, volume: number, tag: string): Promise<string> {
    return this.call("sendPendingLimit", [setup, volume, tag], () => {
      const quote = this.quoteOf(setup.symbol);
      const spec = this.specOf(setup.symbol);
      if (volume + LOT_EPSILON < spec.volumeMin || volume > spec.volumeMax + LOT_EPSILON) {
        throw new BrokerRejectedError(`invalid volume ${volume}`);
      }
      const valid = setup.direction === "long" ? setup.entryPrice < quote.ask : setup.entryPrice > quote.bid;
      if (!valid) throw new BrokerRejectedError(`invalid price ${setup.entryPrice}`);

      const order: PendingOrderRecord = {
        ticket: `T${++this.seq}`,
        symbol: setup.symbol,
        direction: setup.direction,
        entryPrice: setup.entryPrice,
        stopLoss: setup.stopLoss,
        takeProfit: setup.takeProfit,
        volume,
        tag,
        placedAt: this.serverTime.toISOString(),
        validUntil: setup.validUntil,
      };
      this.orders.set(order.ticket, order);
      return order.ticket;
    });
  }

  async modifyPosition(positionId: string, changes: PositionModification): Promise<void> {
    return this.call("modifyPosition", [positionId, changes], () => {
      const position = this.positionOf(positionId);
      const next = {
        stopLoss: changes.stopLoss ?? position.stopLoss,
        takeProfit: changes.takeProfit ?? position.takeProfit,
      };
      const exit = this.exitPrice(position);
      if (next.stopLoss > 0 && crossed(position.direction, exit, next.stopLoss, "adverse")) {
        throw new BrokerRejectedError(`invalid stops: stop ${next.stopLoss} against market ${exit}`);
      }
      if (next.takeProfit > 0 && crossed(position.direction, exit, next.takeProfit, "favourable")) {
        throw new BrokerRejectedError(`invalid stops: target ${next.takeProfit} against market ${exit}`);
      }
      this.positions.set(positionId, { ...position, ...next });
    });
  }

  async closePartial(positionId: string, volume: number): Promise<void> {
    return this.call("closePartial", [positionId, volume], () => {
      const position = this.positionOf(positionId);
      const spec = this.specOf(position.symbol);
      if (volume <= 0 || volume > position.volume + LOT_EPSILON) {
        throw new BrokerRejectedError(`invalid volume ${volume} for position of ${position.volume}`);
      }
      const full = Math.abs(volume - position.volume) < LOT_EPSILON;
      this.settle(position, full ? position.volume : roundToStep(volume, spec.volumeStep), this.exitPrice(position), full ? "exit" : "partial");
    });
  }

  async cancelOrder(ticket: string): Promise<void> {
    return this.call("cancelOrder", [ticket], () => {
      if (!this.orders.delete(ticket)) throw new BrokerRejectedError(`order ${ticket} not found`);
    });
  }

  // --- internals ---

  private async call<T>(method: GatewayMethod, args: unknown[], effect: () => T): Promise<T> {
    this.calls.push({ method, args });
    const fault = this.faults.get(method)?.shift();
    if (fault) {
      if (fault.applyAnyway) effect();
      throw fault.error;
    }
    return effect();
  }

  private fill(order: PendingOrderRecord): void {
    this.orders.delete(order.ticket);
    const position: BrokerPosition = {
      positionId: `P${++this.seq}`,
      symbol: order.symbol,
      direction: order.direction,
      openPrice: order.entryPrice,
      volume: order.volume,
      stopLoss: order.stopLoss,
      takeProfit: order.takeProfit,
      openedAt: this.serverTime.toISOString(),
      orderTicket: order.ticket,
      tag: order.tag,
    };
    this.positions.set(position.positionId, position);
    this.recordDeal(position, position.volume, position.openPrice, "entry", 0);
    log.info({ action: "orderFilled", ticket: order.ticket, positionId: position.positionId }, "Paper: limit filled");
  }

  private settle(position: BrokerPosition, volume: number, price: number, type: DealType): void {
    const spec = this.specOf(position.symbol);
    const sign = position.direction === "long" ? 1 : -1;
    const profit = Number(((price - position.openPrice) * sign * volume * (spec.tickValue / spec.tickSize)).toFixed(2));
    this.balance += profit;
    this.recordDeal(position, volume, price, type, profit);

    const remaining = roundToStep(position.volume - volume, spec.volumeStep);
    if (type === "exit" || remaining <= 0) {
      this.positions.delete(position.positionId);
    } else {
      this.positions.set(position.positionId, { ...position, volume: remaining });
    }
  }

  private recordDeal(position: BrokerPosition, volume: number, price: number, type: DealType, profit: number): void {
    const deal: Deal = {
      dealId: `D${++this.seq}`,
      positionId: position.positionId,
      symbol: position.symbol,
      volume,
      price,
      time: this.serverTime.toISOString(),
      type,
      orderTicket: type === "entry" ? position.orderTicket : null,
      profit,
    };
    this.deals.push({ deal, tag: position.tag });
  }

  private exitPrice(position: BrokerPosition): number {
    const quote = this.quoteOf(position.symbol);
    return position.direction === "long" ? quote.bid : quote.ask;
  }

  private quoteOf(symbol: string): Quote {
    const quote = this.quotes.get(symbol);
    if (!quote) throw new BrokerRejectedError(`unknown symbol ${symbol}`);
    return quote;
  }

  private specOf(symbol: string): SymbolSpec {
    const spec = this.specs.get(symbol);
    if (!spec) throw new BrokerRejectedError(`unknown symbol ${symbol}`);
    return spec;
  }

  private positionOf(positionId: string): BrokerPosition {
    const position = this.positions.get(positionId);
    if (!position) throw new BrokerRejectedError(`position ${positionId} not found`);
    return position;
  }
}

function crossed(direction: Direction, exit: number, level: number, side: "adverse" | "favourable"): boolean {
  const upward = (direction === "long") === (side === "favourable");
  return upward ? exit >= level : exit <= level;
}
