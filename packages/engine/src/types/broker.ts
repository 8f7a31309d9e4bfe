import type { Setup } from "./setup.js";

export type Direction = "long" | "short";

export interface Quote {
  bid: number;
  ask: number;
  /** Broker tick time, ISO */
  time: string;
}

export interface PendingOrderRecord {
  ticket: string;
  symbol: string;
  direction: Direction;
  entryPrice: number;
  stopLoss: number;
  takeProfit: number;
  volume: number;
  tag: string;
  placedAt: string;
  validUntil: string | null;
}

export interface BrokerPosition {
  positionId: string;
  symbol: string;
  direction: Direction;
  openPrice: number;
  volume: number;
  /** 0 when the position carries no stop */
  stopLoss: number;
  /** 0 when the position carries no target */
  takeProfit: number;
  openedAt: string;
  /** Ticket of the pending order that opened the position, when the broker reports it */
  orderTicket: string | null;
  tag: string;
}

export type DealType = "entry" | "exit" | "partial";

export interface Deal {
  dealId: string;
  positionId: string;
  symbol: string;
  volume: number;
  price: number;
  time: string;
  type: DealType;
  orderTicket: string | null;
  profit: number;
}

export interface SymbolSpec {
  volumeMin: number;
  volumeStep: number;
  volumeMax: number;
  /** Smallest price increment */
  point: number;
  tickSize: number;
  /** Account-currency value of one tick for one lot */
  tickValue: number;
}

export interface PositionModification {
  stopLoss?: number;
  takeProfit?: number;
}

/**
 * What the engine needs from a broker terminal. Implementations throw on
 * failure; callers classify errors with classifyGatewayError().
 */
export interface BrokerGateway {
  listPendingOrders(tag: string): Promise<PendingOrderRecord[]>;
  listOpenPositions(tag: string): Promise<BrokerPosition[]>;
  /** Deals at or after `since` (ISO) carrying the tag */
  listDealsSince(since: string, tag: string): Promise<Deal[]>;
  getQuote(symbol: string): Promise<Quote>;
  getServerTime(): Promise<Date>;
  getSymbolSpec(symbol: string): Promise<SymbolSpec>;
  getAccountBalance(): Promise<number>;
  /** Returns the broker ticket of the new pending limit order */
  sendPendingLimit(setup: Setup, volume: number, tag: string): Promise<string>;
  modifyPosition(positionId: string, changes: PositionModification): Promise<void>;
  closePartial(positionId: string, volume: number): Promise<void>;
  cancelOrder(ticket: string): Promise<void>;
}
