import type { Direction } from "../types/broker.js";

/** Strips binary float residue (1.1 + 0.015 → 1.115); broker prices never carry more than 8 decimals. */
export function normalizePrice(value: number): number {
  return Number(value.toFixed(8));
}

/** Price `r` risk units away from `openPrice` in the position's favour. */
export function priceAtR(direction: Direction, openPrice: number, riskDistance: number, r: number): number {
  const offset = riskDistance * r;
  return normalizePrice(direction === "long" ? openPrice + offset : openPrice - offset);
}

/** Side of the book a position would close against: bid for longs, ask for shorts. */
export function exitSidePrice(direction: Direction, quote: { bid: number; ask: number }): number {
  return direction === "long" ? quote.bid : quote.ask;
}
