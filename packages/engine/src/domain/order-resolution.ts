import type { BrokerPosition, Deal, PendingOrderRecord } from "../types/broker.js";

export type PendingResolution =
  | { status: "filled"; position: BrokerPosition | null; deal: Deal | null }
  | { status: "expired" }
  | { status: "cancelled" }
  | { status: "unresolved" };

interface ResolutionContext {
  positions: readonly BrokerPosition[];
  /** null when the deal fetch failed this pass */
  deals: readonly Deal[] | null;
  serverTime: Date;
}

/**
 * Decides what became of a pending order the broker stopped listing.
 * Without deal history a vanished order with no matching position stays unresolved,
 * so a fill is never mistaken for a cancellation.
 */
export function resolvePendingOrder(order: PendingOrderRecord, ctx: ResolutionContext): PendingResolution {
  const position = ctx.positions.find((p) => p.orderTicket === order.ticket) ?? null;
  const deal = ctx.deals?.find((d) => d.type === "entry" && d.orderTicket === order.ticket) ?? null;
  if (position !== null || deal !== null) {
    return { status: "filled", position, deal };
  }
  if (ctx.deals === null) return { status: "unresolved" };
  return isPastExpiry(order, ctx.serverTime) ? { status: "expired" } : { status: "cancelled" };
}

/** A listed order past its validity that the broker has not removed on its own. */
export function isPastExpiry(order: PendingOrderRecord, serverTime: Date): boolean {
  return order.validUntil !== null && serverTime.getTime() >= Date.parse(order.validUntil);
}
