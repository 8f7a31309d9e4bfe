import type { Deal } from "../types/broker.js";

/** Watermark of the last deal poll: the newest deal time seen and every deal id at that instant. */
export interface DealCursor {
  time: string;
  dealIds: string[];
}

/** Deals not yet seen, oldest first. Ties at the watermark are split by id. */
export function filterNewDeals(deals: readonly Deal[], cursor: DealCursor | null): Deal[] {
  const sorted = [...deals].sort((a, b) => a.time.localeCompare(b.time) || a.dealId.localeCompare(b.dealId));
  const seen = new Set<string>();
  const fresh: Deal[] = [];
  for (const deal of sorted) {
    if (seen.has(deal.dealId)) continue;
    seen.add(deal.dealId);
    if (cursor !== null) {
      if (deal.time < cursor.time) continue;
      if (deal.time === cursor.time && cursor.dealIds.includes(deal.dealId)) continue;
    }
    fresh.push(deal);
  }
  return fresh;
}

export function advanceCursor(cursor: DealCursor | null, deals: readonly Deal[]): DealCursor | null {
  let next = cursor;
  for (const deal of deals) {
    if (next === null || deal.time > next.time) {
      next = { time: deal.time, dealIds: [deal.dealId] };
    } else if (deal.time === next.time && !next.dealIds.includes(deal.dealId)) {
      next = { time: next.time, dealIds: [...next.dealIds, deal.dealId] };
    }
  }
  return next;
}
