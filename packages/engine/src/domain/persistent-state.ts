import { z } from "zod";
import type { TrackedPosition } from "./tracked-position.js";
import type { DealCursor } from "./deal-cursor.js";
import type { PendingOrderRecord } from "../types/broker.js";

export const STATE_VERSION = 1;

const DirectionSchema = z.enum(["long", "short"]);

export const PendingOrderSchema = z.object({
  ticket: z.string(),
  symbol: z.string(),
  direction: DirectionSchema,
  entryPrice: z.number(),
  stopLoss: z.number(),
  takeProfit: z.number(),
  volume: z.number(),
  tag: z.string(),
  placedAt: z.string(),
  validUntil: z.string().nullable(),
}) satisfies z.ZodType<PendingOrderRecord>;

const TrackedPositionSchema = z.object({
  positionId: z.string(),
  symbol: z.string(),
  direction: DirectionSchema,
  openPrice: z.number(),
  volume: z.number(),
  originalVolume: z.number(),
  stopLossAtOpen: z.number(),
  originalTakeProfit: z.number(),
  riskDistance: z.number(),
  thresholdPrice: z.number(),
  phase: z.enum(["OPENED", "TP_COMPRESSED", "PARTIAL_TAKEN", "CLOSED"]),
  openedAt: z.string(),
  protectionApplied: z.boolean(),
  lastDeferral: z.string().nullable(),
  realizedProfit: z.number().default(0),
}) satisfies z.ZodType<TrackedPosition, z.ZodTypeDef, unknown>;

const DealCursorSchema = z.object({
  time: z.string(),
  dealIds: z.array(z.string()),
}) satisfies z.ZodType<DealCursor>;

const SymbolStateSchema = z.object({
  lastSeenDayStart: z.string().nullable(),
  /** Trading day an order was placed for, so a restart never places twice */
  placedForDay: z.string().nullable(),
});

export const PersistentStateSchema = z.object({
  version: z.literal(STATE_VERSION),
  symbols: z.record(SymbolStateSchema),
  lastDealPollCursor: DealCursorSchema.nullable(),
  lastWeekendNoticeDate: z.string().nullable(),
  pendingOrders: z.record(PendingOrderSchema),
  positions: z.record(TrackedPositionSchema),
  /** Positions whose partial close is known done, kept until the position closes */
  completedPartials: z.array(z.string()),
});

export type SymbolState = z.infer<typeof SymbolStateSchema>;
export type PersistentState = z.infer<typeof PersistentStateSchema>;

export function emptyState(): PersistentState {
  return {
    version: STATE_VERSION,
    symbols: {},
    lastDealPollCursor: null,
    lastWeekendNoticeDate: null,
    pendingOrders: {},
    positions: {},
    completedPartials: [],
  };
}

export function symbolState(state: PersistentState, symbol: string): SymbolState {
  return state.symbols[symbol] ?? { lastSeenDayStart: null, placedForDay: null };
}

/**
 * Trackers read back from disk. A position recorded as partially closed is
 * never re-armed: it is lifted to PARTIAL_TAKEN if the record lags behind.
 */
export function rebuildTrackers(state: PersistentState): Map<string, TrackedPosition> {
  const completed = new Set(state.completedPartials);
  const trackers = new Map<string, TrackedPosition>();
  for (const [id, position] of Object.entries(state.positions)) {
    if (position.phase === "CLOSED") continue;
    if (completed.has(id) && position.phase !== "PARTIAL_TAKEN") {
      trackers.set(id, { ...position, phase: "PARTIAL_TAKEN" });
    } else {
      trackers.set(id, position);
    }
  }
  return trackers;
}
