import type { Direction } from "./broker.js";

/** A trade decision from the pattern layer. Consumed once by the order placer. */
export interface Setup {
  symbol: string;
  direction: Direction;
  entryPrice: number;
  stopLoss: number;
  takeProfit: number;
  /** Reward-to-risk multiple estimated by the pattern layer */
  estimatedR: number;
  /** ISO time after which the pending order must no longer fill; null = good till cancelled */
  validUntil: string | null;
}

export interface SetupProvider {
  /** Zero or one setup for the symbol's trading day (`dayKey` is YYYY-MM-DD in broker server time). */
  getSetup(symbol: string, dayKey: string): Promise<Setup | null>;
}
