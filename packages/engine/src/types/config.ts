import { z } from "zod";

export const RetrySchema = z.object({
  attempts: z.number().int().positive(),
  delayMs: z.number().int().nonnegative(),
});

export const PartialRulesSchema = z.object({
  // 3R trigger and 50% close are fixed in this version
  triggerR: z.literal(3).default(3),
  closeFraction: z.literal(0.5).default(0.5),
  // How far below triggerR the partial may fire, so the poll catches price before the broker's 3R take-profit does
  earlyTriggerR: z.number().nonnegative().max(0.5).default(0.05),
});

export const PaperBrokerSchema = z.object({
  balance: z.number().positive().default(10_000),
  /** Opening bid/ask per symbol; every configured symbol needs one in paper mode */
  quotes: z.record(z.object({ bid: z.number().positive(), ask: z.number().positive() })).default({}),
});

export const TradingModeSchema = z.enum(["conservative", "aggressive"]);

export const EngineConfigSchema = z.object({
  mode: TradingModeSchema.default("conservative"),
  tag: z.string().min(1),
  symbols: z.array(z.string().min(1)).min(1),
  broker: z.enum(["paper", "bridge"]).default("paper"),
  paper: PaperBrokerSchema.default({}),
  stateDir: z.string().min(1).default("data"),
  intervalMs: z.number().int().positive().default(30_000),
  weekendIntervalMs: z.number().int().positive().default(300_000),
  callTimeoutMs: z.number().int().positive().default(10_000),
  placement: RetrySchema.default({ attempts: 5, delayMs: 2_000 }),
  modification: RetrySchema.default({ attempts: 2, delayMs: 1_000 }),
  partial: PartialRulesSchema.default({}),
  adjustBuyLimitForSpread: z.boolean().default(true),
  adjustSellLimitForSpread: z.boolean().default(false),
  cancelUnfilledAtExpiry: z.boolean().default(true),
  duplicateTolerancePoints: z.number().int().nonnegative().default(10),
  riskPerTradePct: z.number().positive().max(5).default(0.5),
  dealLookbackHours: z.number().positive().default(12),
  logLevels: z.record(z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])).default({}),
});

export type RetryPolicy = z.infer<typeof RetrySchema>;
export type PartialRules = z.infer<typeof PartialRulesSchema>;
export type PaperBrokerConfig = z.infer<typeof PaperBrokerSchema>;
export type TradingMode = z.infer<typeof TradingModeSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
