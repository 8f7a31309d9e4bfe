import { isSanePrice, isSaneVolume } from "@ratchet/kit";
import type { Quote } from "../types/broker.js";
import type { Setup } from "../types/setup.js";
import { InvalidSetupError } from "./errors.js";
import { normalizePrice } from "./price.js";

export interface SpreadAdjustment {
  adjustBuyLimitForSpread: boolean;
  adjustSellLimitForSpread: boolean;
}

/**
 * Shifts the entry by the live spread: up for a buy limit (fills on the ask),
 * down for a sell limit when enabled.
 */
export function adjustEntryForSpread(setup: Setup, quote: Quote, options: SpreadAdjustment): Setup {
  const spread = quote.ask - quote.bid;
  if (!(spread > 0)) return setup;
  if (setup.direction === "long" && options.adjustBuyLimitForSpread) {
    return { ...setup, entryPrice: normalizePrice(setup.entryPrice + spread) };
  }
  if (setup.direction === "short" && options.adjustSellLimitForSpread) {
    return { ...setup, entryPrice: normalizePrice(setup.entryPrice - spread) };
  }
  return setup;
}

/** Throws InvalidSetupError for anything the broker would reject or that would trade through the market. */
export function validateSetup(setup: Setup, quote: Quote, volume: number): void {
  const { symbol, direction, entryPrice, stopLoss, takeProfit } = setup;

  if (!isSanePrice(entryPrice)) throw new InvalidSetupError(symbol, `entry price ${entryPrice}`);
  if (!isSanePrice(stopLoss)) throw new InvalidSetupError(symbol, `stop loss ${stopLoss}`);
  if (!isSanePrice(takeProfit)) throw new InvalidSetupError(symbol, `take profit ${takeProfit}`);
  if (!isSaneVolume(volume)) throw new InvalidSetupError(symbol, `volume ${volume}`);
  if (!isSanePrice(quote.bid) || !isSanePrice(quote.ask)) {
    throw new InvalidSetupError(symbol, `no usable quote (bid ${quote.bid}, ask ${quote.ask})`);
  }

  if (direction === "long") {
    if (entryPrice >= quote.ask) throw new InvalidSetupError(symbol, `buy limit ${entryPrice} not below ask ${quote.ask}`);
    if (stopLoss >= entryPrice) throw new InvalidSetupError(symbol, `stop ${stopLoss} not below entry ${entryPrice}`);
    if (takeProfit <= entryPrice) throw new InvalidSetupError(symbol, `target ${takeProfit} not above entry ${entryPrice}`);
  } else {
    if (entryPrice <= quote.bid) throw new InvalidSetupError(symbol, `sell limit ${entryPrice} not above bid ${quote.bid}`);
    if (stopLoss <= entryPrice) throw new InvalidSetupError(symbol, `stop ${stopLoss} not above entry ${entryPrice}`);
    if (takeProfit >= entryPrice) throw new InvalidSetupError(symbol, `target ${takeProfit} not below entry ${entryPrice}`);
  }
}
