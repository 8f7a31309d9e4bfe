import type { BrokerGateway, PendingOrderRecord, Quote } from "../types/broker.js";
import type { EngineConfig } from "../types/config.js";
import type { Setup } from "../types/setup.js";
import type { Emit } from "../adapters/event-log.js";
import { InvalidSetupError, PlacementFailedError } from "../domain/errors.js";
import { adjustEntryForSpread, validateSetup } from "../domain/validate-setup.js";
import { errorMessage } from "../lib/classify-gateway-error.js";
import { withFixedRetry } from "../lib/with-retry.js";
import { logger } from "../lib/logger.js";

const log = logger.createChild("orderPlacer");

export interface OrderPlacerDeps {
  gateway: BrokerGateway;
  config: Pick<EngineConfig, "tag" | "placement" | "adjustBuyLimitForSpread" | "adjustSellLimitForSpread">;
  emit: Emit;
}

/** A setup with its entry shifted for the live spread, and the quote it was shifted against. */
export interface PreparedOrder {
  setup: Setup;
  quote: Quote;
}

export class OrderPlacer {
  private deps: OrderPlacerDeps;

  constructor(deps: OrderPlacerDeps) {
    this.deps = deps;
  }

  async prepare(setup: Setup): Promise<PreparedOrder> {
    const { gateway, config } = this.deps;
    const quote = await withFixedRetry(() => gateway.getQuote(setup.symbol), {
      ...config.placement,
      onFailedAttempt: ({ attempt, retriesLeft, error }) => {
        log.warn({ action: "quoteRetry", symbol: setup.symbol, attempt, retriesLeft, err: error }, "Quote fetch failed, retrying");
      },
    });
    return { setup: adjustEntryForSpread(setup, quote, this.deps.config), quote };
  }

  /**
   * Validates and sends the pending limit, retrying transient failures.
   * Throws InvalidSetupError before anything is sent, or PlacementFailedError
   * once the attempts are spent.
   */
  async submit(prepared: PreparedOrder, volume: number, placedAt: Date): Promise<PendingOrderRecord> {
    const { gateway, config, emit } = this.deps;
    const { setup, quote } = prepared;

    try {
      validateSetup(setup, quote, volume);
    } catch (err) {
      if (err instanceof InvalidSetupError) {
        log.warn({ action: "orderInvalid", symbol: setup.symbol, reason: err.reason }, "Setup rejected before sending");
        await emit("order_invalid", { symbol: setup.symbol, reason: err.reason, entryPrice: setup.entryPrice, bid: quote.bid, ask: quote.ask });
      }
      throw err;
    }

    let attempts = 0;
    try {
      const ticket = await withFixedRetry(async (attempt) => {
        attempts = attempt;
        await emit("order_placement_attempt", { symbol: setup.symbol, attempt, direction: setup.direction, entryPrice: setup.entryPrice, volume });
        try {
          const sent = await gateway.sendPendingLimit(setup, volume, config.tag);
          await emit("order_placement_result", { symbol: setup.symbol, attempt, ok: true, ticket: sent });
          return sent;
        } catch (err) {
          await emit("order_placement_result", { symbol: setup.symbol, attempt, ok: false, error: errorMessage(err) });
          throw err;
        }
      }, {
        ...config.placement,
        onFailedAttempt: ({ attempt, retriesLeft, error }) => {
          log.warn({ action: "placementRetry", symbol: setup.symbol, attempt, retriesLeft, err: error }, "Order send failed, retrying");
        },
      });

      log.info({ action: "orderPlaced", symbol: setup.symbol, ticket, entryPrice: setup.entryPrice, volume }, "Pending limit placed");
      return {
        ticket,
        symbol: setup.symbol,
        direction: setup.direction,
        entryPrice: setup.entryPrice,
        stopLoss: setup.stopLoss,
        takeProfit: setup.takeProfit,
        volume,
        tag: config.tag,
        placedAt: placedAt.toISOString(),
        validUntil: setup.validUntil,
      };
    } catch (err) {
      log.error({ action: "placementFailed", symbol: setup.symbol, attempts, err }, "Order placement failed");
      await emit("order_placement_failed", { symbol: setup.symbol, attempts, error: errorMessage(err) });
      throw new PlacementFailedError(setup.symbol, attempts, err);
    }
  }
}
