import got, { HTTPError, RequestError, type Got } from "got";
import { z } from "zod";
import type {
  BrokerGateway,
  BrokerPosition,
  Deal,
  PendingOrderRecord,
  PositionModification,
  Quote,
  SymbolSpec,
} from "../types/broker.js";
import type { Setup } from "../types/setup.js";
import { BrokerRejectedError, TransientGatewayError } from "../domain/errors.js";
import { PendingOrderSchema } from "../domain/persistent-state.js";
import { logger } from "../lib/logger.js";

const log = logger.createChild("bridgeGateway");

const DirectionSchema = z.enum(["long", "short"]);

const PositionSchema = z.object({
  positionId: z.string(),
  symbol: z.string(),
  direction: DirectionSchema,
  openPrice: z.number(),
  volume: z.number(),
  stopLoss: z.number(),
  takeProfit: z.number(),
  openedAt: z.string(),
  orderTicket: z.string().nullable(),
  tag: z.string(),
}) satisfies z.ZodType<BrokerPosition>;

const DealSchema = z.object({
  dealId: z.string(),
  positionId: z.string(),
  symbol: z.string(),
  volume: z.number(),
  price: z.number(),
  time: z.string(),
  type: z.enum(["entry", "exit", "partial"]),
  orderTicket: z.string().nullable(),
  profit: z.number(),
}) satisfies z.ZodType<Deal>;

const QuoteSchema = z.object({ bid: z.number(), ask: z.number(), time: z.string() });

const SymbolSpecSchema = z.object({
  volumeMin: z.number(),
  volumeStep: z.number(),
  volumeMax: z.number(),
  point: z.number(),
  tickSize: z.number(),
  tickValue: z.number(),
});

const ServerTimeSchema = z.object({ serverTime: z.string().datetime() });
const BalanceSchema = z.object({ balance: z.number() });
const TicketSchema = z.object({ ticket: z.string() });
const BridgeErrorSchema = z.object({ error: z.string() });

export type HttpMethod = "GET" | "POST" | "DELETE";

export interface BridgeRequest {
  searchParams?: Record<string, string>;
  json?: Record<string, unknown>;
}

/** Sends one JSON request to the terminal bridge and returns the decoded body. */
export interface BridgeTransport {
  request(method: HttpMethod, path: string, options?: BridgeRequest): Promise<unknown>;
}

function describeFailure(err: unknown): Record<string, unknown> {
  if (!(err instanceof RequestError)) return { err };
  return {
    err,
    endpoint: err.options.url?.toString(),
    method: err.options.method,
    statusCode: err.response?.statusCode,
    code: err.code,
  };
}

function bridgeMessage(body: unknown): string | null {
  if (typeof body !== "string" || body === "") return null;
  try {
    const parsed = BridgeErrorSchema.safeParse(JSON.parse(body));
    return parsed.success ? parsed.data.error : body.slice(0, 200);
  } catch {
    return body.slice(0, 200);
  }
}

export interface GotTransportOptions {
  baseUrl: string;
  token: string;
  timeoutMs: number;
}

/**
 * got-backed transport. Retries are left to the engine's own policies, so got
 * never retries; 4xx answers become BrokerRejectedError and everything else
 * TransientGatewayError.
 */
export function createGotTransport(options: GotTransportOptions): BridgeTransport {
  const http: Got = got.extend({
    prefixUrl: options.baseUrl,
    headers: { authorization: `Bearer ${options.token}` },
    timeout: { request: options.timeoutMs },
    retry: { limit: 0 },
  });

  return {
    async request(method, path, request = {}) {
      try {
        const response = await http(path, {
          method,
          searchParams: request.searchParams,
          json: request.json,
        });
        return response.body === "" ? null : JSON.parse(response.body);
      } catch (err) {
        log.warn({ action: "bridgeRequestFailed", ...describeFailure(err) }, "Bridge request failed");
        if (err instanceof HTTPError) {
          const message = bridgeMessage(err.response.body) ?? err.message;
          if (err.response.statusCode >= 400 && err.response.statusCode < 500 && err.response.statusCode !== 429) {
            throw new BrokerRejectedError(message, { cause: err });
          }
          throw new TransientGatewayError(message, { cause: err });
        }
        if (err instanceof RequestError) {
          throw new TransientGatewayError(err.message, { cause: err });
        }
        throw err;
      }
    },
  };
}

/** BrokerGateway over the terminal bridge's JSON API. Replies are validated before use. */
export class BridgeGateway implements BrokerGateway {
  private transport: BridgeTransport;

  constructor(transport: BridgeTransport) {
    this.transport = transport;
  }

  async listPendingOrders(tag: string): Promise<PendingOrderRecord[]> {
    return z.array(PendingOrderSchema).parse(await this.transport.request("GET", "orders", { searchParams: { tag } }));
  }

  async listOpenPositions(tag: string): Promise<BrokerPosition[]> {
    return z.array(PositionSchema).parse(await this.transport.request("GET", "positions", { searchParams: { tag } }));
  }

  async listDealsSince(since: string, tag: string): Promise<Deal[]> {
    return z.array(DealSchema).parse(await this.transport.request("GET", "deals", { searchParams: { since, tag } }));
  }

  async getQuote(symbol: string): Promise<Quote> {
    return QuoteSchema.parse(await this.transport.request("GET", `symbols/${encodeURIComponent(symbol)}/quote`));
  }

  async getServerTime(): Promise<Date> {
    const { serverTime } = ServerTimeSchema.parse(await this.transport.request("GET", "time"));
    return new Date(serverTime);
  }

  async getSymbolSpec(symbol: string): Promise<SymbolSpec> {
    return SymbolSpecSchema.parse(await this.transport.request("GET", `symbols/${encodeURIComponent(symbol)}`));
  }

  async getAccountBalance(): Promise<number> {
    return BalanceSchema.parse(await this.transport.request("GET", "account")).balance;
  }

  async sendPendingLimit(setup: Setup, volume: number, tag: string): Promise<string> {
    const reply = await this.transport.request("POST", "orders", {
      json: {
        symbol: setup.symbol,
        direction: setup.direction,
        entryPrice: setup.entryPrice,
        stopLoss: setup.stopLoss,
        takeProfit: setup.takeProfit,
        validUntil: setup.validUntil,
        volume,
        tag,
      },
    });
    return TicketSchema.parse(reply).ticket;
  }

  async modifyPosition(positionId: string, changes: PositionModification): Promise<void> {
    await this.transport.request("POST", `positions/${encodeURIComponent(positionId)}/modify`, { json: { ...changes } });
  }

  async closePartial(positionId: string, volume: number): Promise<void> {
    await this.transport.request("POST", `positions/${encodeURIComponent(positionId)}/close`, { json: { volume } });
  }

  async cancelOrder(ticket: string): Promise<void> {
    await this.transport.request("DELETE", `orders/${encodeURIComponent(ticket)}`);
  }
}
