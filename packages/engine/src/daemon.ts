import { readFileSync } from "node:fs";
import { join, dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { isMainModule } from "@ratchet/kit";
import { EngineConfigSchema, type EngineConfig, type PaperBrokerConfig } from "./types/config.js";
import type { BrokerGateway } from "./types/broker.js";
import { loadBridgeEnv } from "./lib/load-env.js";
import { logger } from "./lib/logger.js";
import { EventLog, createEmitter, type Emit } from "./adapters/event-log.js";
import { StateStore } from "./adapters/state-store.js";
import { PaperBroker, type PaperSymbol } from "./adapters/paper-broker.js";
import { BridgeGateway, createGotTransport } from "./adapters/bridge-gateway.js";
import { TimedGateway } from "./adapters/timed-gateway.js";
import { FileSetupProvider } from "./adapters/file-setup-provider.js";
import { rebuildTrackers } from "./domain/persistent-state.js";
import { StateHolder } from "./application/state-holder.js";
import { OrderPlacer } from "./application/order-placer.js";
import { SetupScheduler } from "./application/setup-scheduler.js";
import { ReconcileLoop } from "./application/reconcile-loop.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const log = logger.createChild("daemon");

// 5-digit FX defaults for paper trading
const PAPER_SPEC = { volumeMin: 0.01, volumeStep: 0.01, volumeMax: 100, point: 0.00001, tickSize: 0.00001, tickValue: 1 };

export function loadConfig(configPath: string): EngineConfig {
  const raw: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
  return EngineConfigSchema.parse(raw);
}

/** Paper symbols for `symbols`, opened at their configured quotes. */
export function paperSymbols(paper: PaperBrokerConfig, symbols: string[]): Record<string, PaperSymbol> {
  return Object.fromEntries(symbols.map((symbol) => {
    const quote = paper.quotes[symbol];
    if (!quote) throw new Error(`paper broker needs an opening quote for ${symbol} (paper.quotes)`);
    return [symbol, { spec: PAPER_SPEC, bid: quote.bid, ask: quote.ask }];
  }));
}

function createGateway(config: EngineConfig): BrokerGateway {
  if (config.broker === "bridge") {
    const env = loadBridgeEnv();
    return new BridgeGateway(createGotTransport({ baseUrl: env.BRIDGE_URL, token: env.BRIDGE_TOKEN, timeoutMs: config.callTimeoutMs }));
  }

  return new PaperBroker({
    symbols: paperSymbols(config.paper, config.symbols),
    serverTime: new Date(),
    balance: config.paper.balance,
  });
}

async function loadState(store: StateStore, emit: Emit) {
  const outcome = store.load();
  if (outcome.kind === "quarantined") {
    await emit("state_inconsistency", { reason: "state_file_unreadable", movedTo: outcome.movedTo, detail: outcome.reason });
  }
  const positions = Object.fromEntries(rebuildTrackers(outcome.state));
  return { ...outcome.state, positions };
}

async function main(): Promise<void> {
  const configPath = process.env.RATCHET_CONFIG ?? join(__dirname, "../engine-config.json");
  const config = loadConfig(configPath);
  logger.setLogConfig(config.logLevels);

  const stateDir = resolve(config.stateDir);
  const emit = createEmitter(new EventLog(join(stateDir, "events.jsonl")));
  const store = new StateStore(stateDir);
  const holder = new StateHolder(store, await loadState(store, emit));

  const gateway = new TimedGateway(createGateway(config), config.callTimeoutMs);
  const placer = new OrderPlacer({ gateway, config, emit });
  const scheduler = new SetupScheduler({
    gateway,
    config,
    emit,
    holder,
    placer,
    provider: new FileSetupProvider(join(stateDir, "setups")),
  });
  const loop = new ReconcileLoop({
    holder,
    gateway,
    config,
    emit,
    onNewDay: (symbol, dayKey) => scheduler.enqueue(symbol, dayKey),
    onCycle: (report) => scheduler.retryDeferred(report),
    onGatewayDown: () => {
      log.error({ action: "gatewayDown", broker: config.broker }, "Broker unreachable, still retrying");
    },
  });

  log.info({ action: "startup", mode: config.mode, tag: config.tag, symbols: config.symbols, broker: config.broker, stateDir }, "Engine starting");
  await emit("engine_started", { mode: config.mode, tag: config.tag, symbols: config.symbols, broker: config.broker });
  const loopDone = loop.start();

  // Graceful shutdown
  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, "Shutting down...");
    await loop.stop();
    await scheduler.idle();
    await holder.idle();
    await emit("engine_stopped", { signal });
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.error(err, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));

  await loopDone;
}

if (isMainModule(import.meta.url)) {
  main().catch((err) => {
    logger.error(err, "Fatal error");
    process.exit(1);
  });
}
