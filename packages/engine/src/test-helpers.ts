import { EngineConfigSchema, type EngineConfig } from "./types/config.js";
import type { EngineEvent, EventType } from "./types/events.js";
import type { Setup, SetupProvider } from "./types/setup.js";
import type { SymbolSpec } from "./types/broker.js";
import { createEmitter, type EventSink } from "./adapters/event-log.js";
import { PaperBroker, type PaperBrokerOptions } from "./adapters/paper-broker.js";
import { StateStore } from "./adapters/state-store.js";
import { emptyState, type PersistentState } from "./domain/persistent-state.js";
import { StateHolder } from "./application/state-holder.js";
import { OrderPlacer } from "./application/order-placer.js";
import { SetupScheduler } from "./application/setup-scheduler.js";
import { ReconcileLoop } from "./application/reconcile-loop.js";
import type { CycleReport } from "./application/reconcile-cycle.js";

export const FX_SPEC: SymbolSpec = {
  volumeMin: 0.01,
  volumeStep: 0.01,
  volumeMax: 50,
  point: 0.00001,
  tickSize: 0.00001,
  tickValue: 1,
};

/** Monday 2024-03-04 09:00 server time */
export const MONDAY_9AM = new Date("2024-03-04T09:00:00.000Z");

export function buildConfig(overrides: Record<string, unknown> = {}): EngineConfig {
  return EngineConfigSchema.parse({
    tag: "test",
    symbols: ["EURUSD"],
    placement: { attempts: 3, delayMs: 0 },
    modification: { attempts: 2, delayMs: 0 },
    adjustBuyLimitForSpread: false,
    ...overrides,
  });
}

export class MemoryEventSink implements EventSink {
  readonly events: EngineEvent[] = [];

  async append(event: EngineEvent): Promise<void> {
    this.events.push(event);
  }

  types(): EventType[] {
    return this.events.map((e) => e.type);
  }

  ofType(type: EventType): EngineEvent[] {
    return this.events.filter((e) => e.type === type);
  }
}

export class StaticSetupProvider implements SetupProvider {
  readonly requests: Array<{ symbol: string; dayKey: string }> = [];
  private setups = new Map<string, Setup>();

  constructor(setups: Setup[] = []) {
    for (const setup of setups) this.setups.set(setup.symbol, setup);
  }

  async getSetup(symbol: string, dayKey: string): Promise<Setup | null> {
    this.requests.push({ symbol, dayKey });
    return this.setups.get(symbol) ?? null;
  }
}

/** Long EURUSD 1.1000 / 1.0950 / 1.1250: 5R on 50 pips of risk */
export const LONG_5R: Setup = {
  symbol: "EURUSD",
  direction: "long",
  entryPrice: 1.1,
  stopLoss: 1.095,
  takeProfit: 1.125,
  estimatedR: 5,
  validUntil: null,
};

export interface HarnessOptions {
  stateDir: string;
  config?: Record<string, unknown>;
  setups?: Setup[];
  broker?: Partial<PaperBrokerOptions>;
  initialState?: PersistentState;
}

export interface EngineHarness {
  config: EngineConfig;
  paper: PaperBroker;
  sink: MemoryEventSink;
  provider: StaticSetupProvider;
  store: StateStore;
  holder: StateHolder;
  scheduler: SetupScheduler;
  loop: ReconcileLoop;
  /** One reconcile pass followed by any placement it triggered */
  cycle(): Promise<CycleReport>;
}

/** Engine wired to a PaperBroker at Monday 09:00, EURUSD 1.10200/1.10220. */
export function createEngineHarness(options: HarnessOptions): EngineHarness {
  const config = buildConfig(options.config);
  const paper = new PaperBroker({
    serverTime: MONDAY_9AM,
    symbols: { EURUSD: { spec: FX_SPEC, bid: 1.102, ask: 1.1022 } },
    ...options.broker,
  });
  const sink = new MemoryEventSink();
  const emit = createEmitter(sink);
  const provider = new StaticSetupProvider(options.setups);
  const store = new StateStore(options.stateDir);
  const holder = new StateHolder(store, options.initialState ?? emptyState());
  const placer = new OrderPlacer({ gateway: paper, config, emit });
  const scheduler = new SetupScheduler({ gateway: paper, config, emit, holder, provider, placer });
  const loop = new ReconcileLoop({
    holder,
    gateway: paper,
    config,
    emit,
    onNewDay: (symbol, dayKey) => scheduler.enqueue(symbol, dayKey),
    onCycle: (report) => scheduler.retryDeferred(report),
  });

  return {
    config,
    paper,
    sink,
    provider,
    store,
    holder,
    scheduler,
    loop,
    async cycle() {
      const report = await loop.check();
      await scheduler.idle();
      return report;
    },
  };
}
