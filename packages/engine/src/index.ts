// Types
export { EngineConfigSchema } from "./types/config.js";
export type { EngineConfig, PartialRules, RetryPolicy, TradingMode } from "./types/config.js";
export type {
  BrokerGateway,
  BrokerPosition,
  Deal,
  DealType,
  Direction,
  PendingOrderRecord,
  PositionModification,
  Quote,
  SymbolSpec,
} from "./types/broker.js";
export type { Setup, SetupProvider } from "./types/setup.js";
export type { EngineEvent, EventType } from "./types/events.js";

// Domain
export * from "./domain/errors.js";
export { createTrackedPosition, rewardMultiple, currentR, advancePhase } from "./domain/tracked-position.js";
export type { Phase, TrackedPosition } from "./domain/tracked-position.js";
export { CONSERVATIVE_TABLE, AGGRESSIVE_TABLE, TRANSITION_TABLES, selectTransition } from "./domain/partial-profit-machine.js";
export type { Observation, Transition, TransitionAction } from "./domain/partial-profit-machine.js";
export { planPartialClose } from "./domain/volume.js";
export { sizeByRisk } from "./domain/size-by-risk.js";
export { PersistentStateSchema, emptyState, rebuildTrackers } from "./domain/persistent-state.js";
export type { PersistentState } from "./domain/persistent-state.js";

// Adapters
export { EventLog, createEmitter, readEvents } from "./adapters/event-log.js";
export type { EventSink, Emit } from "./adapters/event-log.js";
export { StateStore } from "./adapters/state-store.js";
export { PaperBroker } from "./adapters/paper-broker.js";
export { BridgeGateway, createGotTransport } from "./adapters/bridge-gateway.js";
export { TimedGateway } from "./adapters/timed-gateway.js";
export { FileSetupProvider } from "./adapters/file-setup-provider.js";

// Application
export { StateHolder } from "./application/state-holder.js";
export { OrderPlacer } from "./application/order-placer.js";
export { SetupScheduler } from "./application/setup-scheduler.js";
export { ReconcileLoop } from "./application/reconcile-loop.js";
export { runReconcileCycle } from "./application/reconcile-cycle.js";
export type { CycleReport } from "./application/reconcile-cycle.js";
export { classifyGatewayError } from "./lib/classify-gateway-error.js";
export { withFixedRetry } from "./lib/with-retry.js";
