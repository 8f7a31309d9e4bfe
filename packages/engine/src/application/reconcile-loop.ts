import { setTimeout as sleep } from "node:timers/promises";
import type { BrokerGateway } from "../types/broker.js";
import type { EngineConfig } from "../types/config.js";
import type { Emit } from "../adapters/event-log.js";
import { logger } from "../lib/logger.js";
import { runReconcileCycle, type CycleReport } from "./reconcile-cycle.js";
import type { StateHolder } from "./state-holder.js";

const log = logger.createChild("reconcileLoop");

interface ReconcileLoopDeps {
  holder: StateHolder;
  gateway: BrokerGateway;
  config: EngineConfig;
  emit: Emit;
  onNewDay: (symbol: string, dayKey: string) => void;
  onCycle?: (report: CycleReport) => void;
  onGatewayDown?: () => void;
}

export class ReconcileLoop {
  private deps: ReconcileLoopDeps;
  private running = false;
  private consecutiveErrors = 0;
  private lastWeekend = false;
  private abort = new AbortController();
  private loop: Promise<void> | null = null;

  constructor(deps: ReconcileLoopDeps) {
    this.deps = deps;
  }

  /** One reconciliation pass under the state lock; the resulting state is persisted before the lock is released. */
  async check(): Promise<CycleReport> {
    const { holder, gateway, config, emit, onNewDay } = this.deps;
    const report = await holder.transact(async (state) => {
      const result = await runReconcileCycle(state, {
        gateway,
        config,
        emit,
        onNewDay,
        checkpoint: (s) => holder.checkpoint(s),
      });
      return { state: result.state, result: result.report };
    });
    this.lastWeekend = report.weekend;
    if (report.actions.length > 0 || report.failedSteps.length > 0) {
      log.info({ action: "cycle", actions: report.actions, failedSteps: report.failedSteps }, "Reconcile cycle done");
    }
    this.deps.onCycle?.(report);
    return report;
  }

  /** Runs until stop(); resolves when the loop has exited. */
  start(): Promise<void> {
    if (this.loop !== null) return this.loop;
    this.running = true;
    this.abort = new AbortController();
    this.loop = this.run().finally(() => {
      this.loop = null;
    });
    return this.loop;
  }

  /** Ends the loop after the in-flight cycle, if any, has finished. */
  async stop(): Promise<void> {
    this.running = false;
    this.abort.abort();
    await this.loop;
  }

  private async run(): Promise<void> {
    const { config } = this.deps;
    while (this.running) {
      try {
        await this.check();
        this.consecutiveErrors = 0;
      } catch (err) {
        this.consecutiveErrors++;
        log.error({ action: "reconcileError", err, consecutiveErrors: this.consecutiveErrors }, "Reconcile loop error");
        if (this.consecutiveErrors === 3) {
          log.error({ action: "gatewayDownAlert" }, "Broker gateway appears down (3 consecutive failures)");
          this.deps.onGatewayDown?.();
        }
      }
      if (!this.running) break;
      const delay = this.lastWeekend ? config.weekendIntervalMs : config.intervalMs;
      try {
        await sleep(delay, undefined, { signal: this.abort.signal });
      } catch (err) {
        if (this.abort.signal.aborted) break;
        throw err;
      }
    }
  }
}
