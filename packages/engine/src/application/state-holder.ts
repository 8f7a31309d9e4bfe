import type { PersistentState } from "../domain/persistent-state.js";
import type { StateStore } from "../adapters/state-store.js";
import { SerialLock } from "../lib/serial-lock.js";

export interface Transaction<T> {
  state: PersistentState;
  result: T;
}

/**
 * Owns the live PersistentState. Every reader or writer goes through
 * transact(), which serialises callers and persists the returned state
 * before the next one runs.
 */
export class StateHolder {
  private state: PersistentState;
  private store: StateStore;
  private lock = new SerialLock();

  constructor(store: StateStore, initial: PersistentState) {
    this.store = store;
    this.state = initial;
  }

  /** Copy of the last committed state. */
  snapshot(): PersistentState {
    return structuredClone(this.state);
  }

  transact<T>(fn: (state: PersistentState) => Promise<Transaction<T>>): Promise<T> {
    return this.lock.runExclusive(async () => {
      const { state, result } = await fn(structuredClone(this.state));
      this.commit(state);
      return result;
    });
  }

  /** Flushes an in-progress state to disk from inside a transaction. */
  checkpoint(state: PersistentState): void {
    this.commit(state);
  }

  idle(): Promise<void> {
    return this.lock.idle();
  }

  private commit(state: PersistentState): void {
    this.store.save(state);
    this.state = structuredClone(state);
  }
}
