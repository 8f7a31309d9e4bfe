import fs from "node:fs";
import path from "node:path";
import writeFileAtomic from "write-file-atomic";
import { formatZodErrors } from "@ratchet/kit";
import { PersistentStateSchema, emptyState, type PersistentState } from "../domain/persistent-state.js";
import { logger } from "../lib/logger.js";

const log = logger.createChild("stateStore");

export type LoadOutcome =
  | { kind: "fresh"; state: PersistentState }
  | { kind: "loaded"; state: PersistentState }
  | { kind: "quarantined"; state: PersistentState; movedTo: string; reason: string };

type ParseResult = { ok: true; state: PersistentState } | { ok: false; reason: string };

function parseState(text: string): ParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
  const result = PersistentStateSchema.safeParse(raw);
  return result.success
    ? { ok: true, state: result.data }
    : { ok: false, reason: formatZodErrors(result.error).join("; ") };
}

/** `<stateDir>/state.json`, replaced atomically on every save. */
export class StateStore {
  readonly filePath: string;

  constructor(stateDir: string) {
    this.filePath = path.join(stateDir, "state.json");
  }

  /**
   * Reads the persisted document. An unreadable one is moved aside, never
   * overwritten, and a fresh state is returned in its place.
   */
  load(now: Date = new Date()): LoadOutcome {
    if (!fs.existsSync(this.filePath)) {
      return { kind: "fresh", state: emptyState() };
    }

    const parsed = parseState(fs.readFileSync(this.filePath, "utf8"));
    if (parsed.ok) {
      return { kind: "loaded", state: parsed.state };
    }

    const { reason } = parsed;
    const movedTo = `${this.filePath}.corrupt-${now.getTime()}`;
    fs.renameSync(this.filePath, movedTo);
    log.warn({ action: "stateQuarantined", movedTo, reason }, "State file unreadable, starting fresh");
    return { kind: "quarantined", state: emptyState(), movedTo, reason };
  }

  save(state: PersistentState): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    writeFileAtomic.sync(this.filePath, JSON.stringify(state, null, 2) + "\n", "utf8");
  }
}
