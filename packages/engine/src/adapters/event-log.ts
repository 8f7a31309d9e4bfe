import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { EngineEvent, EventType } from "../types/events.js";

export interface EventSink {
  append(event: EngineEvent): Promise<void>;
}

/** Append-only NDJSON log. One appendFile per record, so a crash tears at most the last line. */
export class EventLog implements EventSink {
  private filePath: string;
  private ready: Promise<void>;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.ready = mkdir(dirname(filePath), { recursive: true }).then(() => {});
  }

  async append(event: EngineEvent): Promise<void> {
    await this.ready;
    const line = JSON.stringify(event) + "\n";
    await appendFile(this.filePath, line, "utf-8");
  }
}

export type Emit = (type: EventType, payload: Record<string, unknown>) => Promise<void>;

export function createEmitter(sink: EventSink, now: () => Date = () => new Date()): Emit {
  return (type, payload) => sink.append({ time: now().toISOString(), type, payload });
}

const EventRowSchema = z.object({
  time: z.string(),
  type: z.string(),
  payload: z.record(z.unknown()),
});

export type EventRow = z.infer<typeof EventRowSchema>;

/**
 * Reads the log back. A torn final line (crash mid-append) is skipped; a
 * malformed line anywhere else is an error.
 */
export async function readEvents(filePath: string): Promise<EventRow[]> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
    throw err;
  }

  const lines = text.split("\n");
  const rows: EventRow[] = [];
  lines.forEach((line, i) => {
    if (line.trim() === "") return;
    const isLast = i === lines.length - 1;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (err) {
      if (isLast) return;
      throw new Error(`${filePath}:${i + 1}: unreadable event record`, { cause: err });
    }
    rows.push(EventRowSchema.parse(parsed));
  });
  return rows;
}
