import pino from "pino";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

export type LogLevel = pino.LevelWithSilent;

export interface ModuleLoggers {
  /** Replaces the per-module overrides and re-levels every child already handed out. */
  setLogConfig(overrides: Record<string, LogLevel>): void;
  createChild(module: string): pino.Logger;
}

/**
 * Child factory over `root` that remembers what it created. Modules take
 * their child at import time, before the daemon has read its config, so
 * overrides apply retroactively.
 */
export function moduleLoggers(root: pino.Logger): ModuleLoggers {
  const children = new Map<string, pino.Logger[]>();
  let overrides: Record<string, LogLevel> = {};
  const levelFor = (module: string): string => overrides[module] ?? root.level;

  return {
    setLogConfig(next) {
      overrides = next;
      for (const [module, loggers] of children) {
        for (const child of loggers) child.level = levelFor(module);
      }
    },

    createChild(module) {
      const child = root.child({ module });
      child.level = levelFor(module);
      children.set(module, [...(children.get(module) ?? []), child]);
      return child;
    },
  };
}

function createPinoLogger(): pino.Logger {
  if (process.env.VITEST) {
    return pino({ level: "silent" });
  }

  const level = process.env.LOG_LEVEL ?? "info";
  const logDir = process.env.LOG_DIR || join(dirname(fileURLToPath(import.meta.url)), "../../logs");

  return pino(
    { level },
    pino.transport({
      targets: [
        // stdout; per-module levels filter before records reach the transport
        { target: "pino/file", level: "trace", options: { destination: 1 } },
        {
          target: "pino-roll",
          level: "trace",
          options: {
            file: join(logDir, "engine"),
            frequency: "daily",
            dateFormat: "yyyy-MM-dd",
            extension: ".ndjson",
            mkdir: true,
          },
        },
      ],
    }),
  );
}

const pinoInstance = createPinoLogger();

export const logger = Object.assign(pinoInstance, moduleLoggers(pinoInstance));
