import { describe, it, expect } from "vitest";
import pino from "pino";
import { moduleLoggers } from "./logger.js";

function capture() {
  const lines: Array<{ module: string; msg: string }> = [];
  const root = pino({ level: "info" }, {
    write(line: string) {
      lines.push(JSON.parse(line));
    },
  });
  return { lines, loggers: moduleLoggers(root) };
}

describe("moduleLoggers", () => {
  it("applies an override to a child created before the config was read", () => {
    const { lines, loggers } = capture();
    const cycle = loggers.createChild("reconcileCycle");
    const scheduler = loggers.createChild("setupScheduler");

    cycle.debug("before");
    loggers.setLogConfig({ reconcileCycle: "debug" });
    cycle.debug("after");
    scheduler.debug("ignored");

    expect(lines.map(({ module, msg }) => ({ module, msg }))).toEqual([{ module: "reconcileCycle", msg: "after" }]);
  });

  it("can silence a module", () => {
    const { lines, loggers } = capture();
    const broker = loggers.createChild("paperBroker");
    loggers.setLogConfig({ paperBroker: "silent" });

    broker.error("dropped");
    expect(lines).toEqual([]);
  });

  it("falls back to the root level when an override is removed", () => {
    const { loggers } = capture();
    const cycle = loggers.createChild("reconcileCycle");
    loggers.setLogConfig({ reconcileCycle: "trace" });
    expect(cycle.level).toBe("trace");

    loggers.setLogConfig({});
    expect(cycle.level).toBe("info");
  });

  it("levels a child created after the config", () => {
    const { loggers } = capture();
    loggers.setLogConfig({ orderPlacer: "warn" });
    expect(loggers.createChild("orderPlacer").level).toBe("warn");
    expect(loggers.createChild("stateStore").level).toBe("info");
  });
});
