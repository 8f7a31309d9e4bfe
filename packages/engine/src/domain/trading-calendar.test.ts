import { describe, it, expect } from "vitest";
import { dayKey, dayStart, endOfDay, isWeekend } from "./trading-calendar.js";

describe("trading calendar", () => {
  it("keys the day on server time", () => {
    const t = new Date("2024-03-04T23:59:00.000Z");
    expect(dayKey(t)).toBe("2024-03-04");
    expect(dayStart(t)).toBe("2024-03-04T00:00:00.000Z");
    expect(endOfDay(t)).toBe("2024-03-04T23:59:59.000Z");
  });

  it("treats Saturday and Sunday as weekend", () => {
    expect(isWeekend(new Date("2024-03-08T22:00:00.000Z"))).toBe(false);
    expect(isWeekend(new Date("2024-03-09T00:00:00.000Z"))).toBe(true);
    expect(isWeekend(new Date("2024-03-10T23:00:00.000Z"))).toBe(true);
    expect(isWeekend(new Date("2024-03-11T00:00:00.000Z"))).toBe(false);
  });
});
