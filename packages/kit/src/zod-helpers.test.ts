import { describe, it, expect } from "vitest";
import { z } from "zod";
import { formatZodErrors } from "./zod-helpers.js";

describe("formatZodErrors", () => {
  it("prefixes each issue with its path", () => {
    const schema = z.object({ tag: z.string() });
    const result = schema.safeParse({ tag: 42 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodErrors(result.error)).toEqual(["tag: Expected string, received number"]);
    }
  });

  it("joins nested paths with dots", () => {
    const schema = z.object({ placement: z.object({ attempts: z.number().int() }) });
    const result = schema.safeParse({ placement: { attempts: 1.5 } });

    expect(result.success).toBe(false);
    if (!result.success) {
      const errors = formatZodErrors(result.error);
      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatch(/^placement\.attempts:/);
    }
  });

  it("omits the prefix for root-level issues", () => {
    const result = z.string().safeParse(7);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodErrors(result.error)).toEqual(["Expected string, received number"]);
    }
  });
});
