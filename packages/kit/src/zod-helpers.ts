import type { z } from "zod";

export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((i) => {
    const path = i.path.join(".");
    return path.length > 0 ? `${path}: ${i.message}` : i.message;
  });
}
