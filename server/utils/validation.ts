import type { z } from "zod";
import { ValidationError } from "../errors";

/** Parse `value` with `schema`, raising a 422 with per-field paths on failure. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw ValidationError.fromZod(result.error);
  }
  return result.data;
}
