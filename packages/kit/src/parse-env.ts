import type { z } from "zod";

/** Validate environment variables (defaults to process.env) against a zod schema. */
export function parseEnv<T extends z.ZodTypeAny>(
  schema: T,
  source: NodeJS.ProcessEnv = process.env,
): z.output<T> {
  return schema.parse(source);
}
