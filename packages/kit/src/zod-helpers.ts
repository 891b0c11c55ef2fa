import type { z } from "zod";

/** One `path: message` line per issue; root-level issues are reported as `(root)`. */
export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`);
}
