import path from "node:path";
import { fileURLToPath } from "node:url";

/**
 * True when the module owning `importMetaUrl` is the script node (or tsx) was started with.
 */
export function isMainModule(importMetaUrl: string): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === fileURLToPath(importMetaUrl);
}
