import path from "node:path";
import { fileURLToPath } from "node:url";

/** True when the module at `importMetaUrl` is the script node was started with. */
export function isMainModule(importMetaUrl: string): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  return fileURLToPath(importMetaUrl) === path.resolve(entry);
}
