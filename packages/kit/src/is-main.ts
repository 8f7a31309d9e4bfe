import { pathToFileURL } from "node:url";

/** True when the module owning `importMetaUrl` is the process entry point. */
export function isMainModule(importMetaUrl: string, argv: string[] = process.argv): boolean {
  const entry = argv[1];
  if (!entry) return false;
  return importMetaUrl === pathToFileURL(entry).href;
}
