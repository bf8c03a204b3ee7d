import { stat } from "node:fs/promises";
import { pathToFileURL } from "node:url";

export type ScriptModule = Record<string, unknown>;

export interface ModuleLoader {
  /** The module's namespace as of the file's current mtime. */
  load(filePath: string): Promise<ScriptModule>;
}

/**
 * Imports ES modules from the content tree, keyed by path and mtime. A
 * file is imported again only after its mtime changes; the ESM loader
 * has no eviction, so each superseded version stays resident until the
 * process exits.
 */
export function createModuleLoader(): ModuleLoader {
  const cache = new Map<string, { mtimeMs: number; module: Promise<ScriptModule> }>();

  return {
    async load(filePath) {
      const { mtimeMs } = await stat(filePath);
      const cached = cache.get(filePath);
      if (cached && cached.mtimeMs === mtimeMs) {
        return cached.module;
      }

      const url = pathToFileURL(filePath);
      url.searchParams.set("mtime", String(mtimeMs));
      const module: Promise<ScriptModule> = import(url.href);
      cache.set(filePath, { mtimeMs, module });

      try {
        return await module;
      } catch (err) {
        // Retry on the next request instead of pinning the failure
        if (cache.get(filePath)?.module === module) cache.delete(filePath);
        throw err;
      }
    },
  };
}
