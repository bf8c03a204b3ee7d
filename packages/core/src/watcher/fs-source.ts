import { watch, type WatchEventType } from "node:fs";
import { stat } from "node:fs/promises";
import { join, sep } from "node:path";
import type { Logger } from "pino";
import { isMissingError } from "../routing/scanner.js";
import type { WatchEvent, WatchSource } from "./types.js";

/**
 * Maps one `fs.watch` notification onto a watch event. `rename` covers
 * both creation and deletion, so the path is checked on disk.
 */
export async function toWatchEvent(
  root: string,
  eventType: WatchEventType,
  filename: string,
): Promise<WatchEvent> {
  const path = filename.split(sep).join("/");
  if (eventType === "change") return { path, kind: "modified" };

  try {
    await stat(join(root, filename));
    return { path, kind: "created" };
  } catch (err) {
    if (isMissingError(err)) return { path, kind: "deleted" };
    throw err;
  }
}

/** Recursive `node:fs` watcher on the content root. */
export function createFsWatchSource(root: string, logger: Logger): WatchSource {
  return {
    subscribe(listener) {
      const watcher = watch(root, { recursive: true }, (eventType, filename) => {
        if (!filename) return;
        toWatchEvent(root, eventType, filename)
          .then(listener)
          .catch((err: unknown) => {
            logger.warn({ err, filename }, "Could not classify filesystem event");
          });
      });
      watcher.on("error", (err) => {
        logger.error({ err, root }, "Filesystem watcher failed");
      });
      return () => watcher.close();
    },
  };
}
