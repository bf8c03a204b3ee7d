import type { Logger } from "pino";
import { isWithin, parentKey } from "../routing/normalize.js";
import type { RouteIndex } from "../routing/route-index.js";
import type { WatchEvent, WatchSource } from "./types.js";

export interface IndexWatcherOptions {
  /** Quiet period before pending refreshes run. */
  debounceMs: number;
  /** Periodic full rescan; 0 or absent turns it off. */
  revalidateIntervalMs?: number;
  logger: Logger;
}

export interface IndexWatcher {
  /** Subscribe to the source and start periodic revalidation. */
  start(): void;
  /** Unsubscribe and wait for an in-flight flush to finish. */
  stop(): Promise<void>;
  /** Refresh every pending directory now. */
  flush(): Promise<void>;
  /** Directory keys waiting for the debounce to expire. */
  pending(): string[];
  readonly running: boolean;
}

/** Route key of an event path, or undefined when it escapes the root. */
function eventKey(path: string): string | undefined {
  const segments = path.split("/").filter((s) => s !== "" && s !== ".");
  if (segments.includes("..")) return undefined;
  return segments.join("/");
}

/** Drops keys that lie below another key in the set. */
export function collapseKeys(keys: Iterable<string>): string[] {
  const sorted = [...new Set(keys)].sort((a, b) => a.length - b.length || (a < b ? -1 : 1));
  const kept: string[] = [];
  for (const key of sorted) {
    if (!kept.some((ancestor) => isWithin(key, ancestor))) kept.push(key);
  }
  return kept;
}

export function createIndexWatcher(
  index: Pick<RouteIndex, "refresh">,
  source: WatchSource,
  options: IndexWatcherOptions,
): IndexWatcher {
  const { debounceMs, logger } = options;
  const revalidateIntervalMs = options.revalidateIntervalMs ?? 0;

  const pendingKeys = new Set<string>();
  let debounceTimer: ReturnType<typeof setTimeout> | null = null;
  let intervalId: ReturnType<typeof setInterval> | null = null;
  let unsubscribe: (() => void) | null = null;
  let flushInFlight: Promise<void> | null = null;

  function scheduleFlush(): void {
    if (debounceTimer !== null) clearTimeout(debounceTimer);
    debounceTimer = setTimeout(() => {
      debounceTimer = null;
      flush().catch((err: unknown) => {
        logger.error({ err }, "Watch flush failed");
      });
    }, debounceMs);
  }

  function onEvent(event: WatchEvent): void {
    const key = eventKey(event.path);
    if (key === undefined) {
      logger.warn({ path: event.path }, "Ignoring event outside the content root");
      return;
    }
    logger.debug({ path: key, kind: event.kind }, "Content changed");
    // The parent directory's entry list and index choice change too
    pendingKeys.add(parentKey(key));
    scheduleFlush();
  }

  async function flush(): Promise<void> {
    while (flushInFlight) {
      await flushInFlight;
    }
    if (pendingKeys.size === 0) return;

    const keys = collapseKeys(pendingKeys);
    pendingKeys.clear();

    flushInFlight = (async () => {
      for (const key of keys) {
        try {
          await index.refresh(key);
        } catch (err) {
          logger.error({ err, path: key }, "Refresh after change failed");
        }
      }
    })();

    try {
      await flushInFlight;
    } finally {
      flushInFlight = null;
    }
  }

  function clearTimers(): void {
    if (debounceTimer !== null) {
      clearTimeout(debounceTimer);
      debounceTimer = null;
    }
    if (intervalId !== null) {
      clearInterval(intervalId);
      intervalId = null;
    }
  }

  return {
    get running() {
      return unsubscribe !== null;
    },

    start() {
      if (unsubscribe) return; // Idempotent
      unsubscribe = source.subscribe(onEvent);

      if (revalidateIntervalMs > 0) {
        intervalId = setInterval(() => {
          pendingKeys.add("");
          flush().catch((err: unknown) => {
            logger.error({ err }, "Revalidation failed");
          });
        }, revalidateIntervalMs);
      }
    },

    async stop() {
      clearTimers();
      if (unsubscribe) {
        unsubscribe();
        unsubscribe = null;
      }
      pendingKeys.clear();

      if (flushInFlight) {
        await flushInFlight;
      }
    },

    flush,

    pending() {
      return collapseKeys(pendingKeys);
    },
  };
}
