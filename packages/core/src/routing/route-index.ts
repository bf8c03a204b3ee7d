import type { Logger } from "pino";
import { IndexBuildError } from "../errors/catalog.js";
import type { Classifier } from "./classify.js";
import type { Miss } from "./miss.js";
import { parentKey } from "./normalize.js";
import {
  absolutePathFor,
  isMissingError,
  isPermissionError,
  nodeIndexFs,
  scanSubtree,
  type IndexFs,
  type ScanContext,
} from "./scanner.js";
import { emptySlice, RouteSnapshot, type ScanSlice } from "./snapshot.js";
import type { RouteDescriptor } from "./types.js";

export interface RouteIndexOptions {
  /** Absolute content root. */
  root: string;
  classifier: Classifier;
  logger: Logger;
  fs?: IndexFs;
}

export interface RouteIndex {
  readonly root: string;
  /** Full scan of the content root. Throws IndexBuildError when the root is unreadable. */
  buildFull(): Promise<RouteSnapshot>;
  /**
   * Rescans the directory at `key` (or its nearest known ancestor) and
   * publishes the result. Failures are logged and keep the prior snapshot.
   */
  refresh(key: string): Promise<RouteSnapshot>;
  lookup(key: string): RouteDescriptor | Miss;
  /** The currently published snapshot. */
  snapshot(): RouteSnapshot;
}

export function createRouteIndex(options: RouteIndexOptions): RouteIndex {
  const { root, classifier, logger } = options;
  const ctx: ScanContext = {
    root,
    classifier,
    logger,
    fs: options.fs ?? nodeIndexFs,
  };

  let current = RouteSnapshot.empty();
  // Scans run one at a time so no two refreshes race on the same slice
  let queue: Promise<unknown> = Promise.resolve();

  function enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = queue.then(task);
    queue = run.catch(() => undefined);
    return run;
  }

  function publish(prefix: string, slice: ScanSlice): RouteSnapshot {
    current = current.withSlice(prefix, slice, current.version + 1);
    return current;
  }

  async function isDirectoryOnDisk(key: string): Promise<boolean> {
    try {
      return (await ctx.fs.stat(absolutePathFor(root, key))).isDirectory();
    } catch (err) {
      if (isMissingError(err)) return false;
      throw err;
    }
  }

  /** Nearest directory at or above `key` that the index knows and that still exists. */
  async function refreshTarget(key: string): Promise<string> {
    let target = key;
    while (target !== "") {
      if (current.hasDirectory(target) && (await isDirectoryOnDisk(target))) {
        return target;
      }
      target = parentKey(target);
    }
    return target;
  }

  async function runRefresh(key: string): Promise<RouteSnapshot> {
    if (key.split("/").some((segment) => classifier.isHidden(segment))) {
      logger.debug({ path: key }, "Ignoring refresh of hidden path");
      return current;
    }

    let target: string;
    try {
      target = await refreshTarget(key);
    } catch (err) {
      logger.error({ err, path: key }, "Refresh failed, keeping previous snapshot");
      return current;
    }

    let slice: ScanSlice;
    try {
      slice = await scanSubtree(ctx, target);
    } catch (err) {
      if (isPermissionError(err) && target !== "") {
        // Forbidden until a later scan can read it again
        const denied = emptySlice();
        denied.forbidden.add(target);
        logger.warn({ path: target }, "Directory not readable, marking subtree forbidden");
        return publish(target, denied);
      }
      logger.error({ err, path: target }, "Refresh failed, keeping previous snapshot");
      return current;
    }

    const snapshot = publish(target, slice);
    logger.debug(
      { path: target, version: snapshot.version, routes: snapshot.size },
      "Route index refreshed",
    );
    return snapshot;
  }

  return {
    root,

    buildFull() {
      return enqueue(async () => {
        let slice: ScanSlice;
        try {
          slice = await scanSubtree(ctx, "");
        } catch (err) {
          throw new IndexBuildError(root, { cause: err });
        }
        const snapshot = publish("", slice);
        logger.info(
          { root, routes: snapshot.size, version: snapshot.version },
          "Route index built",
        );
        return snapshot;
      });
    },

    refresh(key) {
      return enqueue(() => runRefresh(key));
    },

    lookup(key) {
      return current.lookup(key);
    },

    snapshot() {
      return current;
    },
  };
}
