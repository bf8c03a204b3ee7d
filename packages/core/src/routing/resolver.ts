import type { Classifier } from "./classify.js";
import { lowerExtname } from "./classify.js";
import { isMiss, notFound, type Miss } from "./miss.js";
import { childKey } from "./normalize.js";
import type { RouteIndex } from "./route-index.js";
import type { RouteSnapshot } from "./snapshot.js";
import type { ListingEntry, ResolvedRoute } from "./types.js";

export interface ResolverOptions {
  index: Pick<RouteIndex, "snapshot">;
  classifier: Pick<Classifier, "priority">;
  directoryListing: boolean;
}

export interface Resolver {
  /** Resolves a normalized path against the current snapshot. */
  resolve(normalizedPath: string, queryRemainder?: string): ResolvedRoute | Miss;
}

export function createResolver(options: ResolverOptions): Resolver {
  return {
    resolve(normalizedPath, queryRemainder = "") {
      return resolveIn(options.index.snapshot(), normalizedPath, {
        priority: options.classifier.priority,
        directoryListing: options.directoryListing,
        queryRemainder,
      });
    },
  };
}

/**
 * Resolution against a single snapshot:
 * 1. direct lookup (a directory with an index file is a direct hit),
 * 2. for extensionless paths, `path + ext` for each priority extension,
 *    first existing file wins,
 * 3. a directory without index lists its entries when listing is on,
 * 4. otherwise not found.
 */
export function resolveIn(
  snapshot: RouteSnapshot,
  normalizedPath: string,
  options: {
    priority: readonly string[];
    directoryListing: boolean;
    queryRemainder: string;
  },
): ResolvedRoute | Miss {
  const { queryRemainder } = options;

  const direct = snapshot.lookup(normalizedPath);
  if (!isMiss(direct)) {
    return { type: "route", descriptor: direct, matchedSuffix: "", queryRemainder };
  }
  if (direct.reason === "forbidden") return direct;

  const lastSegment = normalizedPath.slice(normalizedPath.lastIndexOf("/") + 1);
  if (lastSegment !== "" && lowerExtname(lastSegment) === "") {
    for (const ext of options.priority) {
      const candidate = snapshot.lookup(normalizedPath + ext);
      if (!isMiss(candidate) && candidate.kind !== "directory-index") {
        return {
          type: "route",
          descriptor: candidate,
          matchedSuffix: ext,
          queryRemainder,
        };
      }
    }
  }

  const directory = snapshot.directory(normalizedPath);
  if (directory && options.directoryListing) {
    const entries: ListingEntry[] = [];
    for (const name of directory.children) {
      const key = childKey(normalizedPath, name);
      if (snapshot.hasDirectory(key) || snapshot.isForbidden(key)) {
        entries.push({ name, kind: "directory" });
        continue;
      }
      const entry = snapshot.lookup(key);
      if (!isMiss(entry) && entry.kind !== "directory-index") {
        entries.push({ name, kind: entry.kind });
      }
    }
    return { type: "listing", directory, entries, queryRemainder };
  }

  return notFound(normalizedPath);
}
