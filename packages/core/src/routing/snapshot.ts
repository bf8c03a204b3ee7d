import { forbidden, notFound, type Miss } from "./miss.js";
import { isWithin, parentKey } from "./normalize.js";
import type { DirectoryNode, RouteDescriptor } from "./types.js";

/** Routes, directories and forbidden keys found under one scanned directory. */
export interface ScanSlice {
  routes: Map<string, RouteDescriptor>;
  directories: Map<string, DirectoryNode>;
  forbidden: Set<string>;
}

export function emptySlice(): ScanSlice {
  return { routes: new Map(), directories: new Map(), forbidden: new Set() };
}

/**
 * Immutable view of the route index as of one completed scan.
 *
 * A request takes one snapshot and resolves against it only; refreshes
 * publish a new instance instead of mutating this one.
 */
export class RouteSnapshot {
  constructor(
    readonly version: number,
    private readonly routes: ReadonlyMap<string, RouteDescriptor>,
    private readonly directories: ReadonlyMap<string, DirectoryNode>,
    private readonly forbiddenKeys: ReadonlySet<string>,
    readonly builtAt: Date = new Date(),
  ) {}

  static empty(): RouteSnapshot {
    return new RouteSnapshot(0, new Map(), new Map(), new Set());
  }

  get size(): number {
    return this.routes.size;
  }

  /** Descriptor for `key`, or a Miss. Never touches the filesystem. */
  lookup(key: string): RouteDescriptor | Miss {
    const descriptor = this.routes.get(key);
    if (descriptor) return descriptor;
    if (this.isForbidden(key)) return forbidden(key, "permission-denied");
    return notFound(key);
  }

  directory(key: string): DirectoryNode | undefined {
    return this.directories.get(key);
  }

  hasDirectory(key: string): boolean {
    return this.directories.has(key);
  }

  /** True when `key` or one of its ancestors could not be read. */
  isForbidden(key: string): boolean {
    if (this.forbiddenKeys.size === 0) return false;
    let current = key;
    for (;;) {
      if (this.forbiddenKeys.has(current)) return true;
      if (current === "") return false;
      current = parentKey(current);
    }
  }

  routeKeys(): string[] {
    return [...this.routes.keys()];
  }

  forbiddenPaths(): string[] {
    return [...this.forbiddenKeys];
  }

  /**
   * New snapshot with everything at or below `prefix` replaced by `slice`.
   * The receiver is left untouched.
   */
  withSlice(prefix: string, slice: ScanSlice, version: number): RouteSnapshot {
    const routes = new Map<string, RouteDescriptor>();
    for (const [key, descriptor] of this.routes) {
      if (!isWithin(key, prefix)) routes.set(key, descriptor);
    }
    for (const [key, descriptor] of slice.routes) routes.set(key, descriptor);

    const directories = new Map<string, DirectoryNode>();
    for (const [key, node] of this.directories) {
      if (!isWithin(key, prefix)) directories.set(key, node);
    }
    for (const [key, node] of slice.directories) directories.set(key, node);

    const forbiddenKeys = new Set<string>();
    for (const key of this.forbiddenKeys) {
      if (!isWithin(key, prefix)) forbiddenKeys.add(key);
    }
    for (const key of slice.forbidden) forbiddenKeys.add(key);

    return new RouteSnapshot(version, routes, directories, forbiddenKeys);
  }
}
