import { access, readdir, stat } from "node:fs/promises";
import { constants } from "node:fs";
import { join } from "node:path";
import type { Logger } from "pino";
import type { Classifier } from "./classify.js";
import { childKey } from "./normalize.js";
import { emptySlice, type ScanSlice } from "./snapshot.js";
import type { FileDescriptor } from "./types.js";

export interface DirEntryLike {
  name: string;
  isDirectory(): boolean;
}

export interface StatsLike {
  isDirectory(): boolean;
  isFile(): boolean;
  mtime: Date;
  size: number;
}

/** The slice of node:fs the scanner needs; swapped out in tests. */
export interface IndexFs {
  readdir(path: string): Promise<DirEntryLike[]>;
  stat(path: string): Promise<StatsLike>;
  /** Resolves when the file can be read. */
  access(path: string): Promise<void>;
}

export const nodeIndexFs: IndexFs = {
  readdir: (path) => readdir(path, { withFileTypes: true }),
  stat: (path) => stat(path),
  access: (path) => access(path, constants.R_OK),
};

export interface ScanContext {
  root: string;
  classifier: Classifier;
  fs: IndexFs;
  logger: Logger;
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}

export function isPermissionError(err: unknown): boolean {
  const code = errorCode(err);
  return code === "EACCES" || code === "EPERM";
}

export function isMissingError(err: unknown): boolean {
  const code = errorCode(err);
  return code === "ENOENT" || code === "ENOTDIR";
}

export function absolutePathFor(root: string, key: string): string {
  return key === "" ? root : join(root, ...key.split("/"));
}

/**
 * Scans the directory at `key` and everything below it.
 *
 * Throws when the directory itself cannot be stat'ed or read; failures
 * further down are logged and skipped (unreadable files) or recorded as
 * forbidden keys (unreadable directories).
 */
export async function scanSubtree(ctx: ScanContext, key: string): Promise<ScanSlice> {
  const absolutePath = absolutePathFor(ctx.root, key);
  const dirStats = await ctx.fs.stat(absolutePath);
  if (!dirStats.isDirectory()) {
    throw Object.assign(new Error(`Not a directory: ${absolutePath}`), {
      code: "ENOTDIR",
    });
  }
  const slice = emptySlice();
  await scanInto(ctx, key, absolutePath, dirStats, slice);
  return slice;
}

async function scanInto(
  ctx: ScanContext,
  key: string,
  absolutePath: string,
  dirStats: StatsLike,
  slice: ScanSlice,
): Promise<void> {
  const entries = await ctx.fs.readdir(absolutePath);
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const children: string[] = [];
  const files = new Map<string, FileDescriptor>();

  for (const entry of entries) {
    if (ctx.classifier.isHidden(entry.name)) continue;

    const entryPath = join(absolutePath, entry.name);
    const entryKey = childKey(key, entry.name);

    if (entry.isDirectory()) {
      try {
        const stats = await ctx.fs.stat(entryPath);
        await scanInto(ctx, entryKey, entryPath, stats, slice);
      } catch (err) {
        if (isPermissionError(err)) {
          ctx.logger.warn({ path: entryPath }, "Directory not readable, skipping subtree");
          slice.forbidden.add(entryKey);
        } else {
          ctx.logger.warn({ err, path: entryPath }, "Skipping directory");
          continue;
        }
      }
      children.push(entry.name);
      continue;
    }

    let stats: StatsLike;
    try {
      stats = await ctx.fs.stat(entryPath);
      if (!stats.isFile()) {
        // Sockets, FIFOs and links to directories are not routed
        ctx.logger.debug({ path: entryPath }, "Skipping non-regular entry");
        continue;
      }
      await ctx.fs.access(entryPath);
    } catch (err) {
      ctx.logger.warn({ err, path: entryPath }, "Skipping unreadable file");
      continue;
    }

    const descriptor: FileDescriptor = {
      normalizedPath: entryKey,
      absoluteFilePath: entryPath,
      kind: ctx.classifier.classify(entry.name),
      lastModified: stats.mtime,
      size: stats.size,
      childCount: 0,
    };
    slice.routes.set(entryKey, descriptor);
    files.set(entry.name, descriptor);
    children.push(entry.name);
  }

  slice.directories.set(key, {
    normalizedPath: key,
    absolutePath,
    lastModified: dirStats.mtime,
    children,
  });

  const indexName = ctx.classifier.pickIndex([...files.keys()]);
  const index = indexName !== undefined ? files.get(indexName) : undefined;
  if (index) {
    slice.routes.set(key, {
      normalizedPath: key,
      absoluteFilePath: index.absoluteFilePath,
      kind: "directory-index",
      lastModified: index.lastModified,
      size: index.size,
      childCount: children.length,
      index,
    });
  }
}
