/**
 * Temporary content trees for filesystem-backed tests.
 */

import { mkdir, mkdtemp, rm, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { createSilentLogger } from "../logger/index.js";
import { createClassifier, type ClassifierOptions } from "../routing/classify.js";
import { createRouteIndex, type RouteIndex } from "../routing/route-index.js";
import type { IndexFs } from "../routing/scanner.js";

/** Relative path → file contents. A trailing "/" creates an empty directory. */
export type TreeSpec = Record<string, string | Uint8Array>;

export const TEST_CLASSIFIER_OPTIONS: ClassifierOptions = {
  kinds: { ".tmpl": "template", ".njk": "template", ".mjs": "dynamic" },
  priority: [".mjs", ".tmpl", ".njk", ".html"],
  indexPattern: "index.*",
  hiddenPrefixes: [".", "_"],
};

export async function writeTree(root: string, tree: TreeSpec): Promise<void> {
  for (const [relativePath, contents] of Object.entries(tree)) {
    const target = join(root, relativePath);
    if (relativePath.endsWith("/")) {
      await mkdir(target, { recursive: true });
      continue;
    }
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, contents);
  }
}

/** Sets a file's mtime (and atime) to `date`. */
export async function touch(path: string, date: Date): Promise<void> {
  await utimes(path, date, date);
}

export async function withContentTree(
  tree: TreeSpec,
  fn: (root: string) => Promise<void>,
): Promise<void> {
  const root = await mkdtemp(join(tmpdir(), "treeserve-test-"));
  try {
    await writeTree(root, tree);
    await fn(root);
  } finally {
    await rm(root, { recursive: true, force: true });
  }
}

export function createTestIndex(
  root: string,
  overrides: Partial<ClassifierOptions> & { fs?: IndexFs } = {},
): RouteIndex {
  const { fs, ...classifierOverrides } = overrides;
  return createRouteIndex({
    root,
    classifier: createClassifier({ ...TEST_CLASSIFIER_OPTIONS, ...classifierOverrides }),
    logger: createSilentLogger(),
    fs,
  });
}

/** Error shaped like the ones node:fs rejects with. */
export function fsError(code: string, path: string): NodeJS.ErrnoException {
  return Object.assign(new Error(`${code}: ${path}`), { code, path });
}
