import { extname } from "node:path";
import type { ExtensionsConfig, HandlerKind } from "../schemas/server-config.js";
import type { FileKind } from "./types.js";

export interface ClassifierOptions {
  kinds: Readonly<Record<string, HandlerKind>>;
  priority: readonly string[];
  indexPattern: string;
  hiddenPrefixes: readonly string[];
}

export interface Classifier {
  /** Kind of a file by its extension; every name gets exactly one. */
  classify(fileName: string): FileKind;
  isIndexFile(fileName: string): boolean;
  isHidden(name: string): boolean;
  /** Index file a directory serves among `fileNames`, if any. */
  pickIndex(fileNames: readonly string[]): string | undefined;
  /** Extensions tried, in order, for extensionless paths. */
  readonly priority: readonly string[];
}

/** "index.*" → /^index\..*$/. `*` is the only wildcard. */
export function patternToRegExp(pattern: string): RegExp {
  const source = pattern
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${source}$`);
}

export function lowerExtname(fileName: string): string {
  return extname(fileName).toLowerCase();
}

export function createClassifier(options: ClassifierOptions): Classifier {
  const kinds = new Map<string, HandlerKind>(
    Object.entries(options.kinds).map(([ext, kind]) => [ext.toLowerCase(), kind]),
  );
  const priority = options.priority.map((ext) => ext.toLowerCase());
  const indexRegExp = patternToRegExp(options.indexPattern);

  function rank(fileName: string): number {
    const idx = priority.indexOf(lowerExtname(fileName));
    return idx === -1 ? priority.length : idx;
  }

  return {
    priority,

    classify(fileName) {
      return kinds.get(lowerExtname(fileName)) ?? "static";
    },

    isIndexFile(fileName) {
      return indexRegExp.test(fileName);
    },

    isHidden(name) {
      return options.hiddenPrefixes.some((prefix) => name.startsWith(prefix));
    },

    pickIndex(fileNames) {
      const candidates = fileNames.filter((name) => indexRegExp.test(name));
      candidates.sort((a, b) => rank(a) - rank(b) || (a < b ? -1 : a > b ? 1 : 0));
      return candidates[0];
    },
  };
}

export function classifierFromConfig(
  extensions: ExtensionsConfig,
  content: { indexPattern: string; hiddenPrefixes: readonly string[] },
): Classifier {
  return createClassifier({
    kinds: extensions.kinds,
    priority: extensions.priority,
    indexPattern: content.indexPattern,
    hiddenPrefixes: content.hiddenPrefixes,
  });
}
