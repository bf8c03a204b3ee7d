export type {
  RouteKind,
  FileKind,
  FileDescriptor,
  DirectoryIndexDescriptor,
  RouteDescriptor,
  DirectoryNode,
  ListingEntry,
  ListingEntryKind,
  RouteMatch,
  ListingMatch,
  ResolvedRoute,
} from "./types.js";
export {
  isMiss,
  missToError,
  notFound,
  forbidden,
  methodNotAllowed,
  type Miss,
  type MissReason,
  type ForbiddenCause,
} from "./miss.js";
export { normalizePath, parentKey, childKey, isWithin } from "./normalize.js";
export {
  createClassifier,
  classifierFromConfig,
  patternToRegExp,
  type Classifier,
  type ClassifierOptions,
} from "./classify.js";
export { RouteSnapshot, type ScanSlice } from "./snapshot.js";
export { nodeIndexFs, type IndexFs, type DirEntryLike, type StatsLike } from "./scanner.js";
export {
  createRouteIndex,
  type RouteIndex,
  type RouteIndexOptions,
} from "./route-index.js";
export { createResolver, resolveIn, type Resolver, type ResolverOptions } from "./resolver.js";
