export type { WatchEvent, WatchEventKind, WatchListener, WatchSource } from "./types.js";
export { createFsWatchSource, toWatchEvent } from "./fs-source.js";
export {
  createIndexWatcher,
  collapseKeys,
  type IndexWatcher,
  type IndexWatcherOptions,
} from "./index-watcher.js";
