export type WatchEventKind = "created" | "modified" | "deleted";

export interface WatchEvent {
  /** Slash-separated path relative to the content root. */
  path: string;
  kind: WatchEventKind;
}

export type WatchListener = (event: WatchEvent) => void;

/** Anything that reports filesystem changes under the content root. */
export interface WatchSource {
  /** Returns an unsubscribe function. */
  subscribe(listener: WatchListener): () => void;
}
