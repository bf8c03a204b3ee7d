import type { Logger } from "pino";
import { isMiss } from "../routing/miss.js";
import type { SessionAccessor, SessionCodec, SessionData } from "./types.js";

export function createSessionAccessor(initial: SessionData = {}): SessionAccessor {
  let data: SessionData = { ...initial };
  let dirty = false;
  let cleared = false;

  return {
    get() {
      return data;
    },
    set(next) {
      data = { ...next };
      dirty = true;
      cleared = false;
    },
    clear() {
      data = {};
      dirty = false;
      cleared = true;
    },
    get dirty() {
      return dirty;
    },
    get cleared() {
      return cleared;
    },
  };
}

/**
 * Accessor for the session carried by `cookie`. A missing or undecodable
 * cookie starts an empty session.
 */
export function openSession(
  codec: SessionCodec,
  cookie: string | undefined,
  logger?: Logger,
): SessionAccessor {
  if (cookie === undefined || cookie === "") return createSessionAccessor();

  const decoded = codec.decode(cookie);
  if (isMiss(decoded)) {
    logger?.debug({ reason: decoded.reason }, "Discarding unusable session cookie");
    return createSessionAccessor();
  }
  return createSessionAccessor(decoded);
}
