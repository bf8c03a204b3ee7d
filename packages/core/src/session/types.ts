import type { Miss } from "../routing/miss.js";

/** Opaque session payload. Only scripts and templates interpret it. */
export type SessionData = Record<string, unknown>;

/** Turns a cookie value into session data and back. */
export interface SessionCodec {
  /** A Miss means "no usable session" (absent, tampered or malformed). */
  decode(cookie: string): SessionData | Miss;
  encode(data: SessionData): string;
}

/** Per-request view of the session handed to templates and scripts. */
export interface SessionAccessor {
  get(): SessionData;
  set(data: SessionData): void;
  clear(): void;
  /** True once `set` was called; the cookie must be written back. */
  readonly dirty: boolean;
  /** True when the last change was `clear`; the cookie must be deleted. */
  readonly cleared: boolean;
}
