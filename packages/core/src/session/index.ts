export type { SessionAccessor, SessionCodec, SessionData } from "./types.js";
export { createSessionAccessor, openSession } from "./accessor.js";
