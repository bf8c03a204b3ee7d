import { posix } from "node:path";

/**
 * Dotted packet name for an export of the module at `key`.
 * "chat/room.mjs" + "join" → "chat.room.join"; "index" segments and
 * stems are dropped, so "chat/index.mjs" + "say" → "chat.say".
 */
export function packetName(key: string, exportName: string): string {
  const segments = key.split("/");
  const fileName = segments.pop() ?? "";
  const stem = fileName.slice(0, fileName.length - posix.extname(fileName).length);

  const parts = segments.filter((segment) => segment !== "index");
  if (stem !== "index") parts.push(stem);
  parts.push(exportName);
  return parts.join(".");
}
