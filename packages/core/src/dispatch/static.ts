import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import { basename } from "node:path";
import { Readable } from "node:stream";
import * as mime from "mime-types";
import { NotFoundError, PermissionDeniedError } from "../errors/catalog.js";
import { isMissingError, isPermissionError } from "../routing/scanner.js";
import type { FileDescriptor } from "../routing/types.js";
import { assertReadMethod } from "./methods.js";
import type { RequestContext, ResponseDescriptor } from "./types.js";

export const FALLBACK_CONTENT_TYPE = "application/octet-stream";

export function contentTypeFor(fileName: string): string {
  return mime.contentType(basename(fileName)) || FALLBACK_CONTENT_TYPE;
}

/**
 * True when the client's cached copy is current. HTTP dates carry whole
 * seconds, so the mtime is truncated before comparing.
 */
export function isNotModified(
  ifModifiedSince: string | undefined,
  lastModified: Date,
): boolean {
  if (!ifModifiedSince) return false;
  const since = Date.parse(ifModifiedSince);
  if (Number.isNaN(since)) return false;
  return Math.floor(lastModified.getTime() / 1000) * 1000 <= since;
}

export async function serveStatic(
  descriptor: FileDescriptor,
  context: RequestContext,
): Promise<ResponseDescriptor> {
  assertReadMethod(context.method, descriptor.normalizedPath);

  let size: number;
  try {
    size = (await stat(descriptor.absoluteFilePath)).size;
  } catch (err) {
    // Deleted or locked since the last scan; the watcher catches up later
    if (isMissingError(err)) throw new NotFoundError({ path: descriptor.normalizedPath });
    if (isPermissionError(err)) {
      throw new PermissionDeniedError({ path: descriptor.normalizedPath });
    }
    throw err;
  }

  const lastModified = descriptor.lastModified.toUTCString();
  if (isNotModified(context.headers["if-modified-since"], descriptor.lastModified)) {
    return { status: 304, headers: { "last-modified": lastModified }, body: null };
  }

  const headers = {
    "content-type": contentTypeFor(descriptor.absoluteFilePath),
    "content-length": String(size),
    "last-modified": lastModified,
  };
  if (context.method === "HEAD") {
    return { status: 200, headers, body: null };
  }

  const stream = createReadStream(descriptor.absoluteFilePath, { signal: context.signal });
  return {
    status: 200,
    headers,
    body: Readable.toWeb(stream) as ReadableStream<Uint8Array>,
  };
}
