import { forbidden, type Miss } from "./miss.js";

// C0 controls and DEL
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

/**
 * Canonicalizes a raw request path (without its query string) into a
 * content-root-relative route key.
 *
 * "/blog/./post%20one/" → "blog/post one". Any ".." segment, malformed or
 * double percent-encoding, backslash or control character yields a
 * forbidden Miss; segments are never silently dropped except "" and ".".
 */
export function normalizePath(raw: string): string | Miss {
  let decoded: string;
  try {
    decoded = decodeURIComponent(raw);
  } catch {
    return forbidden(raw, "invalid-encoding");
  }

  if (CONTROL_CHARS.test(decoded) || decoded.includes("\\")) {
    return forbidden(raw, "invalid-characters");
  }

  const segments: string[] = [];
  for (const segment of decoded.split("/")) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") {
      return forbidden(raw, "traversal");
    }
    if (segment.includes("%")) {
      return forbidden(raw, "invalid-encoding");
    }
    segments.push(segment);
  }

  return segments.join("/");
}

/** Parent route key: "a/b/c" → "a/b", "a" → "", "" → "". */
export function parentKey(key: string): string {
  const slash = key.lastIndexOf("/");
  return slash === -1 ? "" : key.slice(0, slash);
}

/** Joins a route key and an entry name. */
export function childKey(parent: string, name: string): string {
  return parent === "" ? name : `${parent}/${name}`;
}

/** True when `key` is `prefix` or lies below it. "" contains everything. */
export function isWithin(key: string, prefix: string): boolean {
  return prefix === "" || key === prefix || key.startsWith(prefix + "/");
}
