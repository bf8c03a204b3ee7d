import {
  MethodNotAllowedError,
  NormalizationError,
  NotFoundError,
  PermissionDeniedError,
  type HttpError,
} from "../errors/catalog.js";

export type MissReason = "not-found" | "forbidden" | "method-not-allowed";

export type ForbiddenCause =
  | "traversal"
  | "invalid-characters"
  | "invalid-encoding"
  | "permission-denied";

/** A typed failure to map a request path onto a route. */
export interface Miss {
  readonly type: "miss";
  readonly reason: MissReason;
  readonly path: string;
  readonly cause?: ForbiddenCause;
  readonly allow?: readonly string[];
}

export function notFound(path: string): Miss {
  return { type: "miss", reason: "not-found", path };
}

export function forbidden(path: string, cause: ForbiddenCause): Miss {
  return { type: "miss", reason: "forbidden", path, cause };
}

export function methodNotAllowed(path: string, allow: readonly string[]): Miss {
  return { type: "miss", reason: "method-not-allowed", path, allow };
}

export function isMiss(value: unknown): value is Miss {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    value.type === "miss"
  );
}

export function missToError(miss: Miss): HttpError {
  switch (miss.reason) {
    case "not-found":
      return new NotFoundError({ path: miss.path });
    case "method-not-allowed":
      return new MethodNotAllowedError({
        path: miss.path,
        allow: [...(miss.allow ?? [])],
      });
    case "forbidden":
      return miss.cause === "permission-denied"
        ? new PermissionDeniedError({ path: miss.path })
        : new NormalizationError({ cause: miss.cause });
  }
}
