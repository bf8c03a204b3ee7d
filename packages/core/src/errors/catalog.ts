/**
 * Typed error catalog for request handling and index maintenance.
 *
 * Every request-visible failure is an {@link HttpError}; the HTTP surface
 * renders it with its status code. {@link IndexBuildError} is the one
 * non-request error and only aborts startup.
 */

export class HttpError extends Error {
  constructor(
    public readonly code: number,
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        code: this.code,
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// 403 — Path and permission errors

/** Traversal attempt, malformed escape or forbidden character in the path. */
export class NormalizationError extends HttpError {
  constructor(details?: Record<string, unknown>) {
    super(403, "FORBIDDEN_PATH", "Forbidden path", details);
  }
}

/** The path lies under a directory the last scan could not read. */
export class PermissionDeniedError extends HttpError {
  constructor(details?: Record<string, unknown>) {
    super(403, "PERMISSION_DENIED", "Permission denied", details);
  }
}

// 404 / 405 — Resolution errors

export class NotFoundError extends HttpError {
  constructor(details?: Record<string, unknown>) {
    super(404, "NOT_FOUND", "Not found", details);
  }
}

export class MethodNotAllowedError extends HttpError {
  constructor(details?: Record<string, unknown>) {
    super(405, "METHOD_NOT_ALLOWED", "Method not allowed", details);
  }

  /** Methods the route accepts, as passed in `details.allow`. */
  get allow(): string[] {
    const allow = this.details?.allow;
    return Array.isArray(allow)
      ? allow.filter((m): m is string => typeof m === "string")
      : [];
  }
}

// 500 — Handler errors

export class TemplateError extends HttpError {
  constructor(details?: Record<string, unknown>) {
    super(500, "TEMPLATE_ERROR", "Template rendering failed", details);
  }
}

export class DynamicExecutionError extends HttpError {
  constructor(details?: Record<string, unknown>) {
    super(500, "DYNAMIC_EXECUTION_ERROR", "Dynamic handler failed", details);
  }
}

/** The content root could not be scanned at startup. */
export class IndexBuildError extends Error {
  constructor(
    public readonly root: string,
    options?: { cause?: unknown },
  ) {
    super(`Cannot index content root: ${root}`, options);
    this.name = this.constructor.name;
  }
}
