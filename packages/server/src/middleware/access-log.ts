import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";

/**
 * Logs one line per request after the response is settled, including
 * responses produced by the error handler.
 */
export function createAccessLogMiddleware(logger: Logger): MiddlewareHandler {
  return async (c, next) => {
    const startedAt = performance.now();
    await next();

    const entry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - startedAt),
      userAgent: c.req.header("user-agent") ?? "unknown",
    };

    if (entry.status >= 500) {
      logger.error(entry, "Request failed");
    } else if (entry.status >= 400) {
      logger.warn(entry, "Request rejected");
    } else {
      logger.info(entry, "Request served");
    }
  };
}
