import type { HttpBindings } from "@hono/node-server";
import { Hono, type Context } from "hono";
import { deleteCookie, getCookie, setCookie } from "hono/cookie";
import type { ContentfulStatusCode, StatusCode } from "hono/utils/http-status";
import type { Logger } from "pino";
import type { ResponseBody } from "@treeserve/core/dispatch";
import type { RequestHandler } from "@treeserve/core/engine";
import { HttpError, MethodNotAllowedError } from "@treeserve/core/errors";
import {
  openSession,
  type SessionAccessor,
  type SessionCodec,
} from "@treeserve/core/session";
import { createAccessLogMiddleware } from "./middleware/access-log.js";

export interface SessionCookieOptions {
  cookieName: string;
  maxAgeSeconds: number;
}

export interface AppDeps {
  logger: Logger;
  handler: RequestHandler;
  sessionCodec: SessionCodec;
  session: SessionCookieOptions;
}

/** Node bindings are absent when the app is driven through `fetch` alone. */
export type AppEnv = { Bindings: Partial<HttpBindings> };

export interface RequestTarget {
  /** Path as the client sent it, still percent-encoded and with dot segments. */
  path: string;
  rawQuery: string;
}

/**
 * Splits the request-target into path and query. The Node request line is
 * used when there is one: WHATWG URL parsing folds "..", "%2e%2e" and "."
 * segments away, and the engine has to see them to reject them.
 */
export function requestTarget(c: Context<AppEnv>): RequestTarget {
  const raw = c.env?.incoming?.url;
  let target: string;
  if (raw !== undefined && raw.startsWith("/")) {
    target = raw;
  } else {
    const url = new URL(c.req.url);
    target = url.pathname + url.search;
  }

  const queryStart = target.indexOf("?");
  return queryStart === -1
    ? { path: target, rawQuery: "" }
    : { path: target.slice(0, queryStart), rawQuery: target.slice(queryStart + 1) };
}

/** Copies bytes into a buffer the fetch Response accepts as-is. */
function toBodyInit(body: ResponseBody) {
  return body instanceof Uint8Array ? new Uint8Array(body) : body;
}

export function createApp(deps: AppDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const { logger, handler, sessionCodec } = deps;
  const { cookieName, maxAgeSeconds } = deps.session;

  function writeSession(c: Context<AppEnv>, session: SessionAccessor): void {
    if (session.cleared) {
      deleteCookie(c, cookieName, { path: "/" });
    } else if (session.dirty) {
      setCookie(c, cookieName, sessionCodec.encode(session.get()), {
        path: "/",
        httpOnly: true,
        sameSite: "Lax",
        maxAge: maxAgeSeconds,
      });
    }
  }

  app.use("*", createAccessLogMiddleware(logger.child({ component: "http" })));

  // Every path belongs to the content tree
  app.all("*", async (c) => {
    const { path, rawQuery } = requestTarget(c);
    const session = openSession(sessionCodec, getCookie(c, cookieName), logger);

    const response = await handler.handle({
      method: c.req.method.toUpperCase(),
      path,
      rawQuery,
      headers: c.req.header(),
      session,
      signal: c.req.raw.signal,
    });

    writeSession(c, session);
    return c.body(toBodyInit(response.body), {
      status: response.status as StatusCode,
      headers: response.headers,
    });
  });

  // Global error handler
  app.onError((err, c) => {
    if (err instanceof HttpError) {
      if (err.code >= 500) {
        logger.error({ err }, err.message);
      } else {
        logger.debug({ errorCode: err.errorCode, details: err.details }, err.message);
      }
      const headers: Record<string, string> =
        err instanceof MethodNotAllowedError ? { Allow: err.allow.join(", ") } : {};
      return c.json(err.toJSON(), {
        status: err.code as ContentfulStatusCode,
        headers,
      });
    }

    logger.error({ err }, "Unhandled error");
    return c.json(
      {
        error: {
          code: 500,
          errorCode: "INTERNAL_ERROR",
          message: "Internal server error",
        },
      },
      500,
    );
  });

  return app;
}
