import type { Logger } from "pino";
import type {
  Dispatcher,
  IncomingRequest,
  RequestContext,
  ResponseDescriptor,
} from "../dispatch/types.js";
import { HttpError } from "../errors/catalog.js";
import { isMiss, missToError } from "../routing/miss.js";
import { normalizePath } from "../routing/normalize.js";
import type { Resolver } from "../routing/resolver.js";
import { RequestStateMachine, type RequestStateListener } from "./request-state.js";

export interface RequestHandlerDeps {
  resolver: Resolver;
  dispatcher: Dispatcher;
  logger: Logger;
  /** Observes every request's state transitions. */
  onTransition?: RequestStateListener;
}

export interface RequestHandler {
  /** Resolves and dispatches one request. Failures are thrown as catalog errors. */
  handle(request: IncomingRequest): Promise<ResponseDescriptor>;
}

export function parseQuery(rawQuery: string): Record<string, string> {
  const query: Record<string, string> = {};
  for (const [key, value] of new URLSearchParams(rawQuery)) {
    query[key] = value;
  }
  return query;
}

export function createRequestHandler(deps: RequestHandlerDeps): RequestHandler {
  const { resolver, dispatcher, logger } = deps;

  return {
    async handle(request) {
      const sm = new RequestStateMachine();
      if (deps.onTransition) sm.onStateChange(deps.onTransition);

      try {
        const normalizedPath = normalizePath(request.path);
        if (isMiss(normalizedPath)) throw missToError(normalizedPath);
        sm.transition("normalized");

        const route = resolver.resolve(normalizedPath, request.rawQuery);
        if (isMiss(route)) throw missToError(route);
        sm.transition("resolved");

        const context: RequestContext = {
          ...request,
          normalizedPath,
          query: parseQuery(request.rawQuery),
        };
        sm.transition("dispatched");
        const response = await dispatcher.dispatch(route, context);
        sm.transition("responded");
        return response;
      } catch (err) {
        const failedIn = sm.getState();
        sm.transition("errored", err instanceof HttpError ? err.errorCode : "unexpected");
        logger.debug(
          { method: request.method, path: request.path, state: failedIn, err },
          "Request failed",
        );
        throw err;
      }
    },
  };
}
