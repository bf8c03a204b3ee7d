import type { Logger } from "pino";
import {
  DynamicExecutionError,
  HttpError,
  TemplateError,
} from "../errors/catalog.js";
import type {
  FileDescriptor,
  ListingMatch,
  ResolvedRoute,
  RouteMatch,
} from "../routing/types.js";
import { renderListing } from "./listing.js";
import { assertReadMethod } from "./methods.js";
import { serveStatic } from "./static.js";
import type {
  Dispatcher,
  RequestContext,
  ResponseDescriptor,
  ScriptExecutor,
  TemplateData,
  TemplateRenderer,
} from "./types.js";

export const DEFAULT_HTML_CONTENT_TYPE = "text/html; charset=utf-8";

export interface DispatcherDeps {
  renderer: TemplateRenderer;
  executor: ScriptExecutor;
  logger: Logger;
  /** Content type of rendered templates and listings. */
  contentType?: string;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createDispatcher(deps: DispatcherDeps): Dispatcher {
  const contentType = deps.contentType ?? DEFAULT_HTML_CONTENT_TYPE;

  function html(body: string, context: RequestContext): ResponseDescriptor {
    return {
      status: 200,
      headers: {
        "content-type": contentType,
        "content-length": String(Buffer.byteLength(body)),
      },
      body: context.method === "HEAD" ? null : body,
    };
  }

  async function renderTemplate(
    file: FileDescriptor,
    match: RouteMatch,
    context: RequestContext,
  ): Promise<ResponseDescriptor> {
    assertReadMethod(context.method, file.normalizedPath);

    const data: TemplateData = {
      request: {
        method: context.method,
        path: context.path,
        query: context.query,
        headers: context.headers,
      },
      route: {
        path: match.descriptor.normalizedPath,
        matchedSuffix: match.matchedSuffix,
      },
      session: context.session.get(),
    };

    let body: string;
    try {
      body = await deps.renderer.render(file.absoluteFilePath, data);
    } catch (err) {
      deps.logger.error({ err, path: file.normalizedPath }, "Template rendering failed");
      throw new TemplateError({ path: file.normalizedPath, reason: errorMessage(err) });
    }
    return html(body, context);
  }

  async function runScript(
    file: FileDescriptor,
    context: RequestContext,
  ): Promise<ResponseDescriptor> {
    try {
      return await deps.executor.execute(file.absoluteFilePath, context, context.session);
    } catch (err) {
      // Scripts may signal 404/405/... themselves
      if (err instanceof HttpError) throw err;
      deps.logger.error({ err, path: file.normalizedPath }, "Dynamic handler failed");
      throw new DynamicExecutionError({
        path: file.normalizedPath,
        reason: errorMessage(err),
      });
    }
  }

  function serveFile(
    file: FileDescriptor,
    match: RouteMatch,
    context: RequestContext,
  ): Promise<ResponseDescriptor> {
    switch (file.kind) {
      case "static":
        return serveStatic(file, context);
      case "template":
        return renderTemplate(file, match, context);
      case "dynamic":
        return runScript(file, context);
    }
  }

  function serveListing(match: ListingMatch, context: RequestContext): ResponseDescriptor {
    assertReadMethod(context.method, match.directory.normalizedPath);
    return html(renderListing(match), context);
  }

  return {
    async dispatch(route: ResolvedRoute, context: RequestContext) {
      if (route.type === "listing") return serveListing(route, context);

      const { descriptor } = route;
      const file = descriptor.kind === "directory-index" ? descriptor.index : descriptor;
      return serveFile(file, route, context);
    },
  };
}
