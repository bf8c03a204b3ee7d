import type { ResolvedRoute } from "../routing/types.js";
import type { SessionAccessor, SessionData } from "../session/types.js";

export type ResponseBody = ReadableStream<Uint8Array> | Uint8Array | string | null;

/** What a handler produces; the HTTP surface turns it into a Response. */
export interface ResponseDescriptor {
  status: number;
  headers: Record<string, string>;
  body: ResponseBody;
}

/** A request as the HTTP surface hands it to the engine. */
export interface IncomingRequest {
  /** Upper-case HTTP method. */
  method: string;
  /** Request path as received, still percent-encoded. */
  path: string;
  /** Query string without the leading "?". */
  rawQuery: string;
  /** Header names lower-cased. */
  headers: Record<string, string>;
  session: SessionAccessor;
  signal?: AbortSignal;
}

export interface RequestContext extends IncomingRequest {
  normalizedPath: string;
  /** Parsed query; the last value wins for repeated keys. */
  query: Record<string, string>;
}

/** Data a template sees. */
export interface TemplateData {
  request: {
    method: string;
    path: string;
    query: Record<string, string>;
    headers: Record<string, string>;
  };
  route: {
    path: string;
    matchedSuffix: string;
  };
  session: SessionData;
}

export interface TemplateRenderer {
  render(filePath: string, data: TemplateData): Promise<string>;
}

export interface ScriptExecutor {
  execute(
    filePath: string,
    context: RequestContext,
    session: SessionAccessor,
  ): Promise<ResponseDescriptor>;
}

export interface Dispatcher {
  dispatch(route: ResolvedRoute, context: RequestContext): Promise<ResponseDescriptor>;
}
