export type {
  Dispatcher,
  IncomingRequest,
  RequestContext,
  ResponseBody,
  ResponseDescriptor,
  ScriptExecutor,
  TemplateData,
  TemplateRenderer,
} from "./types.js";
export { createDispatcher, DEFAULT_HTML_CONTENT_TYPE, type DispatcherDeps } from "./dispatcher.js";
export { serveStatic, contentTypeFor, isNotModified, FALLBACK_CONTENT_TYPE } from "./static.js";
export { renderListing, escapeHtml } from "./listing.js";
export { READ_METHODS, assertReadMethod } from "./methods.js";
