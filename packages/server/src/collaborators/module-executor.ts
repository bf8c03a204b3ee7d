import { z } from "zod";
import type {
  RequestContext,
  ResponseDescriptor,
  ScriptExecutor,
} from "@treeserve/core/dispatch";
import { DEFAULT_HTML_CONTENT_TYPE } from "@treeserve/core/dispatch";
import { MethodNotAllowedError } from "@treeserve/core/errors";
import type { SessionAccessor } from "@treeserve/core/session";
import { createModuleLoader, type ModuleLoader, type ScriptModule } from "./module-loader.js";

const HTTP_METHODS = ["GET", "HEAD", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"];

/** What a script may return besides a plain string. */
export const ScriptResultSchema = z.object({
  status: z.number().int().min(100).max(599).default(200),
  headers: z.record(z.string(), z.string()).default({}),
  body: z.union([z.string(), z.instanceof(Uint8Array), z.null()]).default(null),
});

export type ScriptResult = z.input<typeof ScriptResultSchema>;

export type ScriptHandler = (
  context: RequestContext,
  session: SessionAccessor,
) => unknown;

function isHandler(value: unknown): value is ScriptHandler {
  return typeof value === "function";
}

/** Handler for `method`: the lower-cased named export, `get` for HEAD, then `default`. */
export function pickHandler(mod: ScriptModule, method: string): ScriptHandler | undefined {
  const candidates = [method.toLowerCase()];
  if (method === "HEAD") candidates.push("get");
  candidates.push("default");

  for (const name of candidates) {
    const value = mod[name];
    if (isHandler(value)) return value;
  }
  return undefined;
}

function allowedMethods(mod: ScriptModule): string[] {
  const allow = HTTP_METHODS.filter((m) => isHandler(mod[m.toLowerCase()]));
  if (allow.includes("GET") && !allow.includes("HEAD")) allow.push("HEAD");
  return allow;
}

export function toResponseDescriptor(result: unknown, method: string): ResponseDescriptor {
  if (result === undefined) {
    return { status: 204, headers: {}, body: null };
  }

  const response: ResponseDescriptor =
    typeof result === "string"
      ? { status: 200, headers: { "content-type": DEFAULT_HTML_CONTENT_TYPE }, body: result }
      : ScriptResultSchema.parse(result);

  return method === "HEAD" ? { ...response, body: null } : response;
}

/** Runs `.mjs` scripts as ES modules, through `loader`. */
export function createModuleExecutor(loader: ModuleLoader = createModuleLoader()): ScriptExecutor {
  return {
    async execute(filePath, context, session) {
      const mod = await loader.load(filePath);
      const handler = pickHandler(mod, context.method);
      if (!handler) {
        throw new MethodNotAllowedError({
          path: context.normalizedPath,
          method: context.method,
          allow: allowedMethods(mod),
        });
      }
      return toResponseDescriptor(await handler(context, session), context.method);
    },
  };
}
