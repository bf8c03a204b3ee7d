import { IncomingMessage } from "node:http";
import { Socket } from "node:net";
import type { AppEnv } from "../app.js";

/**
 * Bindings @hono/node-server hands the app: the Node request, whose `url`
 * is the request-target exactly as the client sent it.
 */
export function nodeBindings(target: string): AppEnv["Bindings"] {
  const incoming = new IncomingMessage(new Socket());
  incoming.url = target;
  return { incoming };
}
