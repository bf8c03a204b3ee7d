import pino, { type Logger } from "pino";
import type { LoggingConfig } from "../schemas/server-config.js";

export type { Logger } from "pino";

export function createLogger(config: LoggingConfig): Logger {
  const usePretty = config.pretty || process.env.NODE_ENV !== "production";

  return pino({
    name: "treeserve",
    level: config.level,
    ...(usePretty ? { transport: { target: "pino-pretty" } } : {}),
  });
}

/** Child logger tagged with the component that owns it. */
export function componentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}

/** Logger that drops everything; for collaborators built without one. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
