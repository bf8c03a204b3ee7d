import { serve } from "@hono/node-server";
import { createRequire } from "node:module";
import { loadConfig } from "@treeserve/core/config";
import { createServer } from "./bootstrap.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

const DRAIN_TIMEOUT_MS = 5_000;

async function main(): Promise<void> {
  const rootPath = process.env.TREESERVE_ROOT_PATH;
  const config = await loadConfig({ rootPath });
  const context = await createServer(config, { rootPath });
  const { app, logger, contentRoot } = context;

  const server = serve(
    { fetch: app.fetch, port: config.server.port, hostname: config.server.host },
    (info) => {
      logger.info(
        { port: info.port, host: config.server.host, contentRoot, version: pkg.version },
        "HTTP server started",
      );
    },
  );

  if (context.packets) {
    context.packets.socket.injectWebSocket(server);
    logger.info({ endpoint: context.packets.socket.endpoint }, "WebSocket packets enabled");
  }

  async function shutdown(signal: string): Promise<void> {
    logger.info({ signal }, "Shutdown signal received, draining connections");

    // Stop watchers before the listener goes away
    await context.cleanup();

    server.close(() => {
      logger.info("Server stopped");
      process.exit(0);
    });

    // Force exit after drain timeout
    setTimeout(() => {
      logger.warn("Drain timeout exceeded, forcing exit");
      process.exit(1);
    }, DRAIN_TIMEOUT_MS).unref();
  }

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
