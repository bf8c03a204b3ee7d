import { access } from "node:fs/promises";
import type { Hono } from "hono";
import { resolveContentRoot, resolveRootPath } from "@treeserve/core/config";
import {
  createDispatcher,
  type ScriptExecutor,
  type TemplateRenderer,
} from "@treeserve/core/dispatch";
import { createRequestHandler, type RequestHandler } from "@treeserve/core/engine";
import { componentLogger, createLogger, type Logger } from "@treeserve/core/logger";
import {
  classifierFromConfig,
  createResolver,
  createRouteIndex,
  type IndexFs,
  type RouteIndex,
} from "@treeserve/core/routing";
import {
  createPacketRegistry,
  createPacketRouter,
  type PacketRouter,
} from "@treeserve/core/packets";
import type { ServerConfig } from "@treeserve/core/schemas";
import type { SessionCodec } from "@treeserve/core/session";
import {
  createFsWatchSource,
  createIndexWatcher,
  type IndexWatcher,
  type WatchSource,
} from "@treeserve/core/watcher";
import { createApp, type AppEnv } from "./app.js";
import {
  createHmacSessionCodec,
  createModuleExecutor,
  createModuleLoader,
  createNunjucksRenderer,
  generateSessionSecret,
} from "./collaborators/index.js";
import { createPacketSocket, type PacketSocket } from "./packet-socket.js";

export interface PacketContext {
  root: string;
  index: RouteIndex;
  router: PacketRouter;
  socket: PacketSocket;
  watcher: IndexWatcher | null;
}

export interface ServerContext {
  app: Hono<AppEnv>;
  logger: Logger;
  config: ServerConfig;
  startedAt: Date;
  contentRoot: string;
  index: RouteIndex;
  handler: RequestHandler;
  watcher: IndexWatcher | null;
  /** Null when packets are disabled or the packet root does not exist. */
  packets: PacketContext | null;
  cleanup: () => Promise<void>;
}

/** Collaborator overrides; each defaults to the built-in implementation. */
export interface CreateServerOptions {
  rootPath?: string;
  logger?: Logger;
  renderer?: TemplateRenderer;
  executor?: ScriptExecutor;
  sessionCodec?: SessionCodec;
  watchSource?: WatchSource;
  packetWatchSource?: WatchSource;
  indexFs?: IndexFs;
}

/**
 * Wires the engine for `config`. Rejects with IndexBuildError when the
 * content root cannot be scanned.
 */
export async function createServer(
  config: ServerConfig,
  options?: CreateServerOptions,
): Promise<ServerContext> {
  const logger = options?.logger ?? createLogger(config.logging);
  const startedAt = new Date();

  const rootPath = resolveRootPath(options?.rootPath);
  const contentRoot = resolveContentRoot(rootPath, config.content.root);

  const classifier = classifierFromConfig(config.extensions, config.content);
  const index = createRouteIndex({
    root: contentRoot,
    classifier,
    logger: componentLogger(logger, "route-index"),
    fs: options?.indexFs,
  });
  await index.buildFull();

  const moduleLoader = createModuleLoader();
  const resolver = createResolver({
    index,
    classifier,
    directoryListing: config.content.directoryListing,
  });
  const dispatcher = createDispatcher({
    renderer: options?.renderer ?? createNunjucksRenderer({ root: contentRoot }),
    executor: options?.executor ?? createModuleExecutor(moduleLoader),
    logger: componentLogger(logger, "dispatcher"),
    contentType: config.templates.contentType,
  });
  const handler = createRequestHandler({
    resolver,
    dispatcher,
    logger: componentLogger(logger, "engine"),
  });

  let sessionCodec = options?.sessionCodec;
  if (!sessionCodec) {
    let secret = config.session.secret;
    if (!secret) {
      logger.warn("session.secret not set; sessions are signed with an ephemeral secret");
      secret = generateSessionSecret();
    }
    sessionCodec = createHmacSessionCodec(secret);
  }

  const watchIndex = (
    target: RouteIndex,
    root: string,
    source: WatchSource | undefined,
    component: string,
  ): IndexWatcher => {
    const watchLogger = componentLogger(logger, component);
    const next = createIndexWatcher(
      target,
      source ?? createFsWatchSource(root, watchLogger),
      {
        debounceMs: config.watch.debounceMs,
        revalidateIntervalMs: config.watch.revalidateIntervalMs,
        logger: watchLogger,
      },
    );
    next.start();
    logger.info({ root }, "Watching for changes");
    return next;
  };

  const watcher = config.watch.enabled
    ? watchIndex(index, contentRoot, options?.watchSource, "watcher")
    : null;

  let packets: PacketContext | null = null;
  if (config.packets.enabled) {
    const packetRoot = resolveContentRoot(rootPath, config.packets.root);
    if (await exists(packetRoot)) {
      const packetIndex = createRouteIndex({
        root: packetRoot,
        classifier,
        logger: componentLogger(logger, "packet-index"),
        fs: options?.indexFs,
      });
      await packetIndex.buildFull();

      const packetLogger = componentLogger(logger, "packets");
      const registry = createPacketRegistry({
        index: packetIndex,
        loader: moduleLoader,
        logger: packetLogger,
      });
      const router = createPacketRouter({ registry, logger: packetLogger });
      packets = {
        root: packetRoot,
        index: packetIndex,
        router,
        socket: createPacketSocket({
          endpoint: config.packets.endpoint,
          router,
          logger: packetLogger,
        }),
        watcher: config.watch.enabled
          ? watchIndex(packetIndex, packetRoot, options?.packetWatchSource, "packet-watcher")
          : null,
      };
    } else {
      logger.info({ packetRoot }, "Packet root not found; WebSocket packets disabled");
    }
  }

  const app = createApp({
    logger,
    handler,
    sessionCodec,
    session: {
      cookieName: config.session.cookieName,
      maxAgeSeconds: config.session.maxAgeSeconds,
    },
  });

  const cleanup = async () => {
    await watcher?.stop();
    await packets?.watcher?.stop();
  };

  return {
    app,
    logger,
    config,
    startedAt,
    contentRoot,
    index,
    handler,
    watcher,
    packets,
    cleanup,
  };
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
