import { createNodeWebSocket } from "@hono/node-ws";
import { Hono } from "hono";
import type { WSEvents } from "hono/ws";
import type { Logger } from "@treeserve/core/logger";
import { packetError, type PacketConnection, type PacketRouter } from "@treeserve/core/packets";

/** WebSocket.OPEN */
const OPEN = 1;

/** The part of a server-side socket the packet relay needs. */
export interface SocketLike {
  readonly readyState: number;
  send(data: string): void;
}

export function toConnection(socket: SocketLike): PacketConnection {
  return {
    get open() {
      return socket.readyState === OPEN;
    },
    send(message) {
      if (socket.readyState === OPEN) {
        socket.send(JSON.stringify(message));
      }
    },
  };
}

/**
 * Routes one frame through the packet router. Binary frames are refused;
 * the promise never rejects.
 */
export async function handleSocketMessage(
  router: PacketRouter,
  data: unknown,
  socket: SocketLike,
  logger: Logger,
): Promise<void> {
  const connection = toConnection(socket);
  if (typeof data !== "string") {
    connection.send(packetError("UNSUPPORTED_MESSAGE", "Binary messages are not supported"));
    return;
  }
  try {
    await router.handleMessage(data, connection);
  } catch (err) {
    logger.error({ err }, "Packet message handling failed");
  }
}

export function createPacketEvents(router: PacketRouter, logger: Logger): WSEvents {
  return {
    onOpen() {
      logger.debug("Packet socket opened");
    },
    onMessage(event, ws) {
      void handleSocketMessage(router, event.data, ws, logger);
    },
    onClose() {
      logger.debug("Packet socket closed");
    },
    onError(event) {
      logger.warn({ type: event.type }, "Packet socket error");
    },
  };
}

export interface PacketSocketDeps {
  endpoint: string;
  router: PacketRouter;
  logger: Logger;
}

export interface PacketSocket {
  /** Answers upgrade requests only; plain HTTP stays with the content app. */
  app: Hono;
  endpoint: string;
  injectWebSocket: ReturnType<typeof createNodeWebSocket>["injectWebSocket"];
}

export function createPacketSocket(deps: PacketSocketDeps): PacketSocket {
  const { endpoint, router, logger } = deps;
  const app = new Hono();
  const { injectWebSocket, upgradeWebSocket } = createNodeWebSocket({ app });

  app.get(
    endpoint,
    upgradeWebSocket(() => createPacketEvents(router, logger)),
  );

  return { app, endpoint, injectWebSocket };
}
