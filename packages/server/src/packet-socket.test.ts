import { describe, it, expect, vi } from "vitest";
import { createSilentLogger } from "@treeserve/core/logger";
import type { PacketRouter } from "@treeserve/core/packets";
import {
  createPacketSocket,
  handleSocketMessage,
  toConnection,
  type SocketLike,
} from "./packet-socket.js";

interface FakeSocket extends SocketLike {
  readyState: number;
  frames: string[];
}

function fakeSocket(readyState = 1): FakeSocket {
  const socket: FakeSocket = {
    readyState,
    frames: [],
    send(data) {
      socket.frames.push(data);
    },
  };
  return socket;
}

function echoRouter() {
  return {
    handleMessage: vi.fn<PacketRouter["handleMessage"]>(async (raw, connection) => {
      connection.send({ echo: raw });
    }),
  };
}

const logger = createSilentLogger();

describe("toConnection", () => {
  it("sends messages as JSON text while the socket is open", () => {
    const socket = fakeSocket();

    toConnection(socket).send({ joined: "lobby" });

    expect(socket.frames).toEqual(['{"joined":"lobby"}']);
  });

  it("drops messages once the socket is closing", () => {
    const socket = fakeSocket();
    const connection = toConnection(socket);

    socket.readyState = 2;
    connection.send({ late: true });

    expect(connection.open).toBe(false);
    expect(socket.frames).toEqual([]);
  });
});

describe("handleSocketMessage", () => {
  it("routes text frames through the packet router", async () => {
    const router = echoRouter();
    const socket = fakeSocket();

    await handleSocketMessage(router, '["ping", {}]', socket, logger);

    expect(router.handleMessage).toHaveBeenCalledTimes(1);
    expect(socket.frames).toEqual(['{"echo":"[\\"ping\\", {}]"}']);
  });

  it("refuses binary frames", async () => {
    const router = echoRouter();
    const socket = fakeSocket();

    await handleSocketMessage(router, new Uint8Array([1, 2]).buffer, socket, logger);

    expect(router.handleMessage).not.toHaveBeenCalled();
    expect(JSON.parse(socket.frames[0] ?? "null")).toEqual({
      error: { errorCode: "UNSUPPORTED_MESSAGE", message: "Binary messages are not supported" },
    });
  });

  it("resolves even when the router rejects", async () => {
    const router: PacketRouter = {
      handleMessage: async () => {
        throw new Error("registry gone");
      },
    };

    await expect(
      handleSocketMessage(router, '["ping", {}]', fakeSocket(), logger),
    ).resolves.toBeUndefined();
  });
});

describe("createPacketSocket", () => {
  it("leaves requests without an upgrade to the content app", async () => {
    const socket = createPacketSocket({ endpoint: "/ws", router: echoRouter(), logger });

    const res = await socket.app.request("/ws");

    expect(socket.endpoint).toBe("/ws");
    expect(res.status).toBe(404);
  });
});
