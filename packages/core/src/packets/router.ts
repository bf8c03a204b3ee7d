import type { Logger } from "pino";
import { isPacketError, parsePacketMessage } from "./protocol.js";
import type { PacketRegistry } from "./registry.js";
import { packetError, type PacketConnection, type PacketDefinition } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isAsyncIterable(value: unknown): value is AsyncIterable<unknown> {
  return typeof value === "object" && value !== null && Symbol.asyncIterator in value;
}

/** Sends object results; an async iterable is drained until the connection closes. */
async function relay(result: unknown, connection: PacketConnection): Promise<void> {
  if (isAsyncIterable(result)) {
    for await (const item of result) {
      if (!connection.open) break;
      if (isRecord(item)) connection.send(item);
    }
    return;
  }

  const value = await result;
  if (isRecord(value) && connection.open) {
    connection.send(value);
  }
}

export interface PacketRouterDeps {
  registry: PacketRegistry;
  logger: Logger;
}

export interface PacketRouter {
  /**
   * Parses one text message and runs the packet it names. Protocol,
   * lookup, validation and handler failures are answered on the
   * connection; the promise never rejects.
   */
  handleMessage(raw: string, connection: PacketConnection): Promise<void>;
}

export function createPacketRouter(deps: PacketRouterDeps): PacketRouter {
  const { registry, logger } = deps;

  return {
    async handleMessage(raw, connection) {
      const message = parsePacketMessage(raw);
      if (isPacketError(message)) {
        connection.send(message);
        return;
      }

      const { name } = message;
      let packet: PacketDefinition | undefined;
      try {
        packet = await registry.lookup(name);
      } catch (err) {
        logger.error({ err, packet: name }, "Packet table could not be loaded");
        connection.send(packetError("PACKET_FAILED", `Packet ${name} failed`));
        return;
      }
      if (!packet) {
        connection.send(packetError("UNKNOWN_PACKET", `No packet named ${name}`));
        return;
      }

      let args: unknown = message.args;
      if (packet.args) {
        const parsed = packet.args.safeParse(message.args);
        if (!parsed.success) {
          connection.send(
            packetError("INVALID_ARGUMENTS", `Invalid arguments for ${name}`, {
              reason: parsed.error.message,
            }),
          );
          return;
        }
        args = parsed.data;
      }

      try {
        await relay(packet.handler(args, connection), connection);
      } catch (err) {
        logger.warn({ err, packet: name }, "Packet handler failed");
        if (connection.open) {
          connection.send(packetError("PACKET_FAILED", `Packet ${name} failed`));
        }
      }
    },
  };
}
