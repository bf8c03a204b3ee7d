import { z } from "zod";
import { packetError, type PacketErrorReply } from "./types.js";

/** `[packetName, { ...arguments }]`; the arguments object may be empty but not absent. */
export const PacketMessageSchema = z.tuple([
  z.string().min(1),
  z.record(z.string(), z.unknown()),
]);

export interface PacketMessage {
  name: string;
  args: Record<string, unknown>;
}

export function parsePacketMessage(raw: string): PacketMessage | PacketErrorReply {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return packetError("INVALID_JSON", "Message is not valid JSON", {
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  const result = PacketMessageSchema.safeParse(parsed);
  if (!result.success) {
    return packetError("INVALID_MESSAGE", "Expected [packet name, {arguments}]", {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.map(String).join("."),
        message: issue.message,
      })),
    });
  }

  const [name, args] = result.data;
  return { name, args };
}

export function isPacketError(value: PacketMessage | PacketErrorReply): value is PacketErrorReply {
  return "error" in value;
}
