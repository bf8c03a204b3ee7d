/** Outcome of validating packet arguments; zod schemas satisfy it. */
export type ArgumentParseResult =
  | { success: true; data: unknown }
  | { success: false; error: { message: string } };

export interface ArgumentSchema {
  safeParse(input: unknown): ArgumentParseResult;
}

/** One client connection as packet handlers see it. */
export interface PacketConnection {
  send(message: Record<string, unknown>): void;
  readonly open: boolean;
}

/**
 * Runs a packet. A returned object is sent to the client; an async
 * iterable has each yielded object sent in turn. Other values are dropped.
 */
export type PacketHandler = (args: unknown, connection: PacketConnection) => unknown;

export interface PacketDefinition {
  /** Dotted name clients address the packet by, e.g. "chat.room.join". */
  name: string;
  /** Route key of the module that exports it. */
  sourceKey: string;
  args?: ArgumentSchema;
  handler: PacketHandler;
}

/** Imports a packet module's namespace. */
export interface PacketModuleLoader {
  load(filePath: string): Promise<Record<string, unknown>>;
}

export type PacketErrorCode =
  | "INVALID_JSON"
  | "INVALID_MESSAGE"
  | "UNSUPPORTED_MESSAGE"
  | "UNKNOWN_PACKET"
  | "INVALID_ARGUMENTS"
  | "PACKET_FAILED";

export interface PacketErrorReply extends Record<string, unknown> {
  error: {
    errorCode: PacketErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

export function packetError(
  errorCode: PacketErrorCode,
  message: string,
  details?: Record<string, unknown>,
): PacketErrorReply {
  return {
    error: {
      errorCode,
      message,
      ...(details !== undefined && { details }),
    },
  };
}
