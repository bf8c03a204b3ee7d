export {
  packetError,
  type ArgumentParseResult,
  type ArgumentSchema,
  type PacketConnection,
  type PacketDefinition,
  type PacketErrorCode,
  type PacketErrorReply,
  type PacketHandler,
  type PacketModuleLoader,
} from "./types.js";
export { packetName } from "./naming.js";
export {
  PacketMessageSchema,
  parsePacketMessage,
  isPacketError,
  type PacketMessage,
} from "./protocol.js";
export {
  createPacketRegistry,
  packetsFromModule,
  type PacketRegistry,
  type PacketRegistryDeps,
} from "./registry.js";
export { createPacketRouter, type PacketRouter, type PacketRouterDeps } from "./router.js";
