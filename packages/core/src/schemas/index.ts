export {
  DEFAULTS,
  ExtensionSchema,
  HandlerKindSchema,
  ServerConfigSchema,
  type ServerConfig,
  type LoggingConfig,
  type ContentConfig,
  type ExtensionsConfig,
  type PacketsConfig,
  type HandlerKind,
} from "./server-config.js";
