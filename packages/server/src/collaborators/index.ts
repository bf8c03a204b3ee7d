export {
  createHmacSessionCodec,
  generateSessionSecret,
} from "./session-codec.js";
export { createNunjucksRenderer, type NunjucksRendererOptions } from "./nunjucks-renderer.js";
export {
  createModuleExecutor,
  pickHandler,
  toResponseDescriptor,
  ScriptResultSchema,
  type ScriptHandler,
  type ScriptResult,
} from "./module-executor.js";
export { createModuleLoader, type ModuleLoader, type ScriptModule } from "./module-loader.js";
