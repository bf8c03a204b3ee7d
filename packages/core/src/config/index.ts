export { CONFIG_FILENAME, DEFAULT_ROOT_PATH } from "./defaults.js";
export { loadConfig, type LoadConfigOptions } from "./loader.js";
export { expandHomePath, resolveRootPath, resolveContentRoot } from "./paths.js";
