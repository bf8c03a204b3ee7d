export const CONFIG_FILENAME = "treeserve.json";

/** Project root when neither an option nor TREESERVE_ROOT_PATH names one. */
export const DEFAULT_ROOT_PATH = process.cwd();
