export { DEFAULT_ROOT_PATH } from "./defaults.js";
export { loadConfig, saveConfig, type LoadConfigOptions } from "./loader.js";
export {
  expandHomePath,
  resolveRootPath,
  resolveConfigPath,
} from "./paths.js";
