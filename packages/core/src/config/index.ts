export {
  DEFAULT_PARAM_DIR,
  DEFAULT_GATEWAY_URL,
  ENV,
} from "./defaults.js";
export { loadConfig, type LoadConfigOptions } from "./loader.js";
export { expandHomePath, resolveParamDir } from "./paths.js";
