export type { ParamValue, RawParams, RunConfig } from "./types.js";
export { ParamName, STDOUT_PATH } from "./types.js";
export { DEFAULT_PARAMS } from "./defaults.js";
export { ENV_PREFIX, paramsFromEnv, logLevelFromEnv } from "./env.js";
export { loadConfig, loadConfigFrom, mergeParams, summarizeConfig } from "./loader.js";
