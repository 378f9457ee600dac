export { loadConfig, deepMerge, DEFAULT_CONFIG_FILE } from "./load-config.js";
export type { LoadConfigOptions, LoadedConfig } from "./load-config.js";
export { envSchema, parseEnv, envToConfigLayer } from "./env.js";
export type { EnvOverrides } from "./env.js";
export { appConfigSchema } from "./schema.js";
export { DEFAULT_CONFIG } from "./defaults.js";
