export { configSchema, type AppConfig, type ProviderId } from "./schema.js";
export { loadConfig, loadConfigSourceSnapshots, parseConfig } from "./loader.js";
export { ConfigError } from "./errors.js";
