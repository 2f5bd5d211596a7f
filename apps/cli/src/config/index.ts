export { loadConfig, resetConfigCache, DEFAULT_CONFIG_PATH } from "./configManager";
export { AppConfigSchema } from "./schema";
export type { AppConfig } from "./schema";
