export { loadConfig, parseConfig, resetConfigCache, sieveScaleFrom } from "./configManager";
export { AppConfigSchema } from "./schema";
export type { AppConfig } from "./schema";
