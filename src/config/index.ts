export { ResourcesConfig, CONFIG_FILE_NAME, MODE_ENV_VAR } from "./schema.js";
export { parseConfig, loadConfig, buildSettings, createLocator, writeDefaultConfig } from "./loader.js";
export type { ResourceSettings, SettingsOverrides } from "./loader.js";
