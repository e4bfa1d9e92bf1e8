import Conf from "conf";
import { APP_DIR } from "./paths.js";
import { CONFIG_DEFAULTS, parseConfig, type Config, type ConfigKey } from "./schema.js";

/**
 * Application configuration store using conf package.
 * Provides atomic writes, dot-notation access, and safe defaults.
 */
const store = new Conf<Config>({
  projectName: "dlive-vod",
  cwd: APP_DIR,
  configName: "config",
  defaults: CONFIG_DEFAULTS,
});

/**
 * Loads the application configuration.
 * Returns validated config with defaults applied.
 */
export function loadConfig(): Config {
  return parseConfig(store.store, `configuration in ${store.path}`);
}

/**
 * Sets one value after validating the resulting configuration.
 */
export function setConfigValue(key: ConfigKey, value: unknown): Config {
  const updated = parseConfig({ ...loadConfig(), [key]: value }, `value for ${key}`);
  store.store = updated;
  return updated;
}

/**
 * Gets a specific config value.
 */
export function getConfigValue<K extends ConfigKey>(key: K): Config[K] {
  return loadConfig()[key];
}

/**
 * Gets the path to the config file.
 */
export function getConfigPath(): string {
  return store.path;
}
