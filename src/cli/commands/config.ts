import chalk from "chalk";
import { getConfigPath, loadConfig, setConfigValue } from "../../config/configManager.js";
import { CONFIG_KEYS, coerceConfigValue, isConfigKey, type ConfigKey } from "../../config/schema.js";
import { ValidationError } from "../../downloader/shared/errors.js";

function requireConfigKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new ValidationError(`Unknown config key: ${key}`, `Valid keys: ${CONFIG_KEYS.join(", ")}`);
  }
  return key;
}

/**
 * Shows all current configuration values.
 */
export async function configShowCommand(): Promise<void> {
  const config = loadConfig();

  console.log(chalk.blue("\n⚙️  Configuration\n"));
  console.log(chalk.gray(`   File: ${getConfigPath()}\n`));

  for (const [key, value] of Object.entries(config)) {
    console.log(`   ${chalk.cyan(key)}: ${chalk.white(String(value))}`);
  }
  console.log();
}

/**
 * Sets a configuration value.
 */
export async function configSetCommand(key: string, value: string): Promise<void> {
  const configKey = requireConfigKey(key);
  const updated = setConfigValue(configKey, coerceConfigValue(configKey, value));
  console.log(chalk.green(`\n✅ Set ${configKey} = ${String(updated[configKey])}\n`));
}

/**
 * Gets a specific configuration value.
 */
export async function configGetCommand(key: string): Promise<void> {
  console.log(String(loadConfig()[requireConfigKey(key)]));
}
