/**
 * Console logging with chalk colouring.
 * Debug output is hidden unless verbose mode is switched on (CLI --verbose).
 */
import chalk from "chalk";

let verbose = false;

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export const logger = {
  debug(message: string): void {
    if (verbose) {
      console.error(chalk.gray(`[debug] ${message}`));
    }
  },

  info(message: string): void {
    console.log(message);
  },

  warn(message: string): void {
    console.warn(chalk.yellow(`⚠️  ${message}`));
  },

  error(message: string): void {
    console.error(chalk.red(`❌ ${message}`));
  },
};
