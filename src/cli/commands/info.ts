import chalk from "chalk";
import ora from "ora";
import { loadConfig } from "../../config/configManager.js";
import { formatVariant } from "../../downloader/variants.js";
import { setVerbose } from "../../shared/logger.js";
import { createDownloader, printBroadcast } from "./common.js";

export interface InfoOptions {
  verbose?: boolean;
}

/**
 * Shows broadcast metadata and the numbered list of qualities.
 */
export async function infoCommand(url: string, options: InfoOptions): Promise<void> {
  setVerbose(options.verbose ?? false);
  const downloader = createDownloader(loadConfig());

  const spinner = ora("Fetching broadcast metadata...").start();
  try {
    const broadcast = await downloader.fetchBroadcastByUrl(url);
    spinner.text = "Loading available qualities...";
    const variants = await downloader.listVariants(broadcast.playbackUrl);
    spinner.stop();

    printBroadcast(broadcast);
    console.log(chalk.white("   Available qualities:"));
    for (const variant of variants) {
      console.log(
        `   ${chalk.cyan(`${variant.index}.`)} ${formatVariant(variant, broadcast.durationSeconds)}`
      );
    }
    console.log();
  } catch (error) {
    spinner.fail("Could not load broadcast");
    throw error;
  }
}
