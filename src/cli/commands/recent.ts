import chalk from "chalk";
import ora from "ora";
import { loadConfig } from "../../config/configManager.js";
import type { Broadcast } from "../../downloader/shared/types.js";
import { formatDuration } from "../../downloader/variants.js";
import { setVerbose } from "../../shared/logger.js";
import { broadcastUrl, createDownloader, formatTimestamp } from "./common.js";

export interface RecentOptions {
  limit?: number;
  verbose?: boolean;
}

/**
 * Lists a channel's most recent past broadcasts.
 */
export async function recentCommand(channel: string, options: RecentOptions): Promise<void> {
  setVerbose(options.verbose ?? false);
  const downloader = createDownloader(loadConfig());

  const spinner = ora(`Looking up ${channel}...`).start();
  let broadcasts: Broadcast[];
  try {
    broadcasts = await downloader.listRecentBroadcasts(channel, options.limit);
    spinner.succeed(`${broadcasts.length} recent broadcast(s) from ${channel}`);
  } catch (error) {
    spinner.fail(`Could not list broadcasts of ${channel}`);
    throw error;
  }

  console.log();
  for (const [i, broadcast] of broadcasts.entries()) {
    const meta = [
      broadcast.durationSeconds !== undefined ? formatDuration(broadcast.durationSeconds) : "",
      broadcast.createdAtMs !== undefined ? formatTimestamp(broadcast.createdAtMs) : "",
    ].filter(Boolean);

    console.log(`   ${chalk.cyan(`${i + 1}.`)} ${chalk.white(broadcast.title)}`);
    if (meta.length > 0) {
      console.log(chalk.gray(`      ${meta.join(" · ")}`));
    }
    console.log(chalk.gray(`      ${broadcastUrl(broadcast.permlink)}`));
  }
  console.log();
}
