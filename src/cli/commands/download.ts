import chalk from "chalk";
import cliProgress from "cli-progress";
import ora from "ora";
import { loadConfig } from "../../config/configManager.js";
import { resolveOutputDir } from "../../config/paths.js";
import type {
  Broadcast,
  DownloadResult,
  DownloadStage,
  ProgressCallback,
  StreamVariant,
} from "../../downloader/shared/types.js";
import { formatVariant, selectVariant } from "../../downloader/variants.js";
import { setVerbose } from "../../shared/logger.js";
import { createDownloader, printBroadcast } from "./common.js";

export interface DownloadOptions {
  quality?: number;
  outdir?: string;
  filename?: string;
  concurrency?: number;
  verbose?: boolean;
}

const STAGE_LABELS: Record<DownloadStage, string> = {
  segments: "Downloading",
  merge: "Merging",
  remux: "Remuxing",
};

/**
 * One progress bar per stage; a new bar replaces the previous one when the
 * stage changes.
 */
function createStageProgress(): { onProgress: ProgressCallback; stop: () => void } {
  let bar: cliProgress.SingleBar | undefined;
  let currentStage: DownloadStage | undefined;

  const onProgress: ProgressCallback = (completed, total, stage) => {
    if (stage !== currentStage || !bar) {
      bar?.stop();
      bar = new cliProgress.SingleBar(
        {
          format: `   ${STAGE_LABELS[stage].padEnd(11)} {bar} {percentage}% | {value}/{total}`,
          barCompleteChar: "█",
          barIncompleteChar: "░",
          barsize: 30,
          hideCursor: true,
        },
        cliProgress.Presets.shades_grey
      );
      bar.start(total, completed);
      currentStage = stage;
      return;
    }
    bar.update(completed);
  };

  return { onProgress, stop: () => bar?.stop() };
}

/**
 * Downloads one quality of a past broadcast.
 */
export async function downloadCommand(url: string, options: DownloadOptions): Promise<void> {
  setVerbose(options.verbose ?? false);
  const config = loadConfig();
  const downloader = createDownloader(config, options.concurrency);
  const outputDir = resolveOutputDir(options.outdir ?? config.outputDir);

  const spinner = ora("Fetching broadcast metadata...").start();
  let broadcast: Broadcast;
  let variants: StreamVariant[];
  try {
    broadcast = await downloader.fetchBroadcastByUrl(url);
    spinner.text = "Loading available qualities...";
    variants = await downloader.listVariants(broadcast.playbackUrl);
    spinner.succeed("Broadcast found");
  } catch (error) {
    spinner.fail("Could not load broadcast");
    throw error;
  }

  printBroadcast(broadcast);

  const variant = selectVariant(variants, options.quality ?? config.defaultQuality);
  console.log(chalk.white(`   Quality: ${formatVariant(variant, broadcast.durationSeconds)}`));
  console.log(chalk.gray(`   Saving to: ${outputDir}\n`));

  const progress = createStageProgress();
  let result: DownloadResult;
  try {
    result = await downloader.downloadVariant(broadcast, variant, outputDir, {
      filename: options.filename,
      onProgress: progress.onProgress,
    });
  } finally {
    progress.stop();
  }

  console.log(chalk.green(`\n✅ Saved ${result.outputPath}`));
  if (result.remux === "unavailable") {
    console.log(
      chalk.gray(`   ffmpeg was not found; install it to get a .${config.container} file.`)
    );
  } else if (result.remux === "failed") {
    console.log(chalk.gray("   ffmpeg could not remux the stream; the .ts file plays as-is."));
  }
  console.log();
}
