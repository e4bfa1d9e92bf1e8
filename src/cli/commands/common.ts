import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import type { Config } from "../../config/schema.js";
import { DLiveDownloader } from "../../downloader/dliveDownloader.js";
import type { Broadcast } from "../../downloader/shared/types.js";
import { formatDuration } from "../../downloader/variants.js";

/**
 * Commander argument parser for positive integers.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

/** Upper bound matching the config schema */
export const MAX_CONCURRENCY = 8;

export function parseConcurrency(value: string): number {
  const parsed = parsePositiveInt(value);
  if (parsed > MAX_CONCURRENCY) {
    throw new InvalidArgumentError(`Expected at most ${MAX_CONCURRENCY}.`);
  }
  return parsed;
}

/**
 * Builds a downloader from the stored configuration.
 */
export function createDownloader(config: Config, concurrency?: number): DLiveDownloader {
  return new DLiveDownloader({
    attempts: config.retryAttempts,
    timeoutMs: config.timeoutMs,
    concurrency: concurrency ?? config.concurrency,
    container: config.container,
    allowInitOnlyPlaylist: config.allowInitOnlyPlaylist,
    ffmpegPath: config.ffmpegPath,
  });
}

/**
 * "2023-11-14 22:13 UTC" style timestamp.
 */
export function formatTimestamp(ms: number): string {
  return `${new Date(ms).toISOString().slice(0, 16).replace("T", " ")} UTC`;
}

export function broadcastUrl(permlink: string): string {
  return `https://dlive.tv/p/${permlink}`;
}

/**
 * Header lines describing a broadcast, without colours.
 */
export function describeBroadcast(broadcast: Broadcast): string[] {
  const lines = [`Creator:  ${broadcast.creatorName}`];
  if (broadcast.durationSeconds !== undefined) {
    lines.push(`Duration: ${formatDuration(broadcast.durationSeconds)}`);
  }
  if (broadcast.createdAtMs !== undefined) {
    lines.push(`Created:  ${formatTimestamp(broadcast.createdAtMs)}`);
  }
  lines.push(`URL:      ${broadcastUrl(broadcast.permlink)}`);
  return lines;
}

export function printBroadcast(broadcast: Broadcast): void {
  console.log(chalk.blue(`\n📺 ${broadcast.title}\n`));
  for (const line of describeBroadcast(broadcast)) {
    console.log(chalk.gray(`   ${line}`));
  }
  console.log();
}
