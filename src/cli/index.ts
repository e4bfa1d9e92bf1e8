#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import { DownloaderError } from "../downloader/shared/errors.js";
import { parseConcurrency, parsePositiveInt } from "./commands/common.js";
import { configGetCommand, configSetCommand, configShowCommand } from "./commands/config.js";
import { downloadCommand, type DownloadOptions } from "./commands/download.js";
import { infoCommand, type InfoOptions } from "./commands/info.js";
import { recentCommand, type RecentOptions } from "./commands/recent.js";

// Global error handler to ensure clean exit
process.on("unhandledRejection", (reason) => {
  console.error(chalk.red("\n❌ Unhandled error"));
  if (reason instanceof Error) {
    console.error(chalk.gray(`   ${reason.message}`));
  }
  process.exit(1);
});

// Helper to wrap async actions and handle errors
function wrapAction<T extends unknown[]>(fn: (...args: T) => Promise<void>): (...args: T) => void {
  return (...args: T) => {
    fn(...args).catch((error: unknown) => {
      if (error instanceof DownloaderError) {
        console.error(chalk.red(`\n❌ ${error.message}`));
        if (error.details) {
          console.error(chalk.gray(`   ${error.details}`));
        }
        process.exit(1);
      }
      console.error(chalk.red("\n❌ Command failed"));
      if (error instanceof Error) {
        console.error(chalk.gray(`   ${error.message}`));
      }
      process.exit(1);
    });
  };
}

const program = new Command();

program
  .name("dlive-vod")
  .description("Download DLive past broadcasts for offline viewing")
  .version("0.1.0");

program
  .command("info <url>")
  .description("Show broadcast details and available qualities")
  .option("-v, --verbose", "Print debug output")
  .action(wrapAction((url: string, options: InfoOptions) => infoCommand(url, options)));

program
  .command("download <url>")
  .description("Download a past broadcast")
  .option("-q, --quality <index>", "Quality number as listed by `info`", parsePositiveInt)
  .option("-o, --outdir <dir>", "Output directory (default: config outputDir)")
  .option("-f, --filename <name>", "Output file name")
  .option("-c, --concurrency <n>", "Parallel segment downloads (1-8)", parseConcurrency)
  .option("-v, --verbose", "Print debug output")
  .action(wrapAction((url: string, options: DownloadOptions) => downloadCommand(url, options)));

program
  .command("recent <channel>")
  .description("List a channel's recent past broadcasts")
  .option("-n, --limit <n>", "Number of broadcasts to list", parsePositiveInt)
  .option("-v, --verbose", "Print debug output")
  .action(
    wrapAction((channel: string, options: RecentOptions) => recentCommand(channel, options))
  );

// Config commands
const configCmd = program.command("config").description("Manage configuration");

configCmd
  .command("show")
  .description("Show all configuration values")
  .action(wrapAction(configShowCommand));

configCmd
  .command("get <key>")
  .description("Get a configuration value")
  .action(wrapAction((key: string) => configGetCommand(key)));

configCmd
  .command("set <key> <value>")
  .description("Set a configuration value")
  .action(wrapAction((key: string, value: string) => configSetCommand(key, value)));

// Parse and run
program.parse();
