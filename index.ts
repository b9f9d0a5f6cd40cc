#!/usr/bin/env node
/**
 * mfdl
 *
 * Command line front end for the download engine: parses options, shows
 * progress bars while the Scheduler runs and prints a summary at the end.
 *
 * @module index
 * @license MIT
 */

import chalk from "chalk";
import {
  buildProgram,
  completionShell,
  configureLogging,
  resolveRunConfig,
  runInteractiveMode,
  type CliOptions,
  type RunConfig,
} from "./src/cli.js";
import { Scheduler, createHttpClient } from "./src/downloader/index.js";
import type { RunSummary } from "./src/downloader/index.js";
import { generateCompletion } from "./src/utils/completion.js";
import {
  loadDotEnv,
  readPackageVersion,
  showConfiguration,
  showDownloadSummary,
  showHeader,
} from "./src/utils/helpers.js";
import { logger } from "./src/utils/logger.js";
import { closeProgressBars, createProgressObserver } from "./src/utils/progress.js";

const VERSION = readPackageVersion();

function installSignalHandlers(): void {
  let isShuttingDown = false;

  process.on("SIGINT", () => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    closeProgressBars();
    logger.info(chalk.yellow("\n⚠ Interrupted by user (Ctrl+C)"));
    logger.info(chalk.gray("Partial files are kept and resume on the next run"));
    process.exit(130); // 130 = Ctrl+C exit code
  });

  process.on("SIGTERM", () => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    closeProgressBars();
    logger.info(chalk.gray("\n⚠ Received SIGTERM"));
    process.exit(143); // 143 = SIGTERM exit code
  });
}

async function download(config: RunConfig): Promise<RunSummary> {
  const scheduler = new Scheduler({
    dest: config.dest,
    workers: config.workers,
    clean: config.clean,
    maxRetries: config.maxRetries,
    client: createHttpClient(`mfdl/${VERSION}`),
    observer: createProgressObserver(config.urls.length),
  });

  try {
    return await scheduler.run(config.urls);
  } finally {
    closeProgressBars();
  }
}

async function main(): Promise<void> {
  // before parsing, so .env values back the env-aware options
  loadDotEnv();

  const program = buildProgram(VERSION);
  program.parse();
  const options = program.opts<CliOptions>();

  const shell = completionShell(options);
  if (shell) {
    process.stdout.write(generateCompletion(program, shell));
    return;
  }

  configureLogging(options.verbose);
  installSignalHandlers();
  showHeader(VERSION);

  const config = options.interactive
    ? await runInteractiveMode(options)
    : resolveRunConfig(options);
  configureLogging(config.verbose);

  showConfiguration(
    config.urls.length,
    config.dest,
    config.workers,
    config.clean,
    config.maxRetries,
    config.verbose,
  );

  const summary = await download(config);
  showDownloadSummary(summary);
}

main().catch((err: unknown) => {
  closeProgressBars();
  logger.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exit(1);
});
