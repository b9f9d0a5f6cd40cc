import chalk from "chalk";
import dotenv from "dotenv";
import fs from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import type { RunSummary } from "../downloader/types.js";
import { getAsciiArt } from "./ascii.js";
import { formatDuration } from "./format.js";
import { logger } from "./logger.js";
import { closeProgressBars } from "./progress.js";

const PACKAGE_NAME = "mfdl";
const ALLOWED_PROTOCOLS = new Set(["http:", "https:"]);

/**
 * Split a comma-separated URL list. Entries are trimmed; empty ones and
 * anything that is not an absolute http(s) URL are dropped with a warning.
 * Duplicates are kept.
 */
export function parseUrlList(raw: string): string[] {
  const urls: string[] = [];

  for (const entry of raw.split(",")) {
    const candidate = entry.trim();
    if (!candidate) continue;

    let parsed: URL;
    try {
      parsed = new URL(candidate);
    } catch {
      logger.warn(chalk.yellow(`Skipping invalid URL: ${candidate}`));
      continue;
    }

    if (!ALLOWED_PROTOCOLS.has(parsed.protocol)) {
      logger.warn(
        chalk.yellow(`Skipping unsupported URL scheme: ${candidate}`),
      );
      continue;
    }
    urls.push(candidate);
  }

  return urls;
}

/**
 * Expand a leading "~" to the user's home directory
 */
export function expandHome(dir: string): string {
  if (dir === "~") {
    return os.homedir();
  }
  if (dir.startsWith("~/") || dir.startsWith(`~${path.sep}`)) {
    return path.join(os.homedir(), dir.slice(2));
  }
  return dir;
}

/**
 * Read KEY=value pairs from a .env file into process.env. Variables that are
 * already set keep their value; a missing file loads nothing.
 *
 * @returns the keys the file defines
 */
export function loadDotEnv(file = ".env"): string[] {
  const result = dotenv.config({ path: file });
  if (result.error) {
    if (!isMissingFile(result.error)) {
      logger.warn(
        chalk.yellow(`Could not load ${file}: ${result.error.message}`),
      );
    }
    return [];
  }
  return Object.keys(result.parsed ?? {});
}

function isMissingFile(error: Error): boolean {
  return "code" in error && error.code === "ENOENT";
}

/**
 * Version from the package.json that ships with this module. Works both from
 * the sources and from dist/, which sit at different depths.
 */
export function readPackageVersion(fallback = "0.0.0"): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));

  for (let depth = 0; depth < 4; depth++) {
    const candidate = path.join(dir, "package.json");
    if (fs.existsSync(candidate)) {
      try {
        const data: unknown = JSON.parse(fs.readFileSync(candidate, "utf8"));
        if (
          typeof data === "object" &&
          data !== null &&
          "name" in data &&
          data.name === PACKAGE_NAME &&
          "version" in data &&
          typeof data.version === "string"
        ) {
          return data.version;
        }
      } catch (error) {
        logger.debug(`Could not read ${candidate}:`, error);
      }
    }
    dir = path.dirname(dir);
  }

  return fallback;
}

export function showHeader(version: string): void {
  console.log(chalk.cyan(getAsciiArt("MFDL")));
  console.log(
    chalk.cyan.bold(`Concurrent HTTP(S) batch downloader (Version ${version})\n`),
  );
}

export function cleanupAfterPromptExit(): void {
  closeProgressBars();
}

export function showConfiguration(
  urlCount: number,
  destination: string,
  workers: number,
  clean: boolean,
  maxRetries: number,
  isVerbose: boolean,
): void {
  console.log(chalk.cyan("Collected inputs:"));
  console.log(chalk.white(`  URLs: ${urlCount}`));
  console.log(chalk.white(`  Directory: ${destination}`));
  console.log(chalk.white(`  Workers: ${workers}`));
  console.log(chalk.white(`  Clean first: ${clean ? "Yes" : "No"}`));
  console.log(chalk.white(`  Max retries on 429: ${maxRetries}`));
  console.log(chalk.white(`  Verbose: ${isVerbose ? "Yes" : "No"}\n`));
}

/**
 * The one-line run summary printed after the progress bars close
 */
export function summaryLine(summary: RunSummary): string {
  return `Downloaded ${summary.finishedFiles} files of size ${summary.totalSize} to ${summary.destination} using ${summary.workers} workers`;
}

export function showDownloadSummary(summary: RunSummary): void {
  const completed = summary.finishedFiles - summary.skippedFiles;

  console.log(chalk.cyan(`\n========================================`));
  console.log(chalk.cyan(`Download Summary:`));
  console.log(chalk.green(`  Downloaded: ${completed}`));
  if (summary.skippedFiles > 0) {
    console.log(chalk.yellow(`  Already present: ${summary.skippedFiles}`));
  }
  if (summary.failedFiles > 0) {
    console.log(chalk.red(`  Failed: ${summary.failedFiles}`));
    for (const result of summary.results) {
      if (result.outcome === "failed") {
        console.log(
          chalk.red(`    ${result.job.url}: ${result.error?.message ?? "unknown error"}`),
        );
      }
    }
  }
  console.log(chalk.white(`  Time: ${formatDuration(summary.durationMs)}`));
  console.log(chalk.cyan(`========================================`));
  console.log(summaryLine(summary));
}
