import { Command, InvalidArgumentError, Option } from "commander";
import chalk from "chalk";
import { DownloaderError } from "./downloader/errors.js";
import { DEFAULT_MAX_RETRIES } from "./downloader/retry.js";
import {
  COMPLETION_SHELLS,
  PromptType,
  type CompletionShell,
} from "./types/enums.js";
import {
  cleanupAfterPromptExit,
  expandHome,
  parseUrlList,
} from "./utils/helpers.js";
import { isLogLevel, logger, setLogLevel, setVerboseMode } from "./utils/logger.js";
import { prompt } from "./utils/prompt.js";

export const DEFAULT_WORKERS = 8;
export const DEFAULT_DEST = ".";

/** Parsed command line, after env and defaults were applied */
export type CliOptions = {
  urls?: string;
  dest: string;
  workers: number;
  clean: boolean;
  maxRetries: number;
  verbose: boolean;
  interactive: boolean;
  completion?: CompletionShell;
  compl?: CompletionShell;
  generateCompletions?: CompletionShell;
};

/** Everything a run needs */
export interface RunConfig {
  urls: string[];
  dest: string;
  workers: number;
  clean: boolean;
  maxRetries: number;
  verbose: boolean;
}

/**
 * Argument parser for integer options with a lower bound
 */
export function integerArg(label: string, min: number) {
  return (value: string): number => {
    const trimmed = value.trim();
    const parsed = Number(trimmed);
    if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(
        `${label} must be an integer >= ${min}, got "${value}".`,
      );
    }
    return parsed;
  };
}

export function buildProgram(version: string): Command {
  const program = new Command();

  program
    .name("mfdl")
    .description("Download a batch of HTTP(S) URLs concurrently, resuming partial files")
    .version(version)
    .addOption(
      new Option("-u, --urls <list>", "Comma-separated list of URLs to download"),
    )
    .addOption(
      new Option("-d, --dest <path>", "Destination directory")
        .env("MFDL_DEST")
        .default(DEFAULT_DEST),
    )
    .addOption(
      new Option("-w, --workers <n>", "Maximum number of concurrent downloads")
        .env("MFDL_WORKERS")
        .default(DEFAULT_WORKERS)
        .argParser(integerArg("Workers", 1)),
    )
    .addOption(
      new Option("-c, --clean", "Remove the destination directory before starting")
        .default(false),
    )
    .addOption(
      new Option(
        "-r, --max-retries <n>",
        "Retries per request when the server answers 429 Too Many Requests",
      )
        .env("MFDL_MAX_RETRIES")
        .default(DEFAULT_MAX_RETRIES)
        .argParser(integerArg("Max retries", 0)),
    )
    .addOption(
      new Option("-v, --verbose", "Show verbose debug output")
        .env("MFDL_VERBOSE")
        .default(false),
    )
    .addOption(
      new Option(
        "-i, --interactive",
        "Interactive mode: prompt for all options (flags provided will be pre-filled)",
      ).default(false),
    )
    .addOption(
      new Option("--completion <shell>", "Print a shell completion script and exit")
        .choices(COMPLETION_SHELLS),
    )
    .addOption(
      new Option("--compl <shell>", "Alias of --completion")
        .choices(COMPLETION_SHELLS)
        .hideHelp(),
    )
    .addOption(
      new Option("--generate-completions <shell>", "Alias of --completion")
        .choices(COMPLETION_SHELLS)
        .hideHelp(),
    )
    .configureHelp({
      helpWidth: 80,
    })
    .addHelpText(
      "after",
      `
    Examples:
    - Two files into ./downloads: mfdl -u https://example.com/a.iso,https://example.com/b.iso -d ./downloads
    - Four workers, fresh directory: mfdl -u <list> -d ./downloads -w 4 -c
    - Interactive mode: mfdl -i
    - Bash completion: mfdl --completion bash > /etc/bash_completion.d/mfdl
    - Partial files are kept as <name>.part and resumed on the next run
      `,
    );

  return program;
}

/**
 * Shell asked for by --completion or one of its aliases
 */
export function completionShell(
  options: CliOptions,
): CompletionShell | undefined {
  return options.completion ?? options.compl ?? options.generateCompletions;
}

/**
 * Log threshold: verbose wins, then MFDL_LOG_LEVEL, then info
 */
export function configureLogging(
  verbose: boolean,
  envLevel: string | undefined = process.env.MFDL_LOG_LEVEL,
): void {
  if (envLevel) {
    const level = envLevel.trim().toLowerCase();
    if (isLogLevel(level)) {
      setLogLevel(level);
    } else {
      logger.warn(chalk.yellow(`Ignoring unknown MFDL_LOG_LEVEL "${envLevel}"`));
    }
  }
  setVerboseMode(verbose);
}

/**
 * Turn parsed flags into a run configuration. An empty URL list is fatal.
 */
export function resolveRunConfig(options: CliOptions): RunConfig {
  const urls = parseUrlList(options.urls ?? "");
  if (urls.length === 0) {
    throw new DownloaderError(
      "No valid URLs given. Pass them with -u, --urls <list> or use -i.",
    );
  }

  return {
    urls,
    dest: expandHome(options.dest),
    workers: options.workers,
    clean: options.clean,
    maxRetries: options.maxRetries,
    verbose: options.verbose,
  };
}

/**
 * Interactive mode: prompts user for all configuration options.
 * Pre-fills values from command line flags if provided.
 */
export async function runInteractiveMode(
  initialOptions: CliOptions,
): Promise<RunConfig> {
  console.log(chalk.cyan("\nInteractive Mode\n"));
  console.log(
    chalk.gray("Press Enter to accept default values shown in brackets.\n"),
  );

  const rawUrls = await prompt({
    type: PromptType.Input,
    message: "URLs (comma-separated):",
    default: initialOptions.urls || "",
    validate: (value) => {
      if (!value || value.trim() === "") {
        return "At least one URL is required";
      }
      return true;
    },
    cleanup: cleanupAfterPromptExit,
  });

  const dest = await prompt({
    type: PromptType.Input,
    message: "Download directory:",
    default: initialOptions.dest,
    validate: (value) => {
      if (!value || value.trim() === "") {
        return "Download directory is required";
      }
      return true;
    },
    cleanup: cleanupAfterPromptExit,
  });

  const workers = await prompt({
    type: PromptType.Number,
    message: "Number of concurrent downloads:",
    default: initialOptions.workers,
    min: 1,
    cleanup: cleanupAfterPromptExit,
  });

  const clean = await prompt({
    type: PromptType.Confirm,
    message: "Remove the destination directory first?",
    default: initialOptions.clean,
    cleanup: cleanupAfterPromptExit,
  });

  const maxRetries = await prompt({
    type: PromptType.Number,
    message: "Retries when throttled (429):",
    default: initialOptions.maxRetries,
    min: 0,
    cleanup: cleanupAfterPromptExit,
  });

  const verbose = await prompt({
    type: PromptType.Confirm,
    message: "Enable verbose output?",
    default: initialOptions.verbose,
    cleanup: cleanupAfterPromptExit,
  });

  return resolveRunConfig({
    ...initialOptions,
    urls: rawUrls,
    dest: dest.trim(),
    workers: workers ?? initialOptions.workers,
    clean,
    maxRetries: maxRetries ?? initialOptions.maxRetries,
    verbose,
  });
}
