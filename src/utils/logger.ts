import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_TAGS: Record<Exclude<LogLevel, "silent">, string> = {
  debug: chalk.gray("DEBUG"),
  info: chalk.cyan(" INFO"),
  warn: chalk.yellow(" WARN"),
  error: chalk.red("ERROR"),
};

let threshold: LogLevel = "info";

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function setVerboseMode(verbose: boolean): void {
  if (verbose) {
    threshold = "debug";
  } else if (threshold === "debug") {
    threshold = "info";
  }
}

function logWith(level: Exclude<LogLevel, "silent">, args: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
    return;
  }
  // stdout is reserved for completion scripts and the summary
  console.error(LEVEL_TAGS[level], ...args);
}

export const logger = {
  debug(...args: unknown[]): void {
    logWith("debug", args);
  },
  info(...args: unknown[]): void {
    logWith("info", args);
  },
  warn(...args: unknown[]): void {
    logWith("warn", args);
  },
  error(...args: unknown[]): void {
    logWith("error", args);
  },
};
