import { confirm, input, number } from "@inquirer/prompts";
import chalk from "chalk";
import { PromptType } from "../types/enums.js";
import { logger } from "./logger.js";

type CleanupFn = () => Promise<void> | void;

type BasePromptOptions = {
  message: string;
  cleanup?: CleanupFn;
};

type InputPromptOptions = BasePromptOptions & {
  type: PromptType.Input;
  default?: string;
  validate?: (value: string) => boolean | string;
};

type NumberPromptOptions = BasePromptOptions & {
  type: PromptType.Number;
  default?: number;
  min?: number;
  max?: number;
};

type ConfirmPromptOptions = BasePromptOptions & {
  type: PromptType.Confirm;
  default?: boolean;
};

export type PromptOptions =
  | InputPromptOptions
  | NumberPromptOptions
  | ConfirmPromptOptions;

function isExitPromptError(error: unknown): boolean {
  return error instanceof Error && error.name === "ExitPromptError";
}

async function handlePromptExit(cleanup?: CleanupFn): Promise<never> {
  logger.info(chalk.yellow("\n\n⚠ Prompt cancelled by user (Ctrl+C)"));
  logger.info(chalk.gray("Cleaning up resources..."));
  if (cleanup) {
    await cleanup();
  }
  logger.info(chalk.gray("Exiting..."));
  process.exit(130);
}

export async function prompt(options: InputPromptOptions): Promise<string>;
export async function prompt(
  options: NumberPromptOptions,
): Promise<number | undefined>;
export async function prompt(options: ConfirmPromptOptions): Promise<boolean>;
export async function prompt(
  options: PromptOptions,
): Promise<string | number | boolean | undefined> {
  try {
    switch (options.type) {
      case PromptType.Input:
        return await input({
          message: options.message,
          default: options.default,
          validate: options.validate,
        });
      case PromptType.Number:
        return await number({
          message: options.message,
          default: options.default,
          min: options.min,
          max: options.max,
        });
      case PromptType.Confirm:
        return await confirm({
          message: options.message,
          default: options.default,
        });
    }
  } catch (error) {
    if (isExitPromptError(error)) {
      await handlePromptExit(options.cleanup);
    }
    throw error;
  }
}
