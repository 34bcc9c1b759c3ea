import chalk from "chalk";
import { CommandError, formatCommandLine, formatJson, resolveShell } from "../cli";
import { formatError, parseShortSpec, resolveOptions } from "../resolver";
import type { AppConfig } from "../utils/config";
import { logger } from "../utils/logger";

export const EXIT_OK = 0;
export const EXIT_PARSE_ERROR = 1;
export const EXIT_USAGE_ERROR = 2;

/**
 * Option values as commander hands them to the action.
 */
export type ParseCommandOptions = {
  options?: string;
  longoptions?: string[];
  alternative?: boolean;
  name?: string;
  quiet?: boolean;
  quietOutput?: boolean;
  unquoted?: boolean;
  shell?: string;
  json?: boolean;
};

export interface ParseCommandResult {
  exitCode: number;
  stdout?: string;
  stderr?: string;
}

/**
 * Split `-l` values such as "File=,Force" into long-spec entries.
 */
export function splitLongOptions(values: readonly string[] = []): string[] {
  return values
    .flatMap((value) => value.split(","))
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Resolve `args` and render the outcome. Throws CommandError on bad usage.
 */
export function runParse(
  args: readonly string[],
  options: ParseCommandOptions,
  config: Pick<AppConfig, "posixlyCorrect">
): ParseCommandResult {
  const shell = resolveShell(options.shell ?? "sh");
  if (shell === undefined) {
    throw new CommandError(`unknown shell: ${options.shell}`, EXIT_USAGE_ERROR);
  }

  const shortSpec = options.options ?? "";
  const longSpec = splitLongOptions(options.longoptions);

  logger.debug("Resolving arguments", {
    shortSpec,
    longSpec,
    longOnly: options.alternative ?? false,
    posixlyCorrect: config.posixlyCorrect,
    count: args.length,
  });

  const outcome = resolveOptions({
    tokens: args,
    shortSpec,
    longSpec,
    longOnly: options.alternative ?? false,
    posixlyCorrect: config.posixlyCorrect,
  });

  if (!outcome.ok) {
    return {
      exitCode: EXIT_PARSE_ERROR,
      stderr: options.quiet ? undefined : formatError(outcome.error, options.name ?? "optresolve"),
    };
  }

  if (options.quietOutput) {
    return { exitCode: EXIT_OK };
  }

  const stdout = options.json
    ? formatJson(outcome.options, outcome.remaining)
    : formatCommandLine(outcome.options, outcome.remaining, parseShortSpec(shortSpec).short, {
        shell,
        unquoted: options.unquoted,
      });

  return { exitCode: EXIT_OK, stdout };
}

/**
 * CLI action: write the result and set the process exit code.
 */
export function executeParse(
  args: readonly string[],
  options: ParseCommandOptions,
  config: Pick<AppConfig, "posixlyCorrect">
): void {
  let result: ParseCommandResult;

  try {
    result = runParse(args, options, config);
  } catch (err) {
    if (err instanceof CommandError) {
      console.error(chalk.red(`${options.name ?? "optresolve"}: ${err.message}`));
      process.exitCode = err.exitCode;
      return;
    }
    throw err;
  }

  if (result.stderr !== undefined) {
    console.error(chalk.red(result.stderr));
  }
  if (result.stdout !== undefined) {
    console.log(result.stdout);
  }
  process.exitCode = result.exitCode;
}
