import "dotenv/config";
import { Command } from "commander";
import { executeParse, EXIT_USAGE_ERROR, type ParseCommandOptions } from "./commands/parse";
import { loadConfig } from "./utils/config";
import { logger } from "./utils/logger";

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const config = loadConfig();
const program = new Command();

program
  .name("optresolve")
  .description("Resolve command-line arguments against getopt-style option specs and print them normalized")
  .version("1.0.0")
  .usage("[options] -- <args...>")
  .option("-o, --options <optstring>", "Short options, e.g. 'f:vxz' (':' required, '::' optional argument)")
  .option("-l, --longoptions <longopts>", "Comma-separated long options, e.g. 'File=,Force' ('=' required, '==' optional)", collect, [])
  .option("-a, --alternative", "Allow long options to start with a single prefix character")
  .option("-n, --name <progname>", "Program name used in error messages", "optresolve")
  .option("-q, --quiet", "Do not report resolution errors")
  .option("-Q, --quiet-output", "Do not print the normalized arguments")
  .option("-u, --unquoted", "Do not quote the output")
  .option("-s, --shell <shell>", "Quoting rules: sh, bash, tcsh or csh", "sh")
  .option("-j, --json", "Print the result as JSON")
  .argument("[args...]", "Arguments to resolve (put them after --)")
  .exitOverride((err) => {
    process.exit(err.exitCode === 0 ? 0 : EXIT_USAGE_ERROR);
  })
  .action((args: string[]) => {
    executeParse(args, program.opts<ParseCommandOptions>(), config);
  });

try {
  program.parse();
} catch (err) {
  logger.fatal("Unexpected failure", err);
  process.exitCode = EXIT_USAGE_ERROR;
}
