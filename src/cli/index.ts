/**
 * CLI Library Module
 *
 * Output rendering and usage errors for the command-line front end.
 */

export { formatCommandLine, formatJson, type FormatOptions } from "./format";
export { quoteForShell, resolveShell, type ShellFlavor } from "./quote";
export { CommandError } from "./errors";
