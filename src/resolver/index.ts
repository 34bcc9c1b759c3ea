/**
 * Option Resolver
 *
 * getopt-style resolution of command-line tokens into named options and
 * positional values, with GNU long options, abbreviations, long-only mode,
 * `-W` passthrough and POSIX early termination.
 */

export { resolveOptions, getopt, getoptLong, getoptLongOnly, optionsToRecord } from "./getopt";
export { parseOptionSpecs, parseShortSpec, parseLongSpec } from "./spec-parser";
export { matchLongOption, type LongMatch } from "./long-option";
export {
  formatError,
  requiresArgument,
  alreadySpecified,
  notRecognized,
  ambiguousPrefix,
} from "./errors";
