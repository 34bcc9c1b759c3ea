import type { ParseError } from "../types/index";

export function requiresArgument(name: string): ParseError {
  return { kind: "RequiresArgument", name, message: `Option "${name}" requires an argument` };
}

export function alreadySpecified(name: string): ParseError {
  return { kind: "AlreadySpecified", name, message: `Option "${name}" already specified` };
}

export function notRecognized(name: string): ParseError {
  return { kind: "NotRecognized", name, message: `Option "${name}" not recognized` };
}

export function ambiguousPrefix(name: string, candidates: string[]): ParseError {
  return {
    kind: "AmbiguousPrefix",
    name,
    candidates,
    message: `Option "${name}" is ambiguous (${candidates.join(", ")})`,
  };
}

/**
 * Render an error for display, optionally prefixed with a program name.
 */
export function formatError(error: ParseError, programName?: string): string {
  return programName ? `${programName}: ${error.message}` : error.message;
}
