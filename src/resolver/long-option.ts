import type { Arity, ParseError } from "../types/index";
import { alreadySpecified, ambiguousPrefix, notRecognized, requiresArgument } from "./errors";
import type { ScanState } from "./scan-state";
import { splitLongBody } from "./tokens";

export type LongMatch =
  | { kind: "match"; name: string; arity: Arity }
  | { kind: "none" }
  | { kind: "ambiguous"; candidates: string[] };

/**
 * Match a possibly abbreviated name against the declared long options.
 * An exact match always wins over abbreviations.
 */
export function matchLongOption(name: string, long: ReadonlyMap<string, Arity>): LongMatch {
  const exact = long.get(name);
  if (exact !== undefined) {
    return { kind: "match", name, arity: exact };
  }

  const candidates: string[] = [];
  for (const declared of long.keys()) {
    if (declared.startsWith(name)) candidates.push(declared);
  }

  if (candidates.length === 0) return { kind: "none" };
  if (candidates.length > 1) return { kind: "ambiguous", candidates };

  const [only] = candidates;
  return { kind: "match", name: only, arity: long.get(only) ?? "none" };
}

/**
 * Resolve one long-form token (`--name`, `--name=value`, `//name`) at the
 * current scan position. Returns the error that stops the pass, if any.
 */
export function resolveLongOption(
  text: string,
  long: ReadonlyMap<string, Arity>,
  state: ScanState
): ParseError | null {
  const { name, value } = splitLongBody(text.slice(2));

  const match = matchLongOption(name, long);
  if (match.kind === "none") return notRecognized(name);
  if (match.kind === "ambiguous") return ambiguousPrefix(name, match.candidates);

  const resolved = match.name;
  if (state.options.has(resolved)) return alreadySpecified(resolved);

  switch (match.arity) {
    case "none":
      state.options.set(resolved, true);
      return null;

    case "required": {
      const argument = value ?? state.consumeValue();
      if (argument === undefined) return requiresArgument(resolved);
      state.options.set(resolved, argument);
      return null;
    }

    case "optional":
      state.options.set(resolved, value ?? state.consumeValue(false) ?? true);
      return null;
  }
}
