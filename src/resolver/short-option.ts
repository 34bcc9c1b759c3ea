import type { Arity, ParseError } from "../types/index";
import { alreadySpecified, notRecognized, requiresArgument } from "./errors";
import type { ScanState } from "./scan-state";

/**
 * Resolve a short-option cluster such as `-xzvf` or `/dvvv` at the current
 * scan position. Entries written before an error are kept.
 */
export function resolveShortCluster(
  text: string,
  short: ReadonlyMap<string, Arity>,
  state: ScanState
): ParseError | null {
  let j = 1;

  while (j < text.length) {
    const c = text[j];
    const arity = short.get(c);

    if (arity === undefined) return notRecognized(c);
    if (state.options.has(c)) return alreadySpecified(c);

    if (arity === "none") {
      let run = 1;
      while (text[j + run] === c) run++;
      state.options.set(c, run > 1 ? run : true);
      j += run;
      continue;
    }

    // Inline values are only taken when the option opens the cluster
    if (j === 1 && text.length > 2) {
      state.options.set(c, text.slice(2));
      return null;
    }

    // An optional argument never swallows the terminator
    const argument = state.consumeValue(arity === "required");
    if (argument !== undefined) {
      state.options.set(c, argument);
    } else if (arity === "optional") {
      state.options.set(c, true);
    } else {
      return requiresArgument(c);
    }
    // A value-bearing option ends the cluster
    return null;
  }

  return null;
}
