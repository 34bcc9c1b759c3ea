import type { OptionSpecs, ParseError } from "../types/index";
import { requiresArgument } from "./errors";
import { matchLongOption } from "./long-option";
import type { ScanState } from "./scan-state";
import { isLongForm, isShortForm, splitLongBody } from "./tokens";

export type NormalizeResult = { text: string } | { error: ParseError };

/**
 * Long-only mode: read a single-prefix token as a long option, unless no long
 * option could match it and its first character is a declared short option.
 */
export function rewriteLongOnly(text: string, specs: OptionSpecs): string {
  if (!isShortForm(text)) return text;

  const body = text.slice(1);
  const { name } = splitLongBody(body);
  const first = body[0];

  if (matchLongOption(name, specs.long).kind === "none") {
    const shortFallback = specs.short.has(first) || (specs.wEscape && first === "W");
    if (shortFallback) return text;
  }

  return `--${body}`;
}

/**
 * `-W name` and `-Wname` stand for the long option `name`. Consumes the next
 * token when the name is not inline.
 */
export function rewriteWEscape(text: string, state: ScanState): NormalizeResult {
  if (!isShortForm(text) || text[1] !== "W") return { text };

  const inline = text.slice(2);
  const name = inline.length > 0 ? inline : state.consumeValue(false);

  // The name must make a well-formed long option, e.g. not "" or "=value"
  const rewritten = `--${name ?? ""}`;
  if (!isLongForm(rewritten)) return { error: requiresArgument("W") };
  return { text: rewritten };
}

/**
 * Apply the token rewrites that run before classification.
 */
export function normalizeToken(
  text: string,
  specs: OptionSpecs,
  longOnly: boolean,
  state: ScanState
): NormalizeResult {
  if (!specs.hasLongSpec) return { text };

  let current = text;
  if (longOnly) {
    current = rewriteLongOnly(current, specs);
  }
  if (specs.wEscape && !isLongForm(current)) {
    return rewriteWEscape(current, state);
  }
  return { text: current };
}
