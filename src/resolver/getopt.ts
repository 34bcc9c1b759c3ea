import type {
  OptionSpecs,
  OptionValue,
  Options,
  ParseError,
  ParseOutcome,
  ResolveRequest,
  ResolverConfig,
} from "../types/index";
import { createContextLogger } from "../utils/logger";
import { resolveLongOption } from "./long-option";
import { normalizeToken } from "./normalizer";
import { ScanState } from "./scan-state";
import { resolveShortCluster } from "./short-option";
import { parseOptionSpecs } from "./spec-parser";
import { isLongForm, isShortForm, TERMINATOR, toToken } from "./tokens";

const log = createContextLogger({ component: "resolver" });

function isPresent<T>(value: T): value is NonNullable<T> {
  return value !== null && value !== undefined;
}

/**
 * Resolve one text token. Positional tokens are pushed onto `remaining`.
 */
function resolveText<T>(
  text: string,
  specs: OptionSpecs,
  longOnly: boolean,
  state: ScanState,
  remaining: Array<NonNullable<T>>,
  raw: NonNullable<T>
): ParseError | null {
  const normalized = normalizeToken(text, specs, longOnly, state);
  if ("error" in normalized) return normalized.error;

  const current = normalized.text;
  if (specs.hasLongSpec && isLongForm(current)) {
    return resolveLongOption(current, specs.long, state);
  }
  if (specs.hasShortSpec && isShortForm(current)) {
    return resolveShortCluster(current, specs.short, state);
  }

  remaining.push(raw);
  return null;
}

/**
 * Resolve `tokens` against the declared short and long options in one
 * left-to-right pass.
 *
 * The first error stops the pass; the options and positional values collected
 * up to that point are returned alongside it.
 *
 * @example
 * resolveOptions({ tokens: ["-dvvv", "out.txt"], shortSpec: "dv" })
 * // => { ok: true, options: Map { "d" => true, "v" => 3 }, remaining: ["out.txt"] }
 */
export function resolveOptions<T>(request: ResolveRequest<T>): ParseOutcome<T> {
  const specs = parseOptionSpecs(request.shortSpec, request.longSpec);
  const longOnly = request.longOnly ?? false;
  const posix = specs.posixMode || (request.posixlyCorrect ?? false);

  const { tokens } = request;
  const state = new ScanState(tokens);
  const remaining: Array<NonNullable<T>> = [];

  const takeRest = (from: number) => {
    for (let k = from; k < tokens.length; k++) {
      const value = tokens[k];
      if (isPresent(value)) remaining.push(value);
    }
  };

  for (; !state.done; state.index++) {
    const raw = tokens[state.index];
    if (!isPresent(raw)) continue;

    const token = toToken(raw);

    if (token.kind === "opaque") {
      remaining.push(raw);
    } else if (token.value === TERMINATOR) {
      takeRest(state.index + 1);
      break;
    } else {
      const error = resolveText(token.value, specs, longOnly, state, remaining, raw);
      if (error) {
        log.debug("Option resolution stopped", { index: state.index, kind: error.kind, name: error.name });
        return { ok: false, options: state.options, remaining, error };
      }
    }

    if (posix && remaining.length > 0) {
      takeRest(state.index + 1);
      break;
    }
  }

  log.trace("Options resolved", { options: state.options.size, remaining: remaining.length });
  return { ok: true, options: state.options, remaining };
}

/**
 * Short options only.
 */
export function getopt<T>(
  tokens: readonly T[],
  shortSpec: string,
  config: ResolverConfig = {}
): ParseOutcome<T> {
  return resolveOptions({ ...config, tokens, shortSpec, longOnly: false });
}

export function getoptLong<T>(
  tokens: readonly T[],
  shortSpec: string,
  longSpec: readonly string[],
  config: ResolverConfig = {}
): ParseOutcome<T> {
  return resolveOptions({ ...config, tokens, shortSpec, longSpec, longOnly: false });
}

/**
 * Single-prefix tokens are tried as long options first and fall back to short
 * options when no long option could match.
 */
export function getoptLongOnly<T>(
  tokens: readonly T[],
  shortSpec: string,
  longSpec: readonly string[],
  config: ResolverConfig = {}
): ParseOutcome<T> {
  return resolveOptions({ ...config, tokens, shortSpec, longSpec, longOnly: true });
}

/**
 * Plain-object view of resolved options, in resolution order.
 */
export function optionsToRecord(options: Options): Record<string, OptionValue> {
  return Object.fromEntries(options);
}
