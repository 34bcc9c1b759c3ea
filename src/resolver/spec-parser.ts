import type { Arity, OptionSpecs } from "../types/index";

/**
 * Build the short-option arity table from a getopt-style optstring.
 *
 * `c` takes no argument, `c:` a required one and `c::` an optional one.
 * A leading `+` selects POSIX mode and `W;` enables `-W name` passthrough;
 * neither is recorded as an option.
 */
export function parseShortSpec(shortSpec: string = ""): {
  short: Map<string, Arity>;
  posixMode: boolean;
  wEscape: boolean;
} {
  const short = new Map<string, Arity>();
  let posixMode = false;
  let wEscape = false;
  let i = 0;

  if (shortSpec.startsWith("+")) {
    posixMode = true;
    i = 1;
  }

  while (i < shortSpec.length) {
    const c = shortSpec[i];

    if (c === "W" && shortSpec[i + 1] === ";") {
      wEscape = true;
      i += 2;
      continue;
    }

    // Stray markers with no option character in front of them
    if (c === ":" || c === ";") {
      i++;
      continue;
    }

    let arity: Arity = "none";
    if (shortSpec[i + 1] === ":") {
      if (shortSpec[i + 2] === ":") {
        arity = "optional";
        i += 2;
      } else {
        arity = "required";
        i++;
      }
    }

    short.set(c, arity);
    i++;
  }

  return { short, posixMode, wEscape };
}

/**
 * Build the long-option arity table. `name=` takes a required argument,
 * `name==` an optional one.
 */
export function parseLongSpec(longSpec: readonly string[] = []): Map<string, Arity> {
  const long = new Map<string, Arity>();

  for (const entry of longSpec) {
    let name = entry;
    let arity: Arity = "none";

    if (name.endsWith("==")) {
      arity = "optional";
      name = name.slice(0, -2);
    } else if (name.endsWith("=")) {
      arity = "required";
      name = name.slice(0, -1);
    }

    if (name.length === 0) continue;
    long.set(name, arity);
  }

  return long;
}

export function parseOptionSpecs(
  shortSpec?: string,
  longSpec?: readonly string[]
): OptionSpecs {
  const { short, posixMode, wEscape } = parseShortSpec(shortSpec);
  const long = parseLongSpec(longSpec);

  return {
    short,
    long,
    posixMode,
    wEscape,
    hasShortSpec: short.size > 0,
    hasLongSpec: long.size > 0,
  };
}
