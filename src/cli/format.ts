import type { Arity, OptionValue, Options } from "../types/index";
import { quoteForShell, type ShellFlavor } from "./quote";

export interface FormatOptions {
  shell?: ShellFlavor;
  /**
   * Emit values without any shell quoting.
   */
  unquoted?: boolean;
}

function renderValue(value: unknown, format: FormatOptions): string {
  const text = typeof value === "string" ? value : JSON.stringify(value);
  return format.unquoted ? text : quoteForShell(text, format.shell);
}

function renderOption(
  name: string,
  value: OptionValue,
  short: ReadonlyMap<string, Arity>,
  format: FormatOptions
): string[] {
  const flag = name.length === 1 && short.has(name) ? `-${name}` : `--${name}`;

  if (value === true) return [flag];
  if (typeof value === "number") return Array.from({ length: value }, () => flag);
  return [flag, renderValue(value, format)];
}

/**
 * Render resolved options and positional values as one normalized command
 * line: every option in resolution order, then `--`, then the positionals.
 *
 * @example
 * formatCommandLine(new Map([["v", 2], ["f", "a b"]]), ["x"], short)
 * // => "-v -v -f 'a b' -- 'x'"
 */
export function formatCommandLine(
  options: Options,
  remaining: readonly unknown[],
  short: ReadonlyMap<string, Arity>,
  format: FormatOptions = {}
): string {
  const parts: string[] = [];

  for (const [name, value] of options) {
    parts.push(...renderOption(name, value, short, format));
  }

  parts.push("--");
  for (const value of remaining) {
    parts.push(renderValue(value, format));
  }

  return parts.join(" ");
}

export function formatJson(options: Options, remaining: readonly unknown[]): string {
  return JSON.stringify({ options: Object.fromEntries(options), remaining });
}
