import type { Token } from "../types/index";

export const PREFIX_CHARS: ReadonlySet<string> = new Set(["-", "/", "+"]);

export const TERMINATOR = "--";

export function isPrefixChar(c: string | undefined): boolean {
  return c !== undefined && PREFIX_CHARS.has(c);
}

/**
 * Tag a present input value.
 */
export function toToken(value: NonNullable<unknown>): Token {
  if (typeof value === "string") return { kind: "text", value };
  return { kind: "opaque", value };
}

/**
 * `-x`, `/x`, `+xyz`: one prefix character followed by a non-prefix character.
 */
export function isShortForm(text: string): boolean {
  return text.length >= 2 && isPrefixChar(text[0]) && !isPrefixChar(text[1]);
}

/**
 * `--name`, `--name=value`, `//name`, `++name`: a doubled prefix followed by
 * a non-empty name.
 */
export function isLongForm(text: string): boolean {
  return (
    text.length > 2 &&
    isPrefixChar(text[0]) &&
    text[1] === text[0] &&
    !isPrefixChar(text[2]) &&
    text[2] !== "=" &&
    text[2] !== ":"
  );
}

/**
 * Whether a raw value looks like another option when seen as a candidate
 * option argument.
 */
export function looksLikeOption(value: unknown): boolean {
  return typeof value === "string" && (isShortForm(value) || isLongForm(value));
}

/**
 * Split the body of a long-form token (prefix already removed) at the first
 * `=` or `:`.
 */
export function splitLongBody(body: string): { name: string; value?: string } {
  for (let i = 0; i < body.length; i++) {
    if (body[i] === "=" || body[i] === ":") {
      return { name: body.slice(0, i), value: body.slice(i + 1) };
    }
  }
  return { name: body };
}
