import type { Options } from "../types/index";
import { looksLikeOption, TERMINATOR } from "./tokens";

/**
 * Cursor shared by the resolution routines for one pass over the input.
 */
export class ScanState {
  readonly options: Options = new Map();
  index = 0;

  constructor(readonly tokens: readonly unknown[]) {}

  get done(): boolean {
    return this.index >= this.tokens.length;
  }

  /**
   * The token after the current one, if it can serve as an option argument:
   * it exists, is text, and does not itself look like an option. The
   * terminator only qualifies when `allowTerminator` is set.
   */
  peekValue(allowTerminator: boolean = true): string | undefined {
    const next = this.tokens[this.index + 1];
    if (typeof next !== "string" || looksLikeOption(next)) return undefined;
    if (!allowTerminator && next === TERMINATOR) return undefined;
    return next;
  }

  /**
   * Take the token after the current one as an option argument.
   */
  consumeValue(allowTerminator: boolean = true): string | undefined {
    const value = this.peekValue(allowTerminator);
    if (value !== undefined) this.index++;
    return value;
  }
}
