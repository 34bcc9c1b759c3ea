export type Arity = "none" | "required" | "optional";

/**
 * A single input token, decided once per call.
 * Opaque tokens are never read as options.
 */
export type Token =
  | { kind: "text"; value: string }
  | { kind: "opaque"; value: unknown };

export type OptionValue = true | string | number;

/**
 * Resolved options in resolution order.
 */
export type Options = Map<string, OptionValue>;

export type ParseErrorKind =
  | "RequiresArgument"
  | "AlreadySpecified"
  | "NotRecognized"
  | "AmbiguousPrefix";

export type ParseError =
  | { kind: "RequiresArgument"; name: string; message: string }
  | { kind: "AlreadySpecified"; name: string; message: string }
  | { kind: "NotRecognized"; name: string; message: string }
  | {
      kind: "AmbiguousPrefix";
      name: string;
      /**
       * Every declared long option the abbreviation could stand for.
       */
      candidates: string[];
      message: string;
    };

export type ParseOutcome<T = unknown> =
  | { ok: true; options: Options; remaining: Array<NonNullable<T>> }
  | {
      ok: false;
      options: Options;
      remaining: Array<NonNullable<T>>;
      error: ParseError;
    };

export type OptionSpecs = {
  short: Map<string, Arity>;
  long: Map<string, Arity>;
  /**
   * Short spec started with `+`.
   */
  posixMode: boolean;
  /**
   * Short spec contained `W;`.
   */
  wEscape: boolean;
  hasShortSpec: boolean;
  hasLongSpec: boolean;
};

export interface ResolverConfig {
  longOnly?: boolean;
  /**
   * Same effect as a leading `+` in the short spec.
   */
  posixlyCorrect?: boolean;
}

export interface ResolveRequest<T> extends ResolverConfig {
  tokens: readonly T[];
  shortSpec?: string;
  longSpec?: readonly string[];
}
