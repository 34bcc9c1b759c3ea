export * from "./resolver";
export type {
  Arity,
  Token,
  OptionValue,
  Options,
  ParseError,
  ParseErrorKind,
  ParseOutcome,
  OptionSpecs,
  ResolverConfig,
  ResolveRequest,
} from "./types/index";
