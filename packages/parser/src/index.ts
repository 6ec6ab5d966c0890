/**
 * @tagweave/parser
 *
 * A small parser combinator engine. Parsers read an immutable string from an
 * offset and return either a value plus the offset of the remaining input, or
 * the offset at which parsing stopped.
 *
 * @module
 */

// Core types
export type { ParseSuccess, ParseFailure, ParseResult, Parser } from "./types.js";

// Errors
export {
  ParseError,
  DEFAULT_SNIPPET_LENGTH,
  isStackOverflow,
  type ParseErrorReason,
} from "./errors.js";

// Combinator API
export {
  remaining,
  matchLiteral,
  anyChar,
  identifier,
  space0,
  space1,
  whitespaceWrap,
  map,
  pred,
  attempt,
  pair,
  left,
  right,
  andThen,
  either,
  zeroOrMore,
  oneOrMore,
  lazy,
} from "./combinators.js";
