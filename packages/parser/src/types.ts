/**
 * Core types for @tagweave/parser
 *
 * Input is never copied: a parser reads an immutable string starting at an
 * offset and reports where the remaining input begins.
 */

/** A successful parse: the value and the offset of the remaining input. */
export interface ParseSuccess<T> {
  readonly ok: true;
  readonly value: T;
  readonly pos: number;
}

/** A failed parse: the offset of the input view at which parsing stopped. */
export interface ParseFailure {
  readonly ok: false;
  readonly pos: number;
}

/** Result of a parse attempt. */
export type ParseResult<T> = ParseSuccess<T> | ParseFailure;

/** A parser is a stateless function from (input, position) to ParseResult. */
export interface Parser<T> {
  /** Attempt to parse starting at `pos` (default 0). */
  parse(input: string, pos?: number): ParseResult<T>;
  /** Parse the full input, throwing if not consumed entirely. */
  parseAll(input: string): T;
}
