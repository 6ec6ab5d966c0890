/**
 * Error reporting for consumers of @tagweave/parser.
 *
 * Combinators never throw; a `ParseError` is only raised by entry points that
 * turn a terminal failure into an exception (`Parser.parseAll`, documents).
 */

/** Why a top-level parse was rejected. */
export type ParseErrorReason = "unexpected-input" | "trailing-input" | "recursion-limit";

/** Default number of remaining characters quoted in an error message. */
export const DEFAULT_SNIPPET_LENGTH = 20;

/** Parse error carrying the unconsumed input at the failure point. */
export class ParseError extends Error {
  /** Zero-based offset in the input where parsing stopped. */
  readonly pos: number;
  /** The input from `pos` onwards. */
  readonly remaining: string;
  readonly reason: ParseErrorReason;

  constructor(
    input: string,
    pos: number,
    reason: ParseErrorReason,
    snippetLength: number = DEFAULT_SNIPPET_LENGTH
  ) {
    const remaining = input.slice(pos);
    super(`Parse error (${reason}) at offset ${pos}: ${describeRemaining(remaining, snippetLength)}`);
    this.name = "ParseError";
    this.pos = pos;
    this.remaining = remaining;
    this.reason = reason;
  }
}

/**
 * True for the RangeError V8 raises when recursive descent runs out of stack,
 * e.g. on elements nested a few thousand levels deep.
 */
export function isStackOverflow(error: unknown): error is RangeError {
  return error instanceof RangeError && /call stack/i.test(error.message);
}

function describeRemaining(remaining: string, snippetLength: number): string {
  if (remaining.length === 0) return "end of input";
  const snippet = remaining.slice(0, Math.max(0, snippetLength));
  const ellipsis = remaining.length > snippet.length ? "..." : "";
  return `${JSON.stringify(snippet)}${ellipsis}`;
}
