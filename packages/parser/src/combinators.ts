/**
 * Parser combinator API for @tagweave/parser
 *
 * All combinators return `Parser<T>` values that can be composed freely.
 * Failures are values, never exceptions. Only `either` backtracks: a sequence
 * whose second stage fails reports the second stage's failure offset.
 */

import type { Parser, ParseFailure, ParseResult, ParseSuccess } from "./types.js";
import { ParseError, isStackOverflow } from "./errors.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Create a Parser<T> from a raw parse function. */
function mkParser<T>(parseFn: (input: string, pos: number) => ParseResult<T>): Parser<T> {
  return {
    parse(input: string, pos = 0): ParseResult<T> {
      return parseFn(input, pos);
    },
    parseAll(input: string): T {
      let result: ParseResult<T>;
      try {
        result = parseFn(input, 0);
      } catch (e) {
        if (isStackOverflow(e)) throw new ParseError(input, 0, "recursion-limit");
        throw e;
      }
      if (!result.ok) {
        throw new ParseError(input, result.pos, "unexpected-input");
      }
      if (result.pos !== input.length) {
        throw new ParseError(input, result.pos, "trailing-input");
      }
      return result.value;
    },
  };
}

function ok<T>(value: T, pos: number): ParseSuccess<T> {
  return { ok: true, value, pos };
}

function fail(pos: number): ParseFailure {
  return { ok: false, pos };
}

/**
 * Apply `p` until it fails, appending to `results`. Returns the offset after
 * the last successful application. A match that consumes nothing ends the loop.
 */
function collect<T>(p: Parser<T>, input: string, pos: number, results: T[]): number {
  let cur = pos;
  for (;;) {
    const r = p.parse(input, cur);
    if (!r.ok) break;
    if (r.pos === cur) break; // prevent infinite loop on zero-width match
    results.push(r.value);
    cur = r.pos;
  }
  return cur;
}

/** The input left over after `result`, materialized as a string. */
export function remaining<T>(input: string, result: ParseResult<T>): string {
  return input.slice(result.pos);
}

// ---------------------------------------------------------------------------
// Primitive parsers
// ---------------------------------------------------------------------------

const ASCII_ALPHA = /^[A-Za-z]$/;
const IDENTIFIER_TAIL = /^[A-Za-z0-9-]$/;
// Unicode White_Space: unlike \s, includes U+0085 and excludes U+FEFF
const WHITESPACE = /^[\t\n\v\f\r \u0085\u00a0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]$/;

/** Match an exact string literal, producing no value. */
export function matchLiteral(expected: string): Parser<null> {
  return mkParser((input, pos) => {
    if (input.startsWith(expected, pos)) {
      return ok(null, pos + expected.length);
    }
    return fail(pos);
  });
}

/** Match any single character (one code point). */
export function anyChar(): Parser<string> {
  return mkParser((input, pos) => {
    const code = input.codePointAt(pos);
    if (code === undefined) return fail(pos);
    const c = String.fromCodePoint(code);
    return ok(c, pos + c.length);
  });
}

/** Match an ASCII letter followed by any ASCII letters, digits or hyphens. */
export function identifier(): Parser<string> {
  return mkParser((input, pos) => {
    if (pos >= input.length || !ASCII_ALPHA.test(input[pos])) {
      return fail(pos);
    }
    let end = pos + 1;
    while (end < input.length && IDENTIFIER_TAIL.test(input[end])) {
      end++;
    }
    return ok(input.slice(pos, end), end);
  });
}

function isWhitespace(c: string): boolean {
  return WHITESPACE.test(c);
}

/** Match zero or more whitespace characters. Always succeeds. */
export function space0(): Parser<string[]> {
  return zeroOrMore(pred(anyChar(), isWhitespace));
}

/** Match one or more whitespace characters. */
export function space1(): Parser<string[]> {
  return oneOrMore(pred(anyChar(), isWhitespace));
}

/** Parse `p` surrounded by optional whitespace. */
export function whitespaceWrap<T>(p: Parser<T>): Parser<T> {
  return right(space0(), left(p, space0()));
}

// ---------------------------------------------------------------------------
// Transformation
// ---------------------------------------------------------------------------

/** Transform a parser's result with a function. */
export function map<A, B>(p: Parser<A>, f: (a: A) => B): Parser<B> {
  return mkParser((input, pos) => {
    const r = p.parse(input, pos);
    if (!r.ok) return r;
    return ok(f(r.value), r.pos);
  });
}

/**
 * Keep the result of `p` only if `predicate` accepts its value. A rejected
 * value fails at the offset `pred` started from, not where `p` stopped.
 */
export function pred<T>(p: Parser<T>, predicate: (value: T) => boolean): Parser<T> {
  return mkParser((input, pos) => {
    const r = p.parse(input, pos);
    if (!r.ok) return r;
    if (predicate(r.value)) return r;
    return fail(pos);
  });
}

/**
 * Run `p`, reporting any failure at the offset `attempt` started from. Use it
 * around a sequence that should fail as a whole, such as a closing tag.
 */
export function attempt<T>(p: Parser<T>): Parser<T> {
  return mkParser((input, pos) => {
    const r = p.parse(input, pos);
    if (r.ok) return r;
    return fail(pos);
  });
}

// ---------------------------------------------------------------------------
// Sequence combinators
// ---------------------------------------------------------------------------

/**
 * Sequence two parsers. Input consumed by `a` is not given back when `b`
 * fails; the failure reports where `b` stopped.
 */
export function pair<A, B>(a: Parser<A>, b: Parser<B>): Parser<[A, B]> {
  return mkParser((input, pos) => {
    const ra = a.parse(input, pos);
    if (!ra.ok) return ra;
    const rb = b.parse(input, ra.pos);
    if (!rb.ok) return rb;
    return ok<[A, B]>([ra.value, rb.value], rb.pos);
  });
}

/** Sequence two parsers, keeping the first result. */
export function left<A, B>(a: Parser<A>, b: Parser<B>): Parser<A> {
  return map(pair(a, b), ([value]) => value);
}

/** Sequence two parsers, keeping the second result. */
export function right<A, B>(a: Parser<A>, b: Parser<B>): Parser<B> {
  return map(pair(a, b), ([, value]) => value);
}

/**
 * Dependent sequencing: the parser run after `p` is built from `p`'s value.
 *
 * ```ts
 * // "<b></b>": the closing literal repeats whatever name was opened
 * andThen(right(matchLiteral("<"), left(identifier(), matchLiteral(">"))), (name) =>
 *   matchLiteral(`</${name}>`)
 * );
 * ```
 */
export function andThen<A, B>(p: Parser<A>, f: (a: A) => Parser<B>): Parser<B> {
  return mkParser((input, pos) => {
    const r = p.parse(input, pos);
    if (!r.ok) return r;
    return f(r.value).parse(input, r.pos);
  });
}

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

/** Ordered alternation: try `a`, and on failure try `b` from the same offset. */
export function either<A, B>(a: Parser<A>, b: Parser<B>): Parser<A | B> {
  return mkParser<A | B>((input, pos) => {
    const ra = a.parse(input, pos);
    if (ra.ok) return ra;
    return b.parse(input, pos);
  });
}

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

/** Zero or more repetitions. Always succeeds. */
export function zeroOrMore<T>(p: Parser<T>): Parser<T[]> {
  return mkParser((input, pos) => {
    const results: T[] = [];
    const cur = collect(p, input, pos, results);
    return ok(results, cur);
  });
}

/** One or more repetitions. Fails at the starting offset if `p` never matches. */
export function oneOrMore<T>(p: Parser<T>): Parser<T[]> {
  return mkParser((input, pos) => {
    const first = p.parse(input, pos);
    if (!first.ok) return fail(pos);
    const results: T[] = [first.value];
    const cur = collect(p, input, first.pos, results);
    return ok(results, cur);
  });
}

// ---------------------------------------------------------------------------
// Recursion
// ---------------------------------------------------------------------------

/** Lazy parser for recursive grammars. `f` is called on first use. */
export function lazy<T>(f: () => Parser<T>): Parser<T> {
  let cached: Parser<T> | null = null;
  return mkParser((input, pos) => {
    if (!cached) cached = f();
    return cached.parse(input, pos);
  });
}
