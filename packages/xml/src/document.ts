/**
 * Document entry points: run the element grammar over a whole text and turn a
 * terminal failure into a `ParseError`.
 */

import {
  ParseError,
  isStackOverflow,
  remaining,
  type ParseErrorReason,
  type ParseResult,
} from "@tagweave/parser";
import { config, type TrailingInputPolicy } from "./config.js";
import { element } from "./grammar.js";
import type { Element } from "./types.js";

export interface DocumentOptions {
  /** Overrides `document.trailing` from the configuration. */
  trailing?: TrailingInputPolicy;
}

/** A root element and whatever input followed it. */
export interface Fragment {
  readonly element: Element;
  readonly rest: string;
}

const rootElement = element();

function debugLog(message: string): void {
  if (config.get().debug) {
    console.debug(`[tagweave] ${message}`);
  }
}

function reject(text: string, pos: number, reason: ParseErrorReason): ParseError {
  debugLog(`rejected document (${reason}) at offset ${pos}`);
  return new ParseError(text, pos, reason, config.get().diagnostics.snippet);
}

/** Nesting deep enough to exhaust the call stack becomes a ParseError. */
function parseRoot(text: string): ParseResult<Element> {
  try {
    return rootElement.parse(text);
  } catch (e) {
    if (isStackOverflow(e)) throw reject(text, 0, "recursion-limit");
    throw e;
  }
}

/**
 * Parse one element from the start of `text`, leaving the decision about
 * trailing input to the caller. Returns `null` when no element can be parsed.
 *
 * @throws {ParseError} `recursion-limit` when elements nest too deeply.
 */
export function parseFragment(text: string): Fragment | null {
  const result = parseRoot(text);
  if (!result.ok) return null;
  return { element: result.value, rest: remaining(text, result) };
}

/**
 * Parse `text` as a single root element.
 *
 * @throws {ParseError} `unexpected-input` when no element can be parsed, or
 *   `trailing-input` when input follows the root element and the trailing
 *   policy is `"error"`, or `recursion-limit` when elements nest too deeply
 *   for the call stack (a few thousand levels).
 */
export function parseDocument(text: string, options: DocumentOptions = {}): Element {
  const trailing = options.trailing ?? config.get().document.trailing;
  const result = parseRoot(text);

  if (!result.ok) {
    throw reject(text, result.pos, "unexpected-input");
  }
  if (result.pos !== text.length && trailing === "error") {
    throw reject(text, result.pos, "trailing-input");
  }

  debugLog(`parsed <${result.value.name}> (${result.pos} of ${text.length} characters)`);
  return result.value;
}
