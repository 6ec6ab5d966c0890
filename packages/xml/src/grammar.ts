/**
 * Grammar for a restricted XML subset: open, close and self-closing tags with
 * double-quoted attributes and nested elements. No text content, comments,
 * entities or namespaces.
 *
 * ```
 * element        = single-element | parent-element   (whitespace-wrapped)
 * single-element = "<" identifier attributes "/>"
 * parent-element = "<" identifier attributes ">" element* "</" identifier ">"
 * attributes     = (whitespace+ attribute-pair)*
 * attribute-pair = identifier "=" quoted-string
 * quoted-string  = '"' [^"]* '"'
 * ```
 */

import {
  type Parser,
  andThen,
  attempt,
  anyChar,
  either,
  identifier,
  lazy,
  left,
  map,
  matchLiteral,
  pair,
  pred,
  right,
  space1,
  whitespaceWrap,
  zeroOrMore,
} from "@tagweave/parser";
import type { Attribute, Element } from "./types.js";

/** Text between two double quotes. No escapes. */
export function quotedString(): Parser<string> {
  return map(
    right(
      matchLiteral('"'),
      left(
        zeroOrMore(pred(anyChar(), (c) => c !== '"')),
        matchLiteral('"')
      )
    ),
    (chars) => chars.join("")
  );
}

/** `name="value"` */
export function attributePair(): Parser<Attribute> {
  return pair(identifier(), right(matchLiteral("="), quotedString()));
}

/** Whitespace-separated attribute pairs, in source order. */
export function attributes(): Parser<Attribute[]> {
  return zeroOrMore(right(space1(), attributePair()));
}

/** `<name attr="..."`, up to but excluding the tag terminator. */
export function elementStart(): Parser<[string, Attribute[]]> {
  return right(matchLiteral("<"), pair(identifier(), attributes()));
}

function toElement([name, attrs]: [string, Attribute[]]): Element {
  return { name, attributes: attrs, children: [] };
}

/** `<name ... />` */
export function singleElement(): Parser<Element> {
  return map(left(elementStart(), matchLiteral("/>")), toElement);
}

/** `<name ...>`; children are filled in by `parentElement`. */
export function openElement(): Parser<Element> {
  return map(left(elementStart(), matchLiteral(">")), toElement);
}

/**
 * `</name>` where `name` must equal `expectedName`. Any mismatch, a different
 * name or a malformed tag, fails at the start of the closing tag.
 */
export function closeElement(expectedName: string): Parser<string> {
  return attempt(
    pred(
      right(matchLiteral("</"), left(identifier(), matchLiteral(">"))),
      (name) => name === expectedName
    )
  );
}

/** An open tag, its child elements, and the closing tag of the same name. */
export function parentElement(): Parser<Element> {
  const children = zeroOrMore(lazy(element));
  return andThen(openElement(), (opened) =>
    map(left(children, closeElement(opened.name)), (parsed): Element => ({
      ...opened,
      children: parsed,
    }))
  );
}

/** A single element, with any surrounding whitespace consumed. */
export function element(): Parser<Element> {
  return whitespaceWrap(either(singleElement(), parentElement()));
}
