import { describe, it, expect } from "vitest";
import { remaining } from "@tagweave/parser";
import {
  quotedString,
  attributePair,
  attributes,
  elementStart,
  singleElement,
  openElement,
  closeElement,
  parentElement,
  element,
} from "../grammar.js";
import type { Attribute, Element } from "../types.js";

function el(name: string, attrs: Attribute[] = [], children: Element[] = []): Element {
  return { name, attributes: attrs, children };
}

// ---------------------------------------------------------------------------
// Terminals
// ---------------------------------------------------------------------------

describe("quotedString", () => {
  it("returns the enclosed text", () => {
    expect(quotedString().parse('"Hello Joe!"')).toEqual({ ok: true, value: "Hello Joe!", pos: 12 });
  });

  it("accepts an empty string", () => {
    expect(quotedString().parse('""')).toEqual({ ok: true, value: "", pos: 2 });
  });

  it("keeps angle brackets and equals signs", () => {
    expect(quotedString().parse('"a<b>=c"')).toEqual({ ok: true, value: "a<b>=c", pos: 8 });
  });

  it("fails at the end of an unterminated string", () => {
    expect(quotedString().parse('"abc')).toEqual({ ok: false, pos: 4 });
  });

  it("requires an opening quote", () => {
    expect(quotedString().parse("abc")).toEqual({ ok: false, pos: 0 });
  });
});

describe("attributePair", () => {
  it("parses name and value", () => {
    expect(attributePair().parse('data-id="7"')).toEqual({ ok: true, value: ["data-id", "7"], pos: 11 });
  });

  it("fails when the value is not quoted", () => {
    expect(attributePair().parse("a=1")).toEqual({ ok: false, pos: 2 });
  });
});

describe("attributes", () => {
  it("parses whitespace-separated pairs in order", () => {
    expect(attributes().parse(' one="1" two="2"')).toEqual({
      ok: true,
      value: [
        ["one", "1"],
        ["two", "2"],
      ],
      pos: 16,
    });
  });

  it("keeps duplicate names", () => {
    expect(attributes().parse(' a="1" a="2"')).toEqual({
      ok: true,
      value: [
        ["a", "1"],
        ["a", "2"],
      ],
      pos: 12,
    });
  });

  it("requires whitespace before each pair", () => {
    expect(attributes().parse('a="1"')).toEqual({ ok: true, value: [], pos: 0 });
  });

  it("stops before whitespace that is not followed by a pair", () => {
    expect(attributes().parse(' one="1" />')).toEqual({ ok: true, value: [["one", "1"]], pos: 8 });
  });
});

// ---------------------------------------------------------------------------
// Tags
// ---------------------------------------------------------------------------

describe("elementStart", () => {
  it("parses the name and attributes", () => {
    expect(elementStart().parse('<a b="c">')).toEqual({ ok: true, value: ["a", [["b", "c"]]], pos: 8 });
  });
});

describe("singleElement", () => {
  it("parses a self-closing tag", () => {
    expect(singleElement().parse('<div class="float"/>')).toEqual({
      ok: true,
      value: el("div", [["class", "float"]]),
      pos: 20,
    });
  });

  it("fails on an open tag where the terminator should be", () => {
    expect(singleElement().parse("<div>")).toEqual({ ok: false, pos: 4 });
  });
});

describe("openElement", () => {
  it("parses an open tag with no children", () => {
    expect(openElement().parse("<div>")).toEqual({ ok: true, value: el("div"), pos: 5 });
  });
});

describe("closeElement", () => {
  it("accepts the expected name", () => {
    expect(closeElement("top").parse("</top>")).toEqual({ ok: true, value: "top", pos: 6 });
  });

  it("rejects another name at the start of the tag", () => {
    expect(closeElement("top").parse("</middle>")).toEqual({ ok: false, pos: 0 });
    expect(closeElement("top").parse("  </middle>", 2)).toEqual({ ok: false, pos: 2 });
  });

  it("does not accept a prefix of the expected name", () => {
    expect(closeElement("top").parse("</to>")).toEqual({ ok: false, pos: 0 });
  });

  it("fails at the start of an unterminated tag", () => {
    expect(closeElement("top").parse("</top")).toEqual({ ok: false, pos: 0 });
  });

  it("fails at the start of a tag with whitespace before the terminator", () => {
    expect(closeElement("top").parse("</top >")).toEqual({ ok: false, pos: 0 });
    expect(closeElement("top").parse("</ top>")).toEqual({ ok: false, pos: 0 });
  });
});

describe("parentElement", () => {
  it("parses a childless pair of tags", () => {
    expect(parentElement().parse("<a></a>")).toEqual({ ok: true, value: el("a"), pos: 7 });
  });

  it("collects children in order", () => {
    expect(parentElement().parse("<a><b/><c/></a>")).toEqual({
      ok: true,
      value: el("a", [], [el("b"), el("c")]),
      pos: 15,
    });
  });

  it("rejects text content", () => {
    const input = "<a>text</a>";
    const r = parentElement().parse(input);
    expect(r.ok).toBe(false);
    expect(remaining(input, r)).toBe("text</a>");
  });
});

// ---------------------------------------------------------------------------
// element
// ---------------------------------------------------------------------------

describe("element", () => {
  it("parses a self-closing element with nothing left", () => {
    expect(element().parse('<div class="float"/>')).toEqual({
      ok: true,
      value: el("div", [["class", "float"]]),
      pos: 20,
    });
  });

  it("parses a nested document", () => {
    const doc = `
        <top label="Top">
            <semi-bottom label="Bottom"/>
            <middle>
                <bottom label="Another bottom"/>
            </middle>
        </top>`;
    const expected = el(
      "top",
      [["label", "Top"]],
      [
        el("semi-bottom", [["label", "Bottom"]]),
        el("middle", [], [el("bottom", [["label", "Another bottom"]])]),
      ]
    );
    expect(element().parse(doc)).toEqual({ ok: true, value: expected, pos: doc.length });
  });

  it("mirrors nesting depth", () => {
    expect(element().parse("<a><b><c><d/></c></b></a>")).toEqual({
      ok: true,
      value: el("a", [], [el("b", [], [el("c", [], [el("d")])])]),
      pos: 25,
    });
  });

  it("fails at a mismatched closing tag", () => {
    const doc = `
        <top>
            <bottom/>
        </middle>`;
    const r = element().parse(doc);
    expect(r.ok).toBe(false);
    expect(remaining(doc, r)).toBe("</middle>");
  });

  it("fails at a mismatched closing tag without whitespace", () => {
    const doc = "<top><bottom/></middle>";
    expect(element().parse(doc)).toEqual({ ok: false, pos: 14 });
  });

  it("fails at a malformed closing tag with the right name", () => {
    const spaced = "<top></top >";
    const r = element().parse(spaced);
    expect(r).toEqual({ ok: false, pos: 5 });
    expect(remaining(spaced, r)).toBe("</top >");

    expect(element().parse("<top></top")).toEqual({ ok: false, pos: 5 });
  });

  it("ignores whitespace around the document and between attributes", () => {
    const compact = element().parse('<a x="1" y="2"/>');
    const spaced = element().parse('  \n<a   x="1"\n\ty="2"/>\n  ');
    expect(compact.ok && spaced.ok).toBe(true);
    if (compact.ok && spaced.ok) {
      expect(spaced.value).toEqual(compact.value);
    }
  });

  it("rejects whitespace before the self-closing terminator", () => {
    expect(element().parse('<a x="1" />')).toEqual({ ok: false, pos: 8 });
  });

  it("round-trips serialized self-closing elements", () => {
    const cases: Array<[string, Attribute[]]> = [
      ["br", []],
      ["img", [["src", "a.png"]]],
      ["x-y1", [["k", ""], ["k", "v w"], ["data-2", "<>"]]],
    ];
    for (const [name, attrs] of cases) {
      const source = `<${name}${attrs.map(([k, v]) => ` ${k}="${v}"`).join("")}/>`;
      expect(element().parse(source)).toEqual({ ok: true, value: el(name, attrs), pos: source.length });
    }
  });

  it("re-parses the unconsumed suffix like a fresh call", () => {
    const input = "<a/> <b><c/></b>";
    const first = element().parse(input);
    expect(first).toEqual({ ok: true, value: el("a"), pos: 5 });
    const rest = remaining(input, first);
    expect(element().parse(rest)).toEqual(element().parse("<b><c/></b>"));
    expect(element().parse(rest)).toEqual({ ok: true, value: el("b", [], [el("c")]), pos: 11 });
  });

  it("fails on an identifier that starts with a digit", () => {
    expect(element().parse("<1a/>")).toEqual({ ok: false, pos: 1 });
  });
});
