/**
 * @tagweave/xml
 *
 * A restricted XML grammar built on @tagweave/parser: tags, self-closing tags,
 * double-quoted attributes and nested elements.
 *
 * @module
 */

export type { Attribute, Element } from "./types.js";

// Grammar
export {
  quotedString,
  attributePair,
  attributes,
  elementStart,
  singleElement,
  openElement,
  closeElement,
  parentElement,
  element,
} from "./grammar.js";

// Documents
export { parseDocument, parseFragment, type DocumentOptions, type Fragment } from "./document.js";

// Configuration
export {
  config,
  defineConfig,
  type TagweaveConfig,
  type TagweaveConfigInput,
  type TrailingInputPolicy,
} from "./config.js";
