/**
 * Element tree produced by the @tagweave/xml grammar.
 */

/** An attribute as written in the source: `[name, value]`. */
export type Attribute = readonly [name: string, value: string];

/**
 * A parsed element. Attributes keep source order and duplicates; children
 * keep source order and are empty for self-closing or childless elements.
 */
export interface Element {
  readonly name: string;
  readonly attributes: readonly Attribute[];
  readonly children: readonly Element[];
}
