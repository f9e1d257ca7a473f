/**
 * @module ast
 *
 * In-memory model of the document tree produced by the upstream converter.
 * Every node is one variant of the closed `Node` union, discriminated by
 * `kind`; passes over the tree `switch` on `kind` and rely on
 * `assertNever` so a new variant fails to compile until each pass handles
 * it.
 *
 * The `unknown` variant keeps tags the codec does not recognize (and
 * their raw payload) so they survive a decode/encode cycle untouched.
 */

export interface Attr {
  id: string;
  classes: string[];
  /** Ordered key/value pairs (keys may repeat). */
  attributes: [string, string][];
}

export interface Target {
  url: string;
  title: string;
}

export type QuoteType = "SingleQuote" | "DoubleQuote";
export type MathType = "InlineMath" | "DisplayMath";

/** ListAttributes of an ordered list are carried but never interpreted. */
export interface ListAttributes {
  start: number;
  style: string;
  delim: string;
}

export type Node =
  | { kind: "heading"; level: number; attr: Attr; inlines: Node[] }
  | { kind: "para"; inlines: Node[] }
  | { kind: "plain"; inlines: Node[] }
  | { kind: "div"; attr: Attr; blocks: Node[] }
  | { kind: "span"; attr: Attr; inlines: Node[] }
  | { kind: "link"; attr: Attr; inlines: Node[]; target: Target }
  | { kind: "image"; attr: Attr; inlines: Node[]; target: Target }
  | { kind: "bulletList"; items: Node[][] }
  | { kind: "orderedList"; listAttributes: ListAttributes; items: Node[][] }
  | { kind: "definitionList"; items: DefinitionItem[] }
  | { kind: "table"; table: Table }
  | { kind: "emph"; inlines: Node[] }
  | { kind: "strong"; inlines: Node[] }
  | { kind: "quoted"; quoteType: QuoteType; inlines: Node[] }
  | { kind: "codeBlock"; attr: Attr; text: string }
  | { kind: "code"; attr: Attr; text: string }
  | { kind: "math"; mathType: MathType; text: string }
  | { kind: "str"; text: string }
  | { kind: "space" }
  | { kind: "softBreak" }
  | { kind: "lineBreak" }
  | { kind: "unknown"; tag: string; payload: unknown };

export type NodeOf<K extends Node["kind"]> = Extract<Node, { kind: K }>;

export interface DefinitionItem {
  term: Node[];
  definitions: Node[][];
}

export interface Table {
  caption: Node[];
  /** Column alignments and widths pass through verbatim. */
  aligns: unknown[];
  widths: number[];
  /** One node sequence per header cell. */
  headers: Node[][];
  /** Rows of cells, each cell a node sequence. */
  rows: Node[][][];
}

export function hasAttr(attr: Attr, key: string): boolean {
  return attr.attributes.some(([k]) => k === key);
}

/**
 * Flatten inlines to plain text. Styled runs (emph, strong, quoted, span,
 * link, image caption) contribute their text, code and math their source,
 * breaks a space. Quoted runs get typographic quote marks.
 */
export function plainText(inlines: readonly Node[]): string {
  let text = "";
  for (const n of inlines) {
    switch (n.kind) {
      case "str":
        text += n.text;
        break;
      case "space":
      case "softBreak":
      case "lineBreak":
        text += " ";
        break;
      case "code":
      case "math":
        text += n.text;
        break;
      case "quoted": {
        const [open, close] = n.quoteType === "DoubleQuote" ? ["\u201c", "\u201d"] : ["\u2018", "\u2019"];
        text += `${open}${plainText(n.inlines)}${close}`;
        break;
      }
      case "emph":
      case "strong":
      case "span":
      case "link":
      case "image":
        text += plainText(n.inlines);
        break;
      default:
        break;
    }
  }
  return text;
}

export function assertNever(value: never): never {
  throw new Error(`unhandled node variant: ${JSON.stringify(value)}`);
}

// convenience constructors (mostly used by tests and the CLI)

export const str = (text: string): Node => ({ kind: "str", text });
export const space = (): Node => ({ kind: "space" });

/** Split words into `str` nodes separated by `space` nodes. */
export function inlinesOf(text: string): Node[] {
  const out: Node[] = [];
  const words = text.split(/\s+/).filter(Boolean);
  words.forEach((w, i) => {
    if (i > 0) out.push(space());
    out.push(str(w));
  });
  return out;
}
