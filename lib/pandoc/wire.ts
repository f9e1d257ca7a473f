/**
 * @module wire
 *
 * Codec between the converter's JSON wire format (`{ t, c }` tagged nodes,
 * pandoc API 1.20 layout) and the `Node` union from `ast.ts`.
 *
 * Every payload is validated with a zod schema before it is trusted; a
 * payload that does not have the shape its tag promises raises
 * `WireFormatError` naming where in the document it sits. Tags outside the
 * known set decode to `{ kind: "unknown" }` and encode back verbatim.
 *
 * ```ts
 * const doc = decodeDocument(JSON.parse(await readFile(path, "utf8")));
 * const blocks = encodeNodes(doc.blocks); // deep-equals the input blocks
 * ```
 */
import { z } from "zod";

import type { Attr, DefinitionItem, Node, Table } from "./ast.ts";

/* -------------------------------------------------------------------------- */
/* Wire types                                                                 */
/* -------------------------------------------------------------------------- */

export type WireAttr = [string, string[], [string, string][]];

export interface WireNode {
  t: string;
  c?: unknown;
}

export interface WireDocument {
  "pandoc-api-version": number[];
  meta: Record<string, unknown>;
  blocks: WireNode[];
}

/** API version written into documents handed to the converter. */
export const PANDOC_API_VERSION = [1, 20] as const;

export class WireFormatError extends Error {
  constructor(readonly where: string, readonly issues: string[]) {
    super(`malformed node at ${where}: ${issues.join("; ")}`);
    this.name = "WireFormatError";
  }
}

/* -------------------------------------------------------------------------- */
/* Schemas                                                                    */
/* -------------------------------------------------------------------------- */

const nodeList = z.array(z.unknown());
const tagged = z.object({ t: z.string(), c: z.unknown().optional() });
const attrSchema = z.tuple([
  z.string(),
  z.array(z.string()),
  z.array(z.tuple([z.string(), z.string()])),
]);
const targetSchema = z.tuple([z.string(), z.string()]);

const payloads = {
  Header: z.tuple([z.number().int().min(1), attrSchema, nodeList]),
  Inlines: nodeList,
  AttrBlocks: z.tuple([attrSchema, nodeList]),
  LinkLike: z.tuple([attrSchema, nodeList, targetSchema]),
  BulletList: z.array(nodeList),
  OrderedList: z.tuple([
    z.tuple([z.number().int(), tagged, tagged]),
    z.array(nodeList),
  ]),
  DefinitionList: z.array(z.tuple([nodeList, z.array(nodeList)])),
  Table: z.tuple([
    nodeList,
    z.array(z.unknown()),
    z.array(z.number()),
    z.array(nodeList),
    z.array(z.array(nodeList)),
  ]),
  Quoted: z.tuple([
    z.object({ t: z.enum(["SingleQuote", "DoubleQuote"]) }),
    nodeList,
  ]),
  AttrText: z.tuple([attrSchema, z.string()]),
  Math: z.tuple([
    z.object({ t: z.enum(["InlineMath", "DisplayMath"]) }),
    z.string(),
  ]),
  Str: z.string(),
} as const;

export const wireDocumentSchema = z.object({
  "pandoc-api-version": z.array(z.number()).default([...PANDOC_API_VERSION]),
  meta: z.record(z.string(), z.unknown()).default({}),
  blocks: nodeList,
});

function parse<S extends z.ZodType>(
  schema: S,
  raw: unknown,
  where: string,
): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new WireFormatError(
      where,
      result.error.issues.map((i) =>
        i.path.length ? `${i.path.map(String).join(".")}: ${i.message}` : i.message
      ),
    );
  }
  return result.data;
}

/* -------------------------------------------------------------------------- */
/* Decoding                                                                   */
/* -------------------------------------------------------------------------- */

export interface DecodedDocument {
  apiVersion: number[];
  meta: Record<string, unknown>;
  blocks: Node[];
}

export function decodeDocument(raw: unknown): DecodedDocument {
  const doc = parse(wireDocumentSchema, raw, "document");
  return {
    apiVersion: doc["pandoc-api-version"],
    meta: doc.meta,
    blocks: decodeNodes(doc.blocks, "blocks"),
  };
}

export function decodeAttr([id, classes, attributes]: WireAttr): Attr {
  return { id, classes: [...classes], attributes: attributes.map(([k, v]) => [k, v]) };
}

export function decodeNodes(raw: readonly unknown[], where: string): Node[] {
  return raw.map((n, i) => decodeNode(n, `${where}[${i}]`));
}

export function decodeNode(raw: unknown, where: string): Node {
  const { t, c } = parse(tagged, raw, where);
  const at = `${where}<${t}>`;
  const list = (nodes: readonly unknown[], suffix: string) =>
    decodeNodes(nodes, `${at}${suffix}`);

  switch (t) {
    case "Header": {
      const [level, attr, inlines] = parse(payloads.Header, c, at);
      return { kind: "heading", level, attr: decodeAttr(attr), inlines: list(inlines, "") };
    }
    case "Para":
      return { kind: "para", inlines: list(parse(payloads.Inlines, c, at), "") };
    case "Plain":
      return { kind: "plain", inlines: list(parse(payloads.Inlines, c, at), "") };
    case "Emph":
      return { kind: "emph", inlines: list(parse(payloads.Inlines, c, at), "") };
    case "Strong":
      return { kind: "strong", inlines: list(parse(payloads.Inlines, c, at), "") };
    case "Div": {
      const [attr, blocks] = parse(payloads.AttrBlocks, c, at);
      return { kind: "div", attr: decodeAttr(attr), blocks: list(blocks, "") };
    }
    case "Span": {
      const [attr, inlines] = parse(payloads.AttrBlocks, c, at);
      return { kind: "span", attr: decodeAttr(attr), inlines: list(inlines, "") };
    }
    case "Link":
    case "Image": {
      const [attr, inlines, [url, title]] = parse(payloads.LinkLike, c, at);
      return {
        kind: t === "Link" ? "link" : "image",
        attr: decodeAttr(attr),
        inlines: list(inlines, ""),
        target: { url, title },
      };
    }
    case "BulletList":
      return {
        kind: "bulletList",
        items: parse(payloads.BulletList, c, at).map((item, i) => list(item, `.items[${i}]`)),
      };
    case "OrderedList": {
      const [[start, style, delim], items] = parse(payloads.OrderedList, c, at);
      return {
        kind: "orderedList",
        listAttributes: { start, style: style.t, delim: delim.t },
        items: items.map((item, i) => list(item, `.items[${i}]`)),
      };
    }
    case "DefinitionList":
      return {
        kind: "definitionList",
        items: parse(payloads.DefinitionList, c, at).map(
          ([term, definitions], i): DefinitionItem => ({
            term: list(term, `.term[${i}]`),
            definitions: definitions.map((d, j) => list(d, `.definition[${i}][${j}]`)),
          }),
        ),
      };
    case "Table": {
      const [caption, aligns, widths, headers, rows] = parse(payloads.Table, c, at);
      const table: Table = {
        caption: list(caption, ".caption"),
        aligns,
        widths,
        headers: headers.map((cell, i) => list(cell, `.header[${i}]`)),
        rows: rows.map((row, r) => row.map((cell, i) => list(cell, `.row[${r}][${i}]`))),
      };
      return { kind: "table", table };
    }
    case "Quoted": {
      const [quote, inlines] = parse(payloads.Quoted, c, at);
      return { kind: "quoted", quoteType: quote.t, inlines: list(inlines, "") };
    }
    case "CodeBlock":
    case "Code": {
      const [attr, text] = parse(payloads.AttrText, c, at);
      return { kind: t === "Code" ? "code" : "codeBlock", attr: decodeAttr(attr), text };
    }
    case "Math": {
      const [math, text] = parse(payloads.Math, c, at);
      return { kind: "math", mathType: math.t, text };
    }
    case "Str":
      return { kind: "str", text: parse(payloads.Str, c, at) };
    case "Space":
      return { kind: "space" };
    case "SoftBreak":
      return { kind: "softBreak" };
    case "LineBreak":
      return { kind: "lineBreak" };
    default:
      return { kind: "unknown", tag: t, payload: c };
  }
}

/* -------------------------------------------------------------------------- */
/* Encoding                                                                   */
/* -------------------------------------------------------------------------- */

export function encodeAttr(attr: Attr): WireAttr {
  return [attr.id, [...attr.classes], attr.attributes.map(([k, v]) => [k, v])];
}

export function encodeNodes(nodes: readonly Node[]): WireNode[] {
  return nodes.map(encodeNode);
}

export function encodeNode(node: Node): WireNode {
  switch (node.kind) {
    case "heading":
      return { t: "Header", c: [node.level, encodeAttr(node.attr), encodeNodes(node.inlines)] };
    case "para":
      return { t: "Para", c: encodeNodes(node.inlines) };
    case "plain":
      return { t: "Plain", c: encodeNodes(node.inlines) };
    case "emph":
      return { t: "Emph", c: encodeNodes(node.inlines) };
    case "strong":
      return { t: "Strong", c: encodeNodes(node.inlines) };
    case "div":
      return { t: "Div", c: [encodeAttr(node.attr), encodeNodes(node.blocks)] };
    case "span":
      return { t: "Span", c: [encodeAttr(node.attr), encodeNodes(node.inlines)] };
    case "link":
    case "image":
      return {
        t: node.kind === "link" ? "Link" : "Image",
        c: [encodeAttr(node.attr), encodeNodes(node.inlines), [node.target.url, node.target.title]],
      };
    case "bulletList":
      return { t: "BulletList", c: node.items.map(encodeNodes) };
    case "orderedList": {
      const { start, style, delim } = node.listAttributes;
      return {
        t: "OrderedList",
        c: [[start, { t: style }, { t: delim }], node.items.map(encodeNodes)],
      };
    }
    case "definitionList":
      return {
        t: "DefinitionList",
        c: node.items.map((item) => [encodeNodes(item.term), item.definitions.map(encodeNodes)]),
      };
    case "table": {
      const { caption, aligns, widths, headers, rows } = node.table;
      return {
        t: "Table",
        c: [
          encodeNodes(caption),
          aligns,
          widths,
          headers.map(encodeNodes),
          rows.map((row) => row.map(encodeNodes)),
        ],
      };
    }
    case "quoted":
      return { t: "Quoted", c: [{ t: node.quoteType }, encodeNodes(node.inlines)] };
    case "codeBlock":
      return { t: "CodeBlock", c: [encodeAttr(node.attr), node.text] };
    case "code":
      return { t: "Code", c: [encodeAttr(node.attr), node.text] };
    case "math":
      return { t: "Math", c: [{ t: node.mathType }, node.text] };
    case "str":
      return { t: "Str", c: node.text };
    case "space":
      return { t: "Space" };
    case "softBreak":
      return { t: "SoftBreak" };
    case "lineBreak":
      return { t: "LineBreak" };
    case "unknown":
      return node.payload === undefined ? { t: node.tag } : { t: node.tag, c: node.payload };
  }
}

/** Document the converter can read back (`--from=json`). */
export function encodeDocument(
  blocks: readonly Node[],
  meta: Record<string, unknown> = {},
): WireDocument {
  return {
    "pandoc-api-version": [...PANDOC_API_VERSION],
    meta,
    blocks: encodeNodes(blocks),
  };
}

/** `MetaInlines` value wrapping already-encoded inlines. */
export const metaInlines = (inlines: readonly Node[]) => ({
  t: "MetaInlines",
  c: encodeNodes(inlines),
});
