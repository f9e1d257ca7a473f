// Terse node constructors, mostly for tests and hand-built documents.
import { type Attr, inlinesOf, type Node, type NodeOf, str } from "./ast.ts";

export const attr = (
  id = "",
  classes: string[] = [],
  attributes: [string, string][] = [],
): Attr => ({ id, classes, attributes });

export const heading = (
  level: number,
  id: string,
  title: string,
  classes: string[] = [],
): NodeOf<"heading"> => ({
  kind: "heading",
  level,
  attr: attr(id, classes),
  inlines: inlinesOf(title),
});

export const para = (...inlines: Node[]): NodeOf<"para"> => ({ kind: "para", inlines });

export const paraText = (text: string): NodeOf<"para"> => para(...inlinesOf(text));

export const div = (a: Attr, ...blocks: Node[]): NodeOf<"div"> => ({ kind: "div", attr: a, blocks });

export const span = (a: Attr, ...inlines: Node[]): NodeOf<"span"> => ({
  kind: "span",
  attr: a,
  inlines,
});

export const link = (a: Attr, url: string, caption: Node[] = []): NodeOf<"link"> => ({
  kind: "link",
  attr: a,
  inlines: caption,
  target: { url, title: "" },
});

/** Cross-reference link as the converter emits it. */
export const ref = (
  marker: string,
  target: string,
  caption: string,
): NodeOf<"link"> =>
  link(attr("", [], [[marker, target.replace(/^#/, "")]]), target, caption ? [str(caption)] : []);

export const image = (id: string, url: string): NodeOf<"image"> => ({
  kind: "image",
  attr: attr(id),
  inlines: [],
  target: { url, title: "" },
});
