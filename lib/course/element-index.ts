import { assertNever, type Node } from "../pandoc/ast.ts";
import type { CourseBus } from "./events.ts";
import { type Section, walkSections } from "./section-tree.ts";

/** Element id → path of the section that contains the element. */
export type ElementPathIndex = ReadonlyMap<string, string>;

/** Links with this class embed a video and are addressable by their id. */
export const VIDEO_CLASS = "video";

/**
 * Map every identified element (headings, divs, spans, images, code,
 * video links) to the path of its section. Several ids inside one section
 * all map to the same path; when an id repeats, the last occurrence in
 * document order wins.
 */
export function createElementPathIndex(
  sections: readonly Section[],
  bus?: CourseBus,
): ElementPathIndex {
  const index = new Map<string, string>();

  const register = (id: string, path: string) => {
    if (!id) return;
    const previous = index.get(id);
    if (previous !== undefined && previous !== path) {
      bus?.emit("index:duplicate", { id, path, previous });
    }
    index.set(id, path);
  };

  const visitAll = (nodes: readonly Node[], path: string) => {
    for (const n of nodes) visit(n, path);
  };

  const visit = (node: Node, path: string): void => {
    switch (node.kind) {
      case "heading":
        register(node.attr.id, path);
        return visitAll(node.inlines, path);
      case "div":
        register(node.attr.id, path);
        return visitAll(node.blocks, path);
      case "span":
        register(node.attr.id, path);
        return visitAll(node.inlines, path);
      case "image":
      case "codeBlock":
      case "code":
        return register(node.attr.id, path);
      case "link":
        if (node.attr.classes.includes(VIDEO_CLASS)) register(node.attr.id, path);
        return;
      case "para":
      case "plain":
      case "emph":
      case "strong":
      case "quoted":
        return visitAll(node.inlines, path);
      case "bulletList":
      case "orderedList":
        for (const item of node.items) visitAll(item, path);
        return;
      case "definitionList":
        for (const { term, definitions } of node.items) {
          visitAll(term, path);
          for (const d of definitions) visitAll(d, path);
        }
        return;
      case "table":
        for (const cell of node.table.headers) visitAll(cell, path);
        for (const row of node.table.rows) {
          for (const cell of row) visitAll(cell, path);
        }
        return;
      case "math":
      case "str":
      case "space":
      case "softBreak":
      case "lineBreak":
        return;
      case "unknown":
        bus?.emit("node:unknown", { pass: "element-index", tag: node.tag, section: path });
        return;
      default:
        return assertNever(node);
    }
  };

  walkSections(sections, (section, path) => visitAll(section.content ?? [], path));
  bus?.emit("index:built", { index: "element", entries: index.size });
  return index;
}
