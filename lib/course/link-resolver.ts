/**
 * @module link-resolver
 *
 * Rewrites cross-reference links, emitted by the converter with a marker
 * attribute and a bare id as target, into path-based course URLs.
 *
 * | kind        | marker       | caption after resolving |
 * | ----------- | ------------ | ----------------------- |
 * | `plain`     | `data-mref`  | emptied                 |
 * | `captioned` | `data-msref` | kept                    |
 * | `named`     | `data-mnref` | emptied                 |
 *
 * A target is looked up among element ids first (`/section/{path}#{id}`),
 * then among bare section ids (`/section/{path}`). Resolved links lose
 * their attributes, so resolving an already resolved tree is a no-op.
 * Unresolvable links are reported and left exactly as they were.
 */
import { assertNever, type Attr, hasAttr, type Node, type NodeOf } from "../pandoc/ast.ts";
import type { ElementPathIndex } from "./element-index.ts";
import type { CourseBus } from "./events.ts";
import type { SectionPathIndex } from "./section-index.ts";
import { type Section, walkSections } from "./section-tree.ts";

export type ReferenceKind = "plain" | "captioned" | "named";

export const REFERENCE_MARKERS = {
  plain: "data-mref",
  captioned: "data-msref",
  named: "data-mnref",
} as const satisfies Record<ReferenceKind, string>;

const KEEPS_CAPTION: Record<ReferenceKind, boolean> = {
  plain: false,
  captioned: true,
  named: false,
};

/** Index entries never contain links. */
export const INDEX_TERM_ATTRIBUTE = "data-index-term";
/** Quiz widgets never contain links. */
export const QUESTION_CLASS = "question";

export interface LinkIndexes {
  readonly sections: SectionPathIndex;
  readonly elements: ElementPathIndex;
}

export interface ResolveSummary {
  resolved: number;
  unresolved: number;
}

export function referenceKind(attr: Attr): ReferenceKind | undefined {
  for (const kind of ["plain", "captioned", "named"] as const) {
    if (hasAttr(attr, REFERENCE_MARKERS[kind])) return kind;
  }
  return undefined;
}

export function sectionUrl(path: string, anchor?: string): string {
  return anchor ? `/section/${path}#${anchor}` : `/section/${path}`;
}

/** Link url with its leading `#`, if any, removed. */
export const referenceTarget = (url: string) => (url.startsWith("#") ? url.slice(1) : url);

/** URL for a bare target id, or `undefined` when neither index knows it. */
export function resolveTarget(target: string, indexes: LinkIndexes): string | undefined {
  const elementPath = indexes.elements.get(target);
  if (elementPath !== undefined) return sectionUrl(elementPath, target);
  const sectionPath = indexes.sections.get(target);
  if (sectionPath !== undefined) return sectionUrl(sectionPath);
  return undefined;
}

const isOpaque = (attr: Attr) =>
  hasAttr(attr, INDEX_TERM_ATTRIBUTE) || attr.classes.includes(QUESTION_CLASS);

export function resolveLinks(
  sections: readonly Section[],
  indexes: LinkIndexes,
  bus?: CourseBus,
): ResolveSummary {
  const summary: ResolveSummary = { resolved: 0, unresolved: 0 };

  const resolveRef = (node: NodeOf<"link">, kind: ReferenceKind, section: Section) => {
    const target = referenceTarget(node.target.url);
    const url = resolveTarget(target, indexes);
    if (url === undefined) {
      summary.unresolved++;
      bus?.emit("link:unresolved", { kind, target, section: section.id });
      return;
    }
    node.attr.attributes = [];
    node.target.url = url;
    if (!KEEPS_CAPTION[kind]) node.inlines = [];
    summary.resolved++;
    bus?.emit("link:resolved", { kind, target, url, section: section.id });
  };

  const visitAll = (nodes: readonly Node[], section: Section) => {
    for (const n of nodes) visit(n, section);
  };

  const visit = (node: Node, section: Section): void => {
    switch (node.kind) {
      case "link": {
        const kind = referenceKind(node.attr);
        if (kind) resolveRef(node, kind, section);
        return;
      }
      case "div":
        if (!isOpaque(node.attr)) visitAll(node.blocks, section);
        return;
      case "span":
        if (isOpaque(node.attr)) return;
        bus?.emit("span:entered", {
          id: node.attr.id,
          classes: [...node.attr.classes],
          section: section.id,
        });
        return visitAll(node.inlines, section);
      case "para":
      case "plain":
      case "emph":
      case "strong":
      case "quoted":
        return visitAll(node.inlines, section);
      case "bulletList":
      case "orderedList":
        for (const item of node.items) visitAll(item, section);
        return;
      case "definitionList":
        for (const { term, definitions } of node.items) {
          visitAll(term, section);
          for (const d of definitions) visitAll(d, section);
        }
        return;
      case "table":
        for (const cell of node.table.headers) visitAll(cell, section);
        for (const row of node.table.rows) {
          for (const cell of row) visitAll(cell, section);
        }
        return;
      case "heading":
      case "image":
      case "codeBlock":
      case "code":
      case "math":
      case "str":
      case "space":
      case "softBreak":
      case "lineBreak":
        return;
      case "unknown":
        bus?.emit("node:unknown", { pass: "link-resolver", tag: node.tag, section: section.id });
        return;
      default:
        return assertNever(node);
    }
  };

  walkSections(sections, (section) => visitAll(section.content ?? [], section));
  return summary;
}
