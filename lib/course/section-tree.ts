/**
 * @module section-tree
 *
 * Splits the converter's flat block sequence into a nested tree of
 * `Section`s by heading level.
 *
 * ```
 * # A {#intro}        →  000-intro
 * ## B                →  ├─ 000
 * ## C {#more}        →  └─ 001-more
 * #### D (level 4)         (stays in 001-more's content)
 * ```
 *
 * Section ids are the section's ordinal among its siblings, zero-padded to
 * three digits, followed by `-` and the heading's own identifier when it
 * has one. Two chapters may reuse the same heading identifier; the ordinal
 * keeps every path distinct.
 *
 * Only levels 1..`MAX_LEVEL` become sections. Everything below a level
 * `MAX_LEVEL` heading, deeper headings included, is that section's
 * content.
 */
import { type Node, type NodeOf, plainText } from "../pandoc/ast.ts";
import { encodeNodes, type WireNode } from "../pandoc/wire.ts";

/** Max. depth of headings that become sections. */
export const MAX_LEVEL = 3;

export type SectionType = "exercises" | "test";

export interface Section {
  title: Node[];
  id: string;
  type?: SectionType;
  /** Own content; detached by the writer once serialized. */
  content?: Node[];
  children: Section[];
  level: number;
}

export interface SectionTree {
  sections: Section[];
  /** Nodes before the first heading of the requested level. */
  preamble: Node[];
}

/** TOC entry as written to `toc.json` (content already detached). */
export interface TocEntry {
  title: WireNode[];
  id: string;
  type?: SectionType;
  children?: TocEntry[];
}

export function sectionId(ordinal: number, nativeId: string): string {
  const prefix = String(ordinal).padStart(3, "0");
  return nativeId ? `${prefix}-${nativeId}` : prefix;
}

export function sectionType(classes: readonly string[]): SectionType | undefined {
  if (classes.includes("exercises")) return "exercises";
  if (classes.includes("test")) return "test";
  return undefined;
}

export function childPath(parentPath: string, id: string): string {
  return parentPath ? `${parentPath}/${id}` : id;
}

export function buildSectionTree(
  nodes: readonly Node[],
  level = 1,
  maxLevel = MAX_LEVEL,
): SectionTree {
  const sections: Section[] = [];
  const preamble: Node[] = [];
  let open: Section | undefined;
  let pending: Node[] = [];

  const close = (section: Section) => {
    if (level < maxLevel) {
      const sub = buildSectionTree(pending, level + 1, maxLevel);
      section.children = sub.sections;
      if (sub.preamble.length) section.content = sub.preamble;
    } else if (pending.length) {
      section.content = pending;
    }
    sections.push(section);
  };

  const start = (heading: NodeOf<"heading">): Section => {
    const section: Section = {
      title: heading.inlines,
      id: sectionId(sections.length, heading.attr.id),
      children: [],
      level,
    };
    const type = sectionType(heading.attr.classes);
    if (type) section.type = type;
    return section;
  };

  for (const node of nodes) {
    if (node.kind === "heading" && node.level === level) {
      if (open) close(open);
      pending = [];
      open = start(node);
    } else if (open) {
      pending.push(node);
    } else {
      preamble.push(node);
    }
  }
  if (open) close(open);

  return { sections, preamble };
}

/**
 * Build the document tree and fold the document preamble into the root
 * (first top-level) section's content.
 */
export function buildDocumentTree(blocks: readonly Node[]): SectionTree {
  const tree = buildSectionTree(blocks);
  const [root] = tree.sections;
  if (root && tree.preamble.length) {
    root.content = [...tree.preamble, ...(root.content ?? [])];
    return { sections: tree.sections, preamble: [] };
  }
  return tree;
}

/** Pre-order walk; `path` is the section's hierarchical path. */
export function walkSections(
  sections: readonly Section[],
  visit: (section: Section, path: string, depth: number) => void,
  parentPath = "",
  depth = 1,
): void {
  for (const section of sections) {
    const path = childPath(parentPath, section.id);
    visit(section, path, depth);
    walkSections(section.children, visit, path, depth + 1);
  }
}

/** Table-of-contents view: title, id, type and children only. */
export function tocOf(sections: readonly Section[]): TocEntry[] {
  return sections.map((s) => {
    const entry: TocEntry = { title: encodeNodes(s.title), id: s.id };
    if (s.type) entry.type = s.type;
    if (s.children.length) entry.children = tocOf(s.children);
    return entry;
  });
}

/** `"{indent}{title} ({id})"` per section, indented by depth. */
export function tocTreeLines(
  sections: readonly Section[],
  maxLevel = MAX_LEVEL,
): string[] {
  const lines: string[] = [];
  walkSections(sections, (section, _path, depth) => {
    if (depth > maxLevel) return;
    lines.push(`${" ".repeat(depth)}${plainText(section.title)} (${section.id})`);
  });
  return lines;
}
