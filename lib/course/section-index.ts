import type { CourseBus } from "./events.ts";
import { type Section, walkSections } from "./section-tree.ts";

/** Bare heading id → hierarchical path of its section. */
export type SectionPathIndex = ReadonlyMap<string, string>;

/**
 * Remove the ordinal prefix from a section id: `"000-foo"` → `"foo"`,
 * `"000"` → `""`.
 */
export function bareId(sectionId: string): string {
  const rest = sectionId.slice(3);
  return rest.startsWith("-") ? rest.slice(1) : rest;
}

/**
 * Map every section's bare id to its full path. Sections with a pure
 * ordinal id have no bare id and are left out, so references cannot reach
 * them.
 */
export function createSectionPathIndex(
  sections: readonly Section[],
  bus?: CourseBus,
): SectionPathIndex {
  const index = new Map<string, string>();
  walkSections(sections, (section, path) => {
    const bare = bareId(section.id);
    if (bare) index.set(bare, path);
  });
  bus?.emit("index:built", { index: "section", entries: index.size });
  return index;
}
