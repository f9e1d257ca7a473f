import { test } from "node:test";
import { deepStrictEqual, equal, ok } from "node:assert/strict";

import { plainText } from "../pandoc/ast.ts";
import { heading, paraText } from "../pandoc/build.ts";
import {
  buildDocumentTree,
  buildSectionTree,
  MAX_LEVEL,
  type Section,
  sectionId,
  sectionType,
  tocOf,
  tocTreeLines,
  walkSections,
} from "./section-tree.ts";

const ids = (sections: readonly Section[]) => sections.map((s) => s.id);

test("sectionId(): zero-padded ordinal plus native id", () => {
  equal(sectionId(0, "intro"), "000-intro");
  equal(sectionId(12, ""), "012");
  equal(sectionId(7, "a-b"), "007-a-b");
});

test("sectionType(): exercises wins over test", () => {
  equal(sectionType(["x", "test"]), "test");
  equal(sectionType(["test", "exercises"]), "exercises");
  equal(sectionType(["other"]), undefined);
});

test("buildSectionTree(): nests by level", async (t) => {
  const blocks = [
    paraText("before"),
    heading(1, "a", "A"),
    paraText("a text"),
    heading(2, "", "A1"),
    paraText("a1 text"),
    heading(2, "b", "A2", ["test"]),
    heading(3, "c", "A2x"),
    paraText("deep"),
    heading(1, "a", "Again"),
  ];
  const tree = buildSectionTree(blocks);

  await t.test("preamble keeps what precedes the first heading", () => {
    deepStrictEqual(tree.preamble, [paraText("before")]);
  });

  await t.test("sibling ordinals restart per parent", () => {
    deepStrictEqual(ids(tree.sections), ["000-a", "001-a"]);
    deepStrictEqual(ids(tree.sections[0].children), ["000", "001-b"]);
    deepStrictEqual(ids(tree.sections[0].children[1].children), ["000-c"]);
  });

  await t.test("content holds the nodes before the first child heading", () => {
    const [a] = tree.sections;
    deepStrictEqual(a.content, [paraText("a text")]);
    deepStrictEqual(a.children[0].content, [paraText("a1 text")]);
    equal(a.children[1].content, undefined);
    equal(a.children[1].type, "test");
    deepStrictEqual(a.children[1].children[0].content, [paraText("deep")]);
  });

  await t.test("levels and titles follow the headings", () => {
    const [a, again] = tree.sections;
    equal(a.level, 1);
    equal(a.children[1].children[0].level, 3);
    equal(plainText(again.title), "Again");
    deepStrictEqual(again.children, []);
    equal(again.content, undefined);
  });
});

test("buildSectionTree(): headings deeper than the max level stay content", () => {
  const deep = heading(MAX_LEVEL + 1, "d", "Deep");
  const tree = buildSectionTree([
    heading(1, "", "One"),
    heading(2, "", "Two"),
    heading(3, "", "Three"),
    paraText("three text"),
    deep,
    paraText("deep text"),
  ]);
  const three = tree.sections[0].children[0].children[0];
  deepStrictEqual(three.children, []);
  deepStrictEqual(three.content, [paraText("three text"), deep, paraText("deep text")]);
});

test("buildSectionTree(): a level 2 heading before any level 1 is preamble", () => {
  const tree = buildSectionTree([heading(2, "x", "X"), heading(1, "y", "Y")]);
  deepStrictEqual(ids(tree.sections), ["000-y"]);
  equal(tree.preamble.length, 1);
});

test("buildDocumentTree(): preamble folds into the root section", async (t) => {
  await t.test("prepended to root content", () => {
    const tree = buildDocumentTree([
      paraText("pre"),
      heading(1, "r", "Root"),
      paraText("own"),
    ]);
    deepStrictEqual(tree.preamble, []);
    deepStrictEqual(tree.sections[0].content, [paraText("pre"), paraText("own")]);
  });

  await t.test("left alone when there is no section", () => {
    const tree = buildDocumentTree([paraText("only")]);
    deepStrictEqual(tree.sections, []);
    deepStrictEqual(tree.preamble, [paraText("only")]);
  });
});

test("walkSections(), tocOf() and tocTreeLines()", async (t) => {
  const { sections } = buildSectionTree([
    heading(1, "a", "A"),
    heading(2, "", "B", ["exercises"]),
    heading(3, "c", "C"),
    heading(1, "", "D"),
  ]);

  await t.test("pre-order paths and depths", () => {
    const seen: string[] = [];
    walkSections(sections, (_s, path, depth) => seen.push(`${depth}:${path}`));
    deepStrictEqual(seen, ["1:000-a", "2:000-a/000", "3:000-a/000/000-c", "1:001"]);
  });

  await t.test("toc carries titles as wire inlines and omits empty children", () => {
    deepStrictEqual(tocOf(sections), [
      {
        title: [{ t: "Str", c: "A" }],
        id: "000-a",
        children: [
          {
            title: [{ t: "Str", c: "B" }],
            id: "000",
            type: "exercises",
            children: [{ title: [{ t: "Str", c: "C" }], id: "000-c" }],
          },
        ],
      },
      { title: [{ t: "Str", c: "D" }], id: "001" },
    ]);
  });

  await t.test("tree lines indent by depth", () => {
    deepStrictEqual(tocTreeLines(sections), [" A (000-a)", "  B (000)", "   C (000-c)", " D (001)"]);
    ok(tocTreeLines(sections, 1).every((l) => l.startsWith(" ") && !l.startsWith("  ")));
  });
});
