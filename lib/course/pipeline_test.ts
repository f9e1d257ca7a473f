import { access, copyFile, mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type TestContext, test } from "node:test";
import { fileURLToPath } from "node:url";
import { deepStrictEqual, equal, rejects } from "node:assert/strict";

import { parse as YAMLparse } from "yaml";

import { WireFormatError } from "../pandoc/wire.ts";
import type { RunResult } from "../universal/shell.ts";
import { generateOptions } from "./config.ts";
import { InputError } from "./errors.ts";
import { courseBus, logEventBus, logger } from "./events.ts";
import { generateCourse, loadCourseTree } from "./pipeline.ts";
import { walkSections } from "./section-tree.ts";

const FIXTURE = new URL("./pipeline_test-fixture-01.json", import.meta.url);

const exists = (path: string) => access(path).then(() => true, () => false);

async function workspace(t: TestContext) {
  const dir = await mkdtemp(join(tmpdir(), "coursetree-pipeline-"));
  t.after(() => rm(dir, { recursive: true, force: true }));
  const build = join(dir, "build");
  await mkdir(build);
  const input = join(build, "course.json");
  await copyFile(FIXTURE, input);
  return { dir, build, input };
}

test("loadCourseTree(): fixture sections", async () => {
  const paths: string[] = [];
  const { sections, document } = await loadCourseTree(fileURLToPath(FIXTURE));
  walkSections(sections, (_s, path) => paths.push(path));
  deepStrictEqual(paths, [
    "000-LABEL_1",
    "000-LABEL_1/000-LABEL_1_1",
    "000-LABEL_1/000-LABEL_1_1/000-LABEL_1_1_1",
    "000-LABEL_1/001-LABEL_1_2",
    "000-LABEL_1/001-LABEL_1_2/000-LABEL_1_2_1",
    "000-LABEL_1/002",
  ]);
  equal(sections[0].children[2].type, "exercises");
  equal(document.blocks.length, 13);
});

test("generateCourse(): json build", async (t) => {
  const { build, input } = await workspace(t);
  const lines: string[] = [];
  const bus = logEventBus(logger({ style: "json", debug: true, write: (l) => lines.push(l) }));

  const result = await generateCourse(generateOptions({ input, lang: "de", debug: true }), { bus });
  const outdir = join(build, "de");

  await t.test("indexes and link summary", () => {
    equal(result.outdir, outdir);
    equal(result.indexes.sections.size, 5);
    deepStrictEqual(Object.fromEntries(result.indexes.elements), {
      infolabel: "000-LABEL_1/001-LABEL_1_2/000-LABEL_1_2_1",
      LABEL_1_2_1_1: "000-LABEL_1/001-LABEL_1_2/000-LABEL_1_2_1",
    });
    deepStrictEqual(result.links, { resolved: 2, unresolved: 1 });
  });

  await t.test("one file per section", async () => {
    const files = [
      join(outdir, "content.json"),
      join(outdir, "000-LABEL_1_1", "content.json"),
      join(outdir, "000-LABEL_1_1", "000-LABEL_1_1_1", "content.json"),
      join(outdir, "001-LABEL_1_2", "content.json"),
      join(outdir, "001-LABEL_1_2", "000-LABEL_1_2_1", "content.json"),
      join(outdir, "002", "content.json"),
    ];
    for (const file of files) equal(await exists(file), true, file);
  });

  await t.test("root content has resolved links", async () => {
    const root = JSON.parse(await readFile(join(outdir, "content.json"), "utf8"));
    deepStrictEqual(root, [{
      t: "Para",
      c: [
        { t: "Str", c: "Introductory" },
        { t: "Space" },
        { t: "Str", c: "text." },
        { t: "Space" },
        {
          t: "Link",
          c: [
            ["", [], []],
            [],
            ["/section/000-LABEL_1/001-LABEL_1_2/000-LABEL_1_2_1#infolabel", ""],
          ],
        },
        { t: "Space" },
        {
          t: "Link",
          c: [
            ["", [], []],
            [{ t: "Str", c: "Intro" }],
            ["/section/000-LABEL_1/000-LABEL_1_1/000-LABEL_1_1_1", ""],
          ],
        },
      ],
    }]);
  });

  await t.test("deep headings and unresolved links stay in their section", async () => {
    const leaf = JSON.parse(
      await readFile(join(outdir, "001-LABEL_1_2", "000-LABEL_1_2_1", "content.json"), "utf8"),
    );
    deepStrictEqual(leaf.map((n: { t: string }) => n.t), ["Div", "Header", "Para"]);
    deepStrictEqual(leaf[2].c[2], {
      t: "Link",
      c: [
        ["", [], [["data-mnref", "missing-id"]]],
        [{ t: "Str", c: "gone" }],
        ["missing-id", ""],
      ],
    });
  });

  await t.test("toc.json holds the content-free tree", async () => {
    equal(result.metadataFile, join(outdir, "toc.json"));
    deepStrictEqual(JSON.parse(await readFile(result.metadataFile, "utf8")), [{
      title: [{ t: "Str", c: "1" }],
      id: "000-LABEL_1",
      children: [
        {
          title: [{ t: "Str", c: "1-1" }],
          id: "000-LABEL_1_1",
          children: [{ title: [{ t: "Str", c: "Introduction" }], id: "000-LABEL_1_1_1" }],
        },
        {
          title: [{ t: "Str", c: "1-2" }],
          id: "001-LABEL_1_2",
          children: [{ title: [{ t: "Str", c: "1-2-1" }], id: "000-LABEL_1_2_1" }],
        },
        { title: [{ t: "Str", c: "Exercises" }], id: "002", type: "exercises" },
      ],
    }]);
  });

  await t.test("log lines", () => {
    const warnings = lines.filter((l) => l.startsWith('{"level":"WARNING"'));
    deepStrictEqual(warnings, [
      JSON.stringify({
        level: "WARNING",
        message: "Found named reference: couldn't map id=missing-id in section 000-LABEL_1_2_1",
      }),
    ]);
    const tree = lines.slice(lines.indexOf(JSON.stringify({ level: "INFO", message: "TOC TREE:" })) + 1)
      .slice(0, 6)
      .map((l) => JSON.parse(l).message);
    deepStrictEqual(tree, [
      " 1 (000-LABEL_1)",
      "  1-1 (000-LABEL_1_1)",
      "   Introduction (000-LABEL_1_1_1)",
      "  1-2 (001-LABEL_1_2)",
      "   1-2-1 (000-LABEL_1_2_1)",
      "  Exercises (002)",
    ]);
  });

  await t.test("input is removed", async () => {
    equal(await exists(input), false);
  });
});

test("generateCourse(): markdown build updates the shared manifest", async (t) => {
  const { dir, input } = await workspace(t);
  const outdir = join(dir, "site", "en");
  const bus = courseBus();
  const manifests: string[] = [];
  bus.on("manifest:written", ({ file, lang }) => manifests.push(`${lang} ${file}`));
  let calls = 0;
  const shell = {
    spawnArgv: (): Promise<RunResult> => {
      calls++;
      return Promise.resolve({
        code: 0,
        success: true,
        timedOut: false,
        stdout: new TextEncoder().encode(`# section ${calls}\n`),
        stderr: new Uint8Array(),
      });
    },
  };

  const result = await generateCourse(
    generateOptions({ input, lang: "en", format: "markdown", outdir }),
    { bus, shell },
  );

  const manifestFile = join(dir, "site", "manifest.yml");
  equal(calls, 6);
  equal(result.metadataFile, manifestFile);
  deepStrictEqual(manifests, [`en ${manifestFile}`]);
  deepStrictEqual(YAMLparse(await readFile(manifestFile, "utf8")), {
    languages: ["en"],
    title: { en: "Test Course" },
  });
  equal(await readFile(join(outdir, "content.md"), "utf8"), "# section 1\n");
  equal(await readFile(join(outdir, "002", "content.md"), "utf8"), "# section 6\n");
  equal(await exists(join(outdir, "toc.json")), false);
  equal(await exists(input), false);
});

test("generateCourse(): bad input is fatal and kept", async (t) => {
  const { build, input } = await workspace(t);

  await writeFile(input, "{ not json", "utf8");
  await rejects(generateCourse(generateOptions({ input, lang: "de" })), InputError);
  equal(await exists(input), true);

  await writeFile(input, JSON.stringify({ blocks: [{ t: "Para", c: "x" }] }), "utf8");
  await rejects(generateCourse(generateOptions({ input, lang: "de" })), WireFormatError);
  equal(await exists(input), true);
  equal(await exists(join(build, "de")), false);
});
