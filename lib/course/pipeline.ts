/**
 * @module pipeline
 *
 * End-to-end course build from one converter output file:
 *
 * 1. load and decode the JSON document,
 * 2. split it into sections,
 * 3. index section and element ids,
 * 4. resolve cross-reference links,
 * 5. write one file per section,
 * 6. write `toc.json` (json) or update `../manifest.yml` (markdown),
 * 7. remove the input file.
 *
 * Each step finishes before the next begins: a link anywhere may point at
 * a section that appears later in the document, so the indexes must be
 * complete before resolving, and content must be resolved before it is
 * written.
 */
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";

import { type DecodedDocument, decodeDocument } from "../pandoc/wire.ts";
import { type Shell, shell } from "../universal/shell.ts";
import { defaultOutdir, type GenerateOptions } from "./config.ts";
import { createElementPathIndex, type ElementPathIndex } from "./element-index.ts";
import { InputError } from "./errors.ts";
import type { CourseBus } from "./events.ts";
import { type ResolveSummary, resolveLinks } from "./link-resolver.ts";
import { courseTitle, updateManifest } from "./manifest.ts";
import { createSectionPathIndex, type SectionPathIndex } from "./section-index.ts";
import { buildDocumentTree, type Section, tocOf, tocTreeLines } from "./section-tree.ts";
import {
  jsonSerializer,
  markdownSerializer,
  type SectionSerializer,
  writeSections,
} from "./section-writer.ts";

export const TOC_FILENAME = "toc.json";
export const MANIFEST_FILENAME = "manifest.yml";

export interface CourseTree {
  document: DecodedDocument;
  sections: Section[];
}

export interface GenerateResult {
  outdir: string;
  /** Content-free section tree, as written to the TOC. */
  sections: Section[];
  indexes: { sections: SectionPathIndex; elements: ElementPathIndex };
  links: ResolveSummary;
  /** `toc.json` or the manifest, whichever the format calls for. */
  metadataFile: string;
}

export async function loadDocument(path: string): Promise<DecodedDocument> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf8"));
  } catch (err) {
    throw new InputError(path, err);
  }
  return decodeDocument(raw);
}

/** Load and split a document without writing anything. */
export async function loadCourseTree(path: string, bus?: CourseBus): Promise<CourseTree> {
  const document = await loadDocument(path);
  const { sections } = buildDocumentTree(document.blocks);
  bus?.emit("tree:built", { sections: sections.length });
  return { document, sections };
}

export function serializerFor(
  options: Pick<GenerateOptions, "format" | "pandoc" | "timeoutMs">,
  sh?: Pick<Shell, "spawnArgv">,
): SectionSerializer {
  switch (options.format) {
    case "json":
      return jsonSerializer();
    case "markdown":
      return markdownSerializer({
        shell: sh ?? shell({ timeoutMs: options.timeoutMs }),
        pandoc: options.pandoc,
      });
  }
}

export async function generateCourse(
  options: GenerateOptions,
  deps: { bus?: CourseBus; shell?: Pick<Shell, "spawnArgv"> } = {},
): Promise<GenerateResult> {
  const { bus } = deps;
  const { document, sections } = await loadCourseTree(options.input, bus);

  const indexes = {
    sections: createSectionPathIndex(sections, bus),
    elements: createElementPathIndex(sections, bus),
  };
  const links = resolveLinks(sections, indexes, bus);

  const outdir = options.outdir ?? defaultOutdir(options.input, options.lang);
  await mkdir(outdir, { recursive: true });
  await writeSections(sections, outdir, serializerFor(options, deps.shell), bus);

  let metadataFile: string;
  if (options.format === "markdown") {
    metadataFile = resolve(outdir, "..", MANIFEST_FILENAME);
    await updateManifest(metadataFile, options.lang, courseTitle(document.meta));
    bus?.emit("manifest:written", { file: metadataFile, lang: options.lang });
  } else {
    metadataFile = join(outdir, TOC_FILENAME);
    await writeFile(metadataFile, JSON.stringify(tocOf(sections)), "utf8");
    bus?.emit("toc:written", { file: metadataFile });
  }

  if (options.debug) bus?.emit("toc:tree", { lines: tocTreeLines(sections) });

  await rm(options.input);
  bus?.emit("input:removed", { file: options.input });

  return { outdir, sections, indexes, links, metadataFile };
}
