/**
 * @module section-writer
 *
 * Writes one `content.{ext}` file per section, up to `MAX_LEVEL`, and
 * strips the written content from the in-memory tree so that what remains
 * is the table of contents.
 *
 * ```
 * outdir/content.json                     ← root (first top-level) section
 * outdir/000-a/content.json               ← child of the root
 * outdir/001-intro/content.json           ← second top-level section
 * outdir/001-intro/000-x/content.json
 * ```
 *
 * Serialization is pluggable: `jsonSerializer()` dumps the wire-format node
 * list, `markdownSerializer()` hands the section to the converter running
 * in reverse.
 */
import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { type Node, str } from "../pandoc/ast.ts";
import { encodeDocument, encodeNodes, metaInlines } from "../pandoc/wire.ts";
import type { Shell } from "../universal/shell.ts";
import { ProcessError } from "./errors.ts";
import type { CourseBus } from "./events.ts";
import { MAX_LEVEL, type Section } from "./section-tree.ts";

export type OutputFormat = "json" | "markdown";

export const OUTPUT_FORMAT_EXT = {
  json: "json",
  markdown: "md",
} as const satisfies Record<OutputFormat, string>;

export interface SectionSerializer {
  readonly format: OutputFormat;
  readonly extension: string;
  serialize(content: readonly Node[], section: Section): Promise<string>;
}

export function jsonSerializer(): SectionSerializer {
  return {
    format: "json",
    extension: OUTPUT_FORMAT_EXT.json,
    serialize: (content) => Promise.resolve(JSON.stringify(encodeNodes(content))),
  };
}

/** Arguments for turning a JSON document back into markdown. */
export const PANDOC_MARKDOWN_ARGS = [
  "--atx-headers",
  "--wrap=preserve",
  "--columns=999",
  "--standalone",
  "--from=json",
  "--to=markdown+yaml_metadata_block",
] as const;

/** Document handed to the converter: content plus title/type metadata. */
export function sectionDocument(content: readonly Node[], section: Section) {
  const meta: Record<string, unknown> = { title: metaInlines(section.title) };
  if (section.type) meta.type = metaInlines([str(section.type)]);
  return encodeDocument(content, meta);
}

export function markdownSerializer(init: {
  shell: Pick<Shell, "spawnArgv">;
  pandoc?: string;
}): SectionSerializer {
  const pandoc = init.pandoc ?? "pandoc";
  const encoder = new TextEncoder();
  const decoder = new TextDecoder();

  return {
    format: "markdown",
    extension: OUTPUT_FORMAT_EXT.markdown,
    async serialize(content, section) {
      const stdin = encoder.encode(JSON.stringify(sectionDocument(content, section)));
      const result = await init.shell.spawnArgv([pandoc, ...PANDOC_MARKDOWN_ARGS], stdin);
      if (!result.success) {
        throw new ProcessError(
          pandoc,
          result.code,
          decoder.decode(result.stderr),
          result.timedOut,
        );
      }
      return decoder.decode(result.stdout);
    },
  };
}

/**
 * Serialize every section (depth-first, document order) and detach its
 * content. Returns the same, now content-free, sections. The first
 * top-level section is the root and writes straight into `outdir`.
 */
export async function writeSections(
  sections: Section[],
  outdir: string,
  serializer: SectionSerializer,
  bus?: CourseBus,
  maxLevel = MAX_LEVEL,
): Promise<Section[]> {
  const filename = `content.${serializer.extension}`;

  const writeSection = async (
    section: Section,
    parentDir: string,
    depth: number,
    root: boolean,
  ): Promise<void> => {
    if (depth > maxLevel) return;

    const dir = root ? parentDir : join(parentDir, section.id);
    await mkdir(dir, { recursive: true });

    const content = section.content ?? [];
    delete section.content;

    const file = join(dir, filename);
    await writeFile(file, await serializer.serialize(content, section), "utf8");
    bus?.emit("section:written", { id: section.id, file });

    for (const child of section.children) {
      await writeSection(child, dir, depth + 1, false);
    }
  };

  for (const [idx, section] of sections.entries()) {
    await writeSection(section, outdir, 1, idx === 0);
  }
  return sections;
}
