import { readFile, writeFile } from "node:fs/promises";

import { parse as YAMLparse, stringify as YAMLstringify } from "yaml";
import { z } from "zod";

import { plainText } from "../pandoc/ast.ts";
import { decodeNodes } from "../pandoc/wire.ts";
import { ManifestError } from "./errors.ts";

/** Title used when the document carries none. */
export const UNKNOWN_COURSE_TITLE = "UNKNOWN COURSE";

/**
 * The manifest is shared by every language build of a course; keys other
 * than `languages` and `title` belong to other tools and are kept.
 */
export const manifestSchema = z.looseObject({
  languages: z.array(z.string()).default([]),
  title: z.record(z.string(), z.string()).default({}),
});

export type Manifest = z.output<typeof manifestSchema>;

const metaTitleSchema = z.union([
  z.object({ t: z.literal("MetaInlines"), c: z.array(z.unknown()) }),
  z.object({ t: z.literal("MetaString"), c: z.string() }),
]);

/** Course title from document metadata (`MetaInlines` or `MetaString`). */
export function courseTitle(meta: Record<string, unknown>): string {
  const parsed = metaTitleSchema.safeParse(meta.title);
  if (!parsed.success) return UNKNOWN_COURSE_TITLE;
  const title = parsed.data.t === "MetaString"
    ? parsed.data.c
    : plainText(decodeNodes(parsed.data.c, "meta.title"));
  return title.trim() || UNKNOWN_COURSE_TITLE;
}

const isErrnoException = (e: unknown): e is NodeJS.ErrnoException =>
  e instanceof Error && "code" in e;

export async function readManifest(path: string): Promise<Manifest> {
  let source: string;
  try {
    source = await readFile(path, "utf8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return manifestSchema.parse({});
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = YAMLparse(source) ?? {};
  } catch (err) {
    throw new ManifestError(path, [String(err)]);
  }
  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ManifestError(
      path,
      parsed.error.issues.map((i) => `${i.path.map(String).join(".")}: ${i.message}`),
    );
  }
  return parsed.data;
}

/**
 * Register `lang` in the manifest at `path` (created if missing): append it
 * to `languages` unless present and set `title[lang]`.
 */
export async function updateManifest(
  path: string,
  lang: string,
  title: string,
): Promise<Manifest> {
  const manifest = await readManifest(path);
  if (!manifest.languages.includes(lang)) manifest.languages.push(lang);
  manifest.title[lang] = title;
  await writeFile(path, YAMLstringify(manifest), "utf8");
  return manifest;
}
