import { basename, dirname, join, normalize } from "node:path";

import { z } from "zod";

import { ConfigError } from "./errors.ts";

export const generateOptionsSchema = z.object({
  /** Converter output (JSON document) to split; removed after a good run. */
  input: z.string().min(1),
  lang: z.string().regex(/^[a-z]{2}$/, "expected a two-letter language code"),
  format: z.enum(["json", "markdown"]).default("json"),
  debug: z.boolean().default(false),
  outdir: z.string().min(1).optional(),
  pandoc: z.string().min(1).default("pandoc"),
  timeoutMs: z.number().int().positive().default(120_000),
});

export type GenerateOptions = z.output<typeof generateOptionsSchema>;

export function generateOptions(init: unknown): GenerateOptions {
  const parsed = generateOptionsSchema.safeParse(init);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) =>
        i.path.length ? `${i.path.map(String).join(".")}: ${i.message}` : i.message
      ),
    );
  }
  return parsed.data;
}

/**
 * Default output directory: the input's directory, with the language code
 * appended unless the directory is already named after it.
 */
export function defaultOutdir(input: string, lang: string): string {
  const dir = normalize(dirname(input));
  return basename(dir) === lang ? dir : join(dir, lang);
}

const ENV_TRUE = new Set(["1", "true", "yes", "on"]);

/** Boolean environment flag: `1`, `true`, `yes` or `on` (any case) is set. */
export function envFlag(value: string | undefined): boolean {
  return value !== undefined && ENV_TRUE.has(value.trim().toLowerCase());
}
