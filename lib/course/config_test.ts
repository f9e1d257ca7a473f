import { join } from "node:path";
import { test } from "node:test";
import { deepStrictEqual, equal, throws } from "node:assert/strict";

import { defaultOutdir, envFlag, generateOptions } from "./config.ts";
import { ConfigError } from "./errors.ts";

test("generateOptions(): defaults", () => {
  deepStrictEqual(generateOptions({ input: "course.json", lang: "de" }), {
    input: "course.json",
    lang: "de",
    format: "json",
    debug: false,
    pandoc: "pandoc",
    timeoutMs: 120_000,
  });
});

test("generateOptions(): explicit values pass through", () => {
  const opts = generateOptions({
    input: "x.json",
    lang: "en",
    format: "markdown",
    debug: true,
    outdir: "out",
    pandoc: "/opt/pandoc",
    timeoutMs: 500,
  });
  equal(opts.format, "markdown");
  equal(opts.outdir, "out");
  equal(opts.timeoutMs, 500);
});

test("generateOptions(): invalid values raise ConfigError with every issue", () => {
  throws(
    () => generateOptions({ input: "x.json", lang: "deu", format: "html" }),
    (err: unknown) =>
      err instanceof ConfigError &&
      err.issues.length === 2 &&
      err.issues[0] === "lang: expected a two-letter language code" &&
      err.issues[1].startsWith("format: "),
  );
  throws(() => generateOptions({ lang: "de" }), ConfigError);
  throws(() => generateOptions({ input: "x.json", lang: "de", timeoutMs: 0 }), ConfigError);
});

test("defaultOutdir(): appends the language unless already there", () => {
  equal(defaultOutdir(join("build", "course.json"), "de"), join("build", "de"));
  equal(defaultOutdir(join("build", "de", "course.json"), "de"), join("build", "de"));
  equal(defaultOutdir("course.json", "en"), "en");
});

test("envFlag(): only affirmative values are set", () => {
  for (const value of ["1", "true", "TRUE", " yes ", "on"]) equal(envFlag(value), true, value);
  for (const value of [undefined, "", "0", "false", "no", "off"]) equal(envFlag(value), false, String(value));
});
