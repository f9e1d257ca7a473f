import { readFileSync } from "node:fs";

import { createColors, isColorSupported } from "colorette";
import { Command, Option } from "commander";
import { z } from "zod";

import { plainText } from "../pandoc/ast.ts";
import { shell, verboseInfoShellEventBus } from "../universal/shell.ts";
import { envFlag, generateOptions } from "./config.ts";
import { type LogStyle, logEventBus, logger } from "./events.ts";
import { generateCourse, loadCourseTree } from "./pipeline.ts";
import { MAX_LEVEL, walkSections } from "./section-tree.ts";

/** Version from the package manifest next to the sources. */
export function packageVersion(): string {
  const pkg: unknown = JSON.parse(
    readFileSync(new URL("../../package.json", import.meta.url), "utf8"),
  );
  return z.object({ version: z.string() }).parse(pkg).version;
}

export class CLI {
  #failed = false;

  constructor(
    readonly init: {
      /** Sink for log and listing lines; defaults to stderr / stdout. */
      write?: (line: string) => void;
      /** Force colors on or off for `ls`. */
      color?: boolean;
    } = {},
  ) {}

  generateCmd() {
    return new Command("generate")
      .description(
        "Split a converted document into per-section files and resolve cross-references",
      )
      .argument("<input>", "converter output (JSON document); removed on success")
      .addOption(
        new Option("-l, --lang <code>", "two-letter language code").env("COURSETREE_LANG"),
      )
      .addOption(
        new Option("-f, --format <format>", "section file format")
          .choices(["json", "markdown"])
          .default("json")
          .env("COURSETREE_FORMAT"),
      )
      .option("-o, --outdir <dir>", "output directory (default: input dir + lang)")
      .option(
        "-d, --debug",
        "print the TOC tree and debug lines (env: COURSETREE_DEBUG=1|true|yes|on)",
      )
      .addOption(
        new Option("--pandoc <bin>", "converter used for markdown output")
          .default("pandoc")
          .env("COURSETREE_PANDOC"),
      )
      .addOption(
        new Option("--timeout <ms>", "converter timeout per section")
          .argParser((v) => Number(v))
          .default(120_000),
      )
      .addOption(
        new Option("--log-style <style>", "log line format")
          .choices(["json", "rich"])
          .default("json"),
      )
      .action(async (input: string, opts: Record<string, unknown>) => {
        const style: LogStyle = opts.logStyle === "rich" ? "rich" : "json";
        const debug = opts.debug === true || envFlag(process.env.COURSETREE_DEBUG);
        const log = logger({ style, debug, write: this.init.write });
        try {
          const options = generateOptions({
            input,
            lang: opts.lang,
            format: opts.format,
            debug,
            outdir: opts.outdir,
            pandoc: opts.pandoc,
            timeoutMs: opts.timeout,
          });
          const sh = shell({
            timeoutMs: options.timeoutMs,
            bus: debug
              ? verboseInfoShellEventBus({
                style: "plain",
                write: (line) => log.log("DEBUG", line),
              })
              : undefined,
          });
          await generateCourse(options, { bus: logEventBus(log), shell: sh });
        } catch (err) {
          this.#failed = true;
          log.log("ERROR", err instanceof Error ? err.message : String(err));
        }
      });
  }

  lsCmd() {
    return new Command("ls")
      .description("Show the section tree of a converted document")
      .argument("<input>", "converter output (JSON document)")
      .addOption(
        new Option("--depth <n>", `limit tree depth (1..${MAX_LEVEL})`)
          .argParser((v) => Number(v))
          .default(MAX_LEVEL),
      )
      .action(async (input: string, opts: { depth: number }) => {
        const write = this.init.write ?? ((line: string) => console.log(line));
        const c = createColors({ useColor: this.init.color ?? isColorSupported });
        const colorByDepth: Record<number, (s: string) => string> = {
          1: (s) => c.bold(c.magenta(s)),
          2: (s) => c.bold(c.green(s)),
          3: (s) => c.bold(c.blue(s)),
        };
        const limit = Math.max(1, Math.min(MAX_LEVEL, Number(opts.depth) || MAX_LEVEL));

        try {
          const { sections } = await loadCourseTree(input);
          walkSections(sections, (section, path, depth) => {
            if (depth > limit) return;
            const title = plainText(section.title) || c.dim("(untitled)");
            const type = section.type ? ` ${c.yellow(`[${section.type}]`)}` : "";
            write(
              `${"  ".repeat(depth - 1)}${colorByDepth[depth]?.(title) ?? title}${type} ${
                c.gray(path)
              }`,
            );
          });
        } catch (err) {
          this.#failed = true;
          logger({ style: "rich", write: this.init.write })
            .log("ERROR", err instanceof Error ? err.message : String(err));
        }
      });
  }

  command(name: string) {
    return new Command()
      .name(name)
      .version(packageVersion())
      .description("Course tree builder for converted course documents")
      .addCommand(this.generateCmd())
      .addCommand(this.lsCmd());
  }

  /** Parse `argv` (user arguments only) and return the process exit code. */
  async run(argv: string[] = process.argv.slice(2), name = "coursetree") {
    this.#failed = false;
    await this.command(name).parseAsync(argv, { from: "user" });
    return this.#failed ? 1 : 0;
  }

  static instance(init?: ConstructorParameters<typeof CLI>[0]) {
    return new CLI(init);
  }
}
