import { bold, cyan, dim, red, yellow } from "colorette";

import { type EventBus, eventBus } from "../universal/event-bus.ts";
import type { ReferenceKind } from "./link-resolver.ts";

/** Events emitted while a course is built. */
export type CourseBusEvents = {
  "tree:built": { sections: number };
  "index:built": { index: "section" | "element"; entries: number };
  "index:duplicate": { id: string; path: string; previous: string };
  "node:unknown": {
    pass: "element-index" | "link-resolver";
    tag: string;
    section: string;
  };
  "link:resolved": {
    kind: ReferenceKind;
    target: string;
    url: string;
    section: string;
  };
  "link:unresolved": { kind: ReferenceKind; target: string; section: string };
  /** A span that is neither an index term nor a question; its content is searched. */
  "span:entered": { id: string; classes: string[]; section: string };
  "section:written": { id: string; file: string };
  "toc:written": { file: string };
  "manifest:written": { file: string; lang: string };
  "input:removed": { file: string };
  "toc:tree": { lines: string[] };
};

export type CourseBus = EventBus<CourseBusEvents>;

export const courseBus = (): CourseBus => eventBus<CourseBusEvents>();

export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";
export type LogStyle = "json" | "rich";

export interface Logger {
  log(level: LogLevel, message: string): void;
}

/**
 * Line-oriented logger. The `json` style writes one
 * `{"level":"…","message":"…"}` object per line, the format the converter
 * driver collects from its helpers' stderr; `rich` is for humans.
 * DEBUG lines are dropped unless `debug` is set.
 */
export function logger(init: {
  style: LogStyle;
  debug?: boolean;
  write?: (line: string) => void;
}): Logger {
  const write = init.write ??
    ((line: string) => process.stderr.write(`${line}\n`));
  const tag: Record<LogLevel, (s: string) => string> = {
    DEBUG: dim,
    INFO: cyan,
    WARNING: (s) => bold(yellow(s)),
    ERROR: (s) => bold(red(s)),
  };
  return {
    log(level, message) {
      if (level === "DEBUG" && !init.debug) return;
      write(
        init.style === "json"
          ? JSON.stringify({ level, message })
          : `${tag[level](level.padEnd(7))} ${message}`,
      );
    },
  };
}

/** A course bus whose events are turned into log lines. */
export function logEventBus(log: Logger): CourseBus {
  const bus = courseBus();

  bus.on("tree:built", ({ sections }) =>
    log.log("INFO", `Extracted table of contents (${sections} top-level sections).`));
  bus.on("index:built", ({ index, entries }) =>
    log.log("INFO", `Created map of ${index} ids (${entries} entries).`));
  bus.on("index:duplicate", ({ id, path, previous }) =>
    log.log("DEBUG", `Element id ${id} in ${path} shadows the one in ${previous}`));
  bus.on("node:unknown", ({ pass, tag, section }) =>
    log.log("WARNING", `${pass}: unknown element ${tag} in section ${section}`));
  bus.on("link:resolved", ({ kind, target, url }) =>
    log.log("DEBUG", `Found ${kind} reference: '${target}' -> '${url}'`));
  bus.on("link:unresolved", ({ kind, target, section }) =>
    log.log(
      "WARNING",
      `Found ${kind} reference: couldn't map id=${target} in section ${section}`,
    ));
  bus.on("span:entered", ({ id, classes, section }) =>
    log.log(
      "DEBUG",
      `Found unknown span id=${id} classes=${classes.join(",")} in section ${section}, resolving links inside`,
    ));
  bus.on("section:written", ({ id }) => log.log("INFO", `Wrote section ${id}`));
  bus.on("toc:written", ({ file }) => log.log("INFO", `Wrote: ${file}`));
  bus.on("manifest:written", ({ file }) => log.log("INFO", `Wrote: ${file}`));
  bus.on("input:removed", ({ file }) =>
    log.log("INFO", `Removed original converter output: ${file}`));
  bus.on("toc:tree", ({ lines }) => {
    log.log("INFO", "TOC TREE:");
    for (const line of lines) log.log("INFO", line);
  });

  return bus;
}
