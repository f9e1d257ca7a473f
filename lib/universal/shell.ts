import { spawn } from "node:child_process";
import { performance } from "node:perf_hooks";

import { bold, cyan, dim, green, magenta, red } from "colorette";

import { type EventBus, eventBus } from "./event-bus.ts";

/** Events the shell factory can emit */
export type ShellBusEvents = {
  "spawn:start": {
    cmd: string;
    args: string[];
    hasStdin: boolean;
  };
  "spawn:done": {
    cmd: string;
    args: string[];
    code: number;
    success: boolean;
    timedOut: boolean;
    stdout: Uint8Array;
    stderr: Uint8Array;
    durationMs: number;
  };
  "spawn:error": {
    cmd: string;
    args: string[];
    error: unknown;
  };
};

export type RunResult = {
  code: number;
  success: boolean;
  /** The process was killed because it outlived `timeoutMs`. */
  timedOut: boolean;
  stdout: Uint8Array;
  stderr: Uint8Array;
};

export type Shell = ReturnType<typeof shell>;

export function shell(init?: {
  /** Kill the child (SIGKILL) once it runs longer than this. */
  timeoutMs?: number;
  /** Optional, strongly-typed event bus for shell lifecycle */
  bus?: EventBus<ShellBusEvents>;
}) {
  const timeoutMs = init?.timeoutMs;
  const bus = init?.bus;

  const run = (
    cmd: string,
    args: readonly string[],
    stdin?: Uint8Array,
  ): Promise<RunResult> => {
    const argsArr = [...args];
    const hasStdin = !!(stdin && stdin.length);
    bus?.emit("spawn:start", { cmd, args: argsArr, hasStdin });

    const started = performance.now();
    return new Promise<RunResult>((resolve, reject) => {
      const child = spawn(cmd, argsArr, {
        stdio: [hasStdin ? "pipe" : "ignore", "pipe", "pipe"],
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;
      let settled = false;

      const timer = timeoutMs === undefined ? undefined : setTimeout(() => {
        timedOut = true;
        child.kill("SIGKILL");
      }, timeoutMs);

      const finish = (outcome: () => void) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        outcome();
      };

      child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));

      child.on("error", (error) =>
        finish(() => {
          bus?.emit("spawn:error", { cmd, args: argsArr, error });
          reject(error);
        })
      );

      child.on("close", (exitCode) =>
        finish(() => {
          const code = exitCode ?? -1;
          const result: RunResult = {
            code,
            success: code === 0 && !timedOut,
            timedOut,
            stdout: new Uint8Array(Buffer.concat(stdout)),
            stderr: new Uint8Array(Buffer.concat(stderr)),
          };
          bus?.emit("spawn:done", {
            cmd,
            args: argsArr,
            ...result,
            durationMs: performance.now() - started,
          });
          resolve(result);
        })
      );

      if (hasStdin && child.stdin) {
        // a child that exits before reading all input closes the pipe early
        child.stdin.on("error", (error: NodeJS.ErrnoException) => {
          if (error.code !== "EPIPE") {
            finish(() => {
              child.kill("SIGKILL");
              reject(error);
            });
          }
        });
        child.stdin.end(stdin);
      }
    });
  };

  const spawnArgv = (argv: readonly string[], stdin?: Uint8Array) => {
    if (!argv.length) {
      return Promise.resolve<RunResult>({
        code: 0,
        success: true,
        timedOut: false,
        stdout: new Uint8Array(),
        stderr: new Uint8Array(),
      });
    }
    const [cmd, ...args] = argv;
    return run(cmd, args, stdin);
  };

  return { spawnArgv };
}

/**
 * Create a verbose info bus for Shell events.
 *
 * - style: "rich" → ANSI colors
 * - style: "plain" → no colors
 *
 * Pass the returned `bus` into `shell({ bus })`.
 */
export function verboseInfoShellEventBus(init: {
  style: "plain" | "rich";
  write?: (line: string) => void;
}) {
  const fancy = init.style === "rich";
  const write = init.write ?? ((line: string) => console.info(line));
  const bus = eventBus<ShellBusEvents>();

  const c = {
    tag: (s: string) => (fancy ? bold(magenta(s)) : s),
    cmd: (s: string) => (fancy ? bold(cyan(s)) : s),
    ok: (s: string) => (fancy ? green(s) : s),
    err: (s: string) => (fancy ? red(s) : s),
    faint: (s: string) => (fancy ? dim(s) : s),
  };

  const fmtArgs = (args: readonly string[]) =>
    args.map((a) => (/\s/.test(a) ? JSON.stringify(a) : a)).join(" ");

  bus.on("spawn:start", ({ cmd, args, hasStdin }) => {
    write(
      `${c.tag("[spawn]")} ${c.cmd(cmd)} ${fmtArgs(args)} ` +
        c.faint(hasStdin ? "stdin=piped" : "stdin=null"),
    );
  });

  bus.on("spawn:done", ({ cmd, code, success, timedOut, durationMs }) => {
    write(
      `${c.tag("[spawn]")} ${c.cmd(cmd)} ` +
        (success ? c.ok(`code=${code}`) : c.err(`code=${code}`)) +
        (timedOut ? c.err(" timed out") : "") +
        c.faint(` ${Math.round(durationMs)}ms`),
    );
  });

  bus.on("spawn:error", ({ cmd, error }) => {
    write(
      `${c.tag("[spawn]")} ${c.cmd(cmd)} ` +
        c.err(String(error instanceof Error ? error.message : error)),
    );
  });

  return bus;
}
