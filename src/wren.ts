// wren subprocess wrappers: transparent proxy and captured mode

import { spawnSync } from "child_process";
import { ToolNotFoundError, WrapperError, errnoCode, errorMessage } from "./errors.ts";
import type { Logger } from "./log.ts";

export interface CapturedRun {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface WrenTool {
  /** Run with inherited stdio; returns wren's exit code unchanged. */
  run(args: string[]): number;
  /** Run with stdout/stderr buffered for parsing. */
  capture(args: string[]): CapturedRun;
}

/** Resolve an executable on PATH, or null. */
export function which(name: string): string | null {
  const result = spawnSync("which", [name], { encoding: "utf-8", stdio: ["ignore", "pipe", "pipe"] });
  if (result.error || result.status !== 0) return null;
  const path = result.stdout.trim().split("\n")[0] ?? "";
  return path || null;
}

export function findExecutable(name: string, lookup: (name: string) => string | null = which): string {
  const path = lookup(name);
  if (!path) throw new ToolNotFoundError(name);
  return path;
}

const SIGNAL_NUMBERS: Partial<Record<NodeJS.Signals, number>> = {
  SIGHUP: 1,
  SIGINT: 2,
  SIGQUIT: 3,
  SIGKILL: 9,
  SIGPIPE: 13,
  SIGTERM: 15,
};

/** Shell convention: a child killed by a signal reports 128 + signal number. */
export function exitStatus(status: number | null, signal: NodeJS.Signals | null): number {
  if (status !== null) return status;
  const num = signal ? SIGNAL_NUMBERS[signal] : undefined;
  return num === undefined ? 1 : 128 + num;
}

export class WrenProcess implements WrenTool {
  constructor(
    readonly path: string,
    private readonly log: Logger,
  ) {}

  run(args: string[]): number {
    this.log.verbose(`executing: ${[this.path, ...args].join(" ")}`);
    const result = spawnSync(this.path, args, { stdio: "inherit" });
    if (result.error) this.fail(result.error);
    return exitStatus(result.status, result.signal);
  }

  capture(args: string[]): CapturedRun {
    this.log.verbose(`capturing: ${[this.path, ...args].join(" ")}`);
    const result = spawnSync(this.path, args, {
      encoding: "utf-8",
      stdio: ["inherit", "pipe", "pipe"],
    });
    if (result.error) this.fail(result.error);
    return {
      exitCode: exitStatus(result.status, result.signal),
      stdout: result.stdout ?? "",
      stderr: result.stderr ?? "",
    };
  }

  private fail(err: Error): never {
    if (errnoCode(err) === "ENOENT") throw new ToolNotFoundError(this.path);
    throw new WrapperError(`could not run ${this.path}: ${errorMessage(err)}`, 2);
  }
}
