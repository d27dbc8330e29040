// In-process stand-ins for stdin, wren and the console, shared by the tests

import { mkdtempSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { Logger, type LoggerOptions } from "./log.ts";
import type { Prompter } from "./prompt.ts";
import type { CapturedRun, WrenTool } from "./wren.ts";

export function makeTmpDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `w-${prefix}-`));
}

/** Answers questions from a script; null or running out means EOF. */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  readonly said: string[] = [];
  closed = false;
  private readonly answers: Array<string | null>;

  constructor(answers: Array<string | null> = []) {
    this.answers = [...answers];
  }

  async ask(question: string): Promise<string | null> {
    this.questions.push(question);
    const next = this.answers.shift();
    return next === undefined ? null : next;
  }

  say(line: string): void {
    this.said.push(line);
  }

  close(): void {
    this.closed = true;
  }
}

export class FakeWren implements WrenTool {
  readonly runs: string[][] = [];
  readonly captures: string[][] = [];

  constructor(
    private readonly listing: string = "",
    private readonly exitCode: number = 0,
  ) {}

  run(args: string[]): number {
    this.runs.push(args);
    return this.exitCode;
  }

  capture(args: string[]): CapturedRun {
    this.captures.push(args);
    return { exitCode: 0, stdout: this.listing, stderr: "" };
  }
}

export function captureLog(opts: Pick<LoggerOptions, "verbose" | "quiet"> = {}): {
  log: Logger;
  out: string[];
  err: string[];
} {
  const out: string[] = [];
  const err: string[] = [];
  const log = new Logger({ ...opts, stdout: (l) => out.push(l), stderr: (l) => err.push(l) });
  return { log, out, err };
}
