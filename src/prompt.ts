// Interactive prompting: one loop shared by selection, cron entry and date entry

import { createInterface, type Interface } from "readline";
import { AbortedError } from "./errors.ts";
import type { Logger } from "./log.ts";

export interface Prompter {
  /** Next line of input, or null on end of input / Ctrl-C. */
  ask(question: string): Promise<string | null>;
  /** Print a line that belongs to the prompt itself (shown even with -q). */
  say(line: string): void;
  close(): void;
}

export type Step<T> =
  | { kind: "accept"; value: T }
  | { kind: "retry"; message: string }
  | { kind: "abort" };

export function accept<T>(value: T): Step<T> {
  return { kind: "accept", value };
}

export function retry<T>(message: string): Step<T> {
  return { kind: "retry", message };
}

/**
 * Prompting → {accepted, aborted}. Retries print the message on stderr and
 * ask again; an abort step or a null line (EOF, Ctrl-C) throws AbortedError.
 */
export async function promptLoop<T>(
  prompter: Prompter,
  question: string,
  parse: (input: string) => Step<T>,
  log: Logger,
): Promise<T> {
  for (;;) {
    const line = await prompter.ask(question);
    const step: Step<T> = line === null ? { kind: "abort" } : parse(line);
    switch (step.kind) {
      case "accept":
        return step.value;
      case "abort":
        throw new AbortedError();
      case "retry":
        log.error(step.message);
    }
  }
}

// ---------------------------------------------------------------------------
// readline-backed prompter
// ---------------------------------------------------------------------------

/**
 * Lines that arrive while no question is pending are queued, so piped input
 * (`printf '2\n' | w -d milk`) is consumed one answer per question.
 */
export class ReadlinePrompter implements Prompter {
  private rl: Interface | null = null;
  private readonly queued: string[] = [];
  private waiting: ((line: string | null) => void) | null = null;
  private ended = false;
  private readonly onSigint = (): void => this.interrupt();

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  ask(question: string): Promise<string | null> {
    const rl = this.open();
    if (this.ended) {
      this.output.write(question);
    } else {
      rl.setPrompt(question);
      rl.prompt();
    }
    const line = this.queued.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  say(line: string): void {
    this.output.write(`${line}\n`);
  }

  close(): void {
    process.removeListener("SIGINT", this.onSigint);
    const rl = this.rl;
    this.rl = null;
    rl?.close();
  }

  private open(): Interface {
    if (this.rl) return this.rl;
    if (this.ended) throw new AbortedError("input is closed");
    const rl = createInterface({ input: this.input, output: this.output });
    rl.on("line", (line) => this.deliver(line));
    rl.on("close", () => {
      this.ended = true;
      this.deliver(null);
    });
    rl.on("SIGINT", this.onSigint);
    // Non-TTY stdin: readline never sees ^C, the process does
    process.once("SIGINT", this.onSigint);
    this.rl = rl;
    return rl;
  }

  private deliver(line: string | null): void {
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting(line);
    } else if (line !== null) {
      this.queued.push(line);
    }
  }

  private interrupt(): void {
    this.output.write("\n");
    this.rl?.close();
  }
}
