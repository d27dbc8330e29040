// Future-date helper: "<YYYY-MM-DD> <title>" task files via zenity or a prompt

import { spawnSync } from "child_process";
import type { Configuration } from "./config.ts";
import { errorMessage } from "./errors.ts";
import type { Logger } from "./log.ts";
import { accept, promptLoop, retry, type Prompter, type Step } from "./prompt.ts";
import { createTaskFile, taskFilePath, type CreatedTask } from "./taskfile.ts";
import { which } from "./wren.ts";

export type PickResult =
  | { kind: "picked"; date: string }
  | { kind: "cancelled" }
  | { kind: "unavailable"; reason: string };

export interface DatePicker {
  pick(initial: Date): PickResult;
}

// ---------------------------------------------------------------------------
// Dates
// ---------------------------------------------------------------------------

/** Local calendar date as YYYY-MM-DD. */
export function formatDate(d: Date): string {
  const y = String(d.getFullYear()).padStart(4, "0");
  const m = String(d.getMonth() + 1).padStart(2, "0");
  const day = String(d.getDate()).padStart(2, "0");
  return `${y}-${m}-${day}`;
}

export function tomorrow(now: Date): Date {
  return new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1);
}

/** YYYY-MM-DD that names a real day (no 2025-02-30). */
export function isCalendarDate(value: string): boolean {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!m) return false;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

/** Fallback prompt answer; empty input means "schedule nothing". */
export function parseDateInput(input: string): Step<string | null> {
  const value = input.trim();
  if (value === "") return accept(null);
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return retry("Invalid date format. Please use YYYY-MM-DD.");
  }
  if (!isCalendarDate(value)) return retry(`No such date: ${value}.`);
  return accept(value);
}

// ---------------------------------------------------------------------------
// zenity
// ---------------------------------------------------------------------------

export class ZenityPicker implements DatePicker {
  constructor(
    private readonly env: NodeJS.ProcessEnv,
    private readonly log: Logger,
    private readonly lookup: (name: string) => string | null = which,
  ) {}

  pick(initial: Date): PickResult {
    if (!this.env.DISPLAY && !this.env.WAYLAND_DISPLAY) {
      return { kind: "unavailable", reason: "no graphical display" };
    }
    const bin = this.lookup("zenity");
    if (!bin) return { kind: "unavailable", reason: "zenity not found on $PATH" };

    const args = [
      "--calendar",
      "--text=Wren task date",
      "--date-format=%Y-%m-%d",
      `--day=${initial.getDate()}`,
      `--month=${initial.getMonth() + 1}`,
      `--year=${initial.getFullYear()}`,
    ];
    this.log.verbose(`executing: ${[bin, ...args].join(" ")}`);
    const result = spawnSync(bin, args, { encoding: "utf-8", stdio: ["ignore", "pipe", "pipe"] });
    if (result.error) {
      return { kind: "unavailable", reason: `zenity failed: ${errorMessage(result.error)}` };
    }

    const out = (result.stdout ?? "").trim();
    // zenity: 0 = OK, 1 = Cancel / window closed
    if (result.status === 1) return { kind: "cancelled" };
    if (result.status !== 0) {
      return { kind: "unavailable", reason: `zenity exited with status ${result.status ?? "null"}` };
    }
    if (out === "") return { kind: "cancelled" };
    if (!isCalendarDate(out)) {
      return { kind: "unavailable", reason: `unexpected zenity output: ${out}` };
    }
    return { kind: "picked", date: out };
  }
}

// ---------------------------------------------------------------------------
// Composer
// ---------------------------------------------------------------------------

export interface FutureTaskDeps {
  picker: DatePicker;
  prompter: Prompter;
  log: Logger;
  now?: () => Date;
  force?: boolean;
}

async function chooseDate(deps: FutureTaskDeps): Promise<string | null> {
  const initial = tomorrow((deps.now ?? (() => new Date()))());
  deps.log.verbose(`preselecting ${formatDate(initial)}`);
  const picked = deps.picker.pick(initial);
  switch (picked.kind) {
    case "picked":
      return picked.date;
    case "cancelled":
      deps.log.verbose("date selection cancelled");
      return null;
    case "unavailable":
      deps.log.verbose(`${picked.reason}; using the terminal prompt`);
      return promptLoop(
        deps.prompter,
        "Enter date (YYYY-MM-DD, empty to cancel): ",
        parseDateInput,
        deps.log,
      );
  }
}

/** Returns null when the user cancelled; nothing is written then. */
export async function createFutureTask(
  config: Configuration,
  title: string,
  deps: FutureTaskDeps,
): Promise<CreatedTask | null> {
  taskFilePath(config.notesDir, title);
  const date = await chooseDate(deps);
  if (date === null) {
    deps.log.info("Nothing scheduled.");
    return null;
  }

  const filename = `${date} ${title}`;
  deps.log.verbose(`creating future task file: ${filename}`);
  const created = createTaskFile(config.notesDir, filename, deps.force ?? false);
  deps.log.info(`${created.replaced ? "Replaced" : "Created"} future task: ${created.path}`);
  return created;
}
