// Cron helper: "<m h dom mon dow> <title>" repeating task files

import type { Configuration } from "./config.ts";
import type { Logger } from "./log.ts";
import { accept, promptLoop, retry, type Prompter, type Step } from "./prompt.ts";
import { createTaskFile, taskFilePath, type CreatedTask } from "./taskfile.ts";

export const CRON_CHEAT_SHEET = `Cron cheat-sheet:
┌──────── minute (0-59)
│ ┌────── hour   (0-23)
│ │ ┌──── day    (1-31)
│ │ │ ┌── month  (1-12)
│ │ │ │ ┌─ weekday(0-6 Sun-Sat)
│ │ │ │ │
* * * * *  command`;

const FIELD_COUNT = 5;

/**
 * Arity check only: exactly five fields, re-joined with single spaces.
 * Field ranges are left to wren.
 */
export function parseSchedule(input: string): Step<string> {
  const fields = input.trim().split(/\s+/).filter((f) => f.length > 0);
  if (fields.length !== FIELD_COUNT) {
    return retry(
      `Invalid cron string format. It must have ${FIELD_COUNT} space-separated fields (got ${fields.length}).`,
    );
  }
  if (fields.some((f) => f.includes("/"))) {
    return retry("Cron steps with '/' cannot be used in a task filename. Use a list instead (e.g. 0,15,30,45).");
  }
  return accept(fields.join(" "));
}

export async function createCronTask(
  config: Configuration,
  title: string,
  prompter: Prompter,
  log: Logger,
  force: boolean = false,
): Promise<CreatedTask> {
  taskFilePath(config.notesDir, title);
  prompter.say(CRON_CHEAT_SHEET);
  const schedule = await promptLoop(prompter, 'Enter cron schedule (e.g. "0 4 * * *"): ', parseSchedule, log);

  const filename = `${schedule} ${title}`;
  log.verbose(`creating cron task file: ${filename}`);
  const created = createTaskFile(config.notesDir, filename, force);
  log.info(`${created.replaced ? "Replaced" : "Created"} repeating task: ${created.path}`);
  return created;
}
