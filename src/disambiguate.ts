// Interactive `-d/--done`: pick one of several fuzzy matches by number

import { AbortedError } from "./errors.ts";
import type { Logger } from "./log.ts";
import { accept, promptLoop, retry, type Prompter, type Step } from "./prompt.ts";
import type { WrenTool } from "./wren.ts";

export type Outcome =
  | { kind: "proceed"; filename: string }
  | { kind: "delegate" }
  | { kind: "aborted" };

const MARKER = "- ";
const ABORT_TOKEN = "q";

/**
 * wren lists matches one per line, optionally as "- name". Error lines and
 * blanks are dropped; order is kept because it defines the numbering.
 */
export function parseCandidates(stdout: string): string[] {
  const candidates: string[] = [];
  for (const raw of stdout.split("\n")) {
    const line = raw.trim();
    if (!line || line.startsWith("Error -")) continue;
    candidates.push(line.startsWith(MARKER) ? line.slice(MARKER.length) : line);
  }
  return candidates;
}

export function parseSelection(input: string, count: number): Step<number> {
  const value = input.trim();
  if (value.toLowerCase() === ABORT_TOKEN) return { kind: "abort" };
  if (!/^\d+$/.test(value)) {
    return retry("Invalid input. Please enter a number from the list.");
  }
  const choice = parseInt(value, 10);
  if (choice < 1 || choice > count) return retry("Invalid selection.");
  return accept(choice);
}

/** The original command with only the pattern token swapped for the chosen filename. */
export function replacePattern(args: string[], index: number, filename: string): string[] {
  const out = [...args];
  out[index] = filename;
  return out;
}

export async function resolveDone(
  pattern: string,
  wren: WrenTool,
  prompter: Prompter,
  log: Logger,
): Promise<Outcome> {
  log.verbose(`finding candidates for pattern: ${pattern}`);
  const listed = wren.capture(["-d", pattern]);
  const candidates = parseCandidates(listed.stdout);
  log.verbose(`${candidates.length} candidate(s)`);

  if (candidates.length < 2) return { kind: "delegate" };

  prompter.say(`Multiple tasks match "${pattern}". Mark which one as done?`);
  candidates.forEach((task, i) => prompter.say(`${i + 1}) ${task}`));

  let choice: number;
  try {
    choice = await promptLoop(
      prompter,
      `Selection (1-${candidates.length}, ${ABORT_TOKEN} to abort) > `,
      (input) => parseSelection(input, candidates.length),
      log,
    );
  } catch (err) {
    if (err instanceof AbortedError) return { kind: "aborted" };
    throw err;
  }

  const filename = candidates[choice - 1];
  return filename === undefined ? { kind: "aborted" } : { kind: "proceed", filename };
}
