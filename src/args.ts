// Argument classification: wrapper flags vs. everything forwarded to wren

import { ArgumentError } from "./errors.ts";

export type Route =
  | { kind: "proxy"; forward: string[] }
  | { kind: "disambiguate"; pattern: string; patternIndex: number; forward: string[] }
  | { kind: "cron"; title: string }
  | { kind: "future"; title: string }
  | { kind: "exact"; title: string }
  | { kind: "help" };

export interface Invocation {
  route: Route;
  verbose: boolean;
  quiet: boolean;
  force: boolean;
}

type Command = "cron" | "future" | "exact";

const COMMAND_FLAGS: Record<string, Command> = {
  "-c": "cron",
  "--cron": "cron",
  "-f": "future",
  "--future": "future",
  "-x": "exact",
  "--exact": "exact",
};

const DONE_FLAGS = ["-d", "--done"];

function isOption(token: string): boolean {
  return token.startsWith("-") && token !== "-";
}

/** Locate `-d/--done <pattern>` in forwarded args. The pattern must not look like an option. */
export function findDonePattern(args: string[]): { pattern: string; index: number } | null {
  const at = args.findIndex((a) => DONE_FLAGS.includes(a));
  if (at < 0) return null;
  const next = args[at + 1];
  if (next === undefined || isOption(next)) return null;
  return { pattern: next, index: at + 1 };
}

export function classify(argv: string[]): Invocation {
  let verbose = false;
  let quiet = false;
  let force = false;
  let help = false;
  const commands: Array<{ command: Command; title: string; flag: string }> = [];
  const forward: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i] ?? "";

    if (token === "--") {
      forward.push(...argv.slice(i + 1));
      break;
    }

    const command = COMMAND_FLAGS[token];
    if (command) {
      const words: string[] = [];
      if (command === "exact") {
        const next = argv[i + 1];
        if (next !== undefined && next !== "--") {
          words.push(next);
          i++;
        }
      } else {
        while (i + 1 < argv.length && !isOption(argv[i + 1] ?? "-")) {
          words.push(argv[++i] ?? "");
        }
      }
      const title = words.join(" ");
      if (title.trim() === "") {
        throw new ArgumentError(`${token} requires a task title`);
      }
      commands.push({ command, title, flag: token });
      continue;
    }

    switch (token) {
      case "-h":
      case "--help":
        help = true;
        break;
      case "-v":
      case "--verbose":
        verbose = true;
        break;
      case "-q":
      case "--quiet":
        quiet = true;
        break;
      case "--force":
        force = true;
        break;
      default:
        forward.push(token);
    }
  }

  if (verbose && quiet) {
    throw new ArgumentError("--verbose and --quiet are mutually exclusive");
  }

  if (commands.length > 1) {
    const names = commands.map((c) => c.flag).join(", ");
    throw new ArgumentError(`${names}: only one of --cron, --future and --exact may be given`);
  }

  const done = findDonePattern(forward);
  const cmd = commands[0];
  if (cmd && done) {
    throw new ArgumentError(`${cmd.flag} cannot be combined with a -d/--done completion`);
  }
  if (force && !cmd) {
    throw new ArgumentError("--force only applies to -c/-f/-x");
  }

  const flags = { verbose, quiet, force };
  if (help) return { route: { kind: "help" }, ...flags };

  if (cmd) {
    if (forward.length > 0) {
      throw new ArgumentError(`${cmd.flag} does not take wren arguments: ${forward.join(" ")}`);
    }
    return { route: { kind: cmd.command, title: cmd.title }, ...flags };
  }

  if (done) {
    return {
      route: { kind: "disambiguate", pattern: done.pattern, patternIndex: done.index, forward },
      ...flags,
    };
  }
  return { route: { kind: "proxy", forward }, ...flags };
}

export const USAGE = `Usage: w [wrapper-flags] [--] [wren args | task title]

Wrapper flags:
  -c, --cron <title...>     Create a repeating task from a cron schedule
  -f, --future <title...>   Create a task for a future date (calendar or prompt)
  -x, --exact <title>       Mark the task with exactly this filename done
      --force               Replace an existing file instead of failing
  -h, --help                Show wren's help, then this message
  -v, --verbose             Trace what the wrapper does (stderr)
  -q, --quiet               Suppress wrapper output except errors

Any other arguments go to wren unchanged. When "-d/--done <pattern>"
matches several tasks, w asks which one to complete.
Arguments after "--" are always passed to wren.`;
