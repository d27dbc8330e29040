// w: route one invocation to exactly one handler and return its exit code

import { USAGE, classify, type Invocation } from "./args.ts";
import { ensureNotesDir, loadConfig, type Configuration } from "./config.ts";
import { createCronTask } from "./cron.ts";
import { replacePattern, resolveDone } from "./disambiguate.ts";
import { AbortedError, WrapperError } from "./errors.ts";
import { completeExact } from "./exact.ts";
import { ZenityPicker, createFutureTask, type DatePicker } from "./future.ts";
import { Logger, type Sink } from "./log.ts";
import { ReadlinePrompter, type Prompter } from "./prompt.ts";
import { WrenProcess, findExecutable, which, type WrenTool } from "./wren.ts";

export interface RunDeps {
  env?: NodeJS.ProcessEnv;
  home?: string;
  stdout?: Sink;
  stderr?: Sink;
  lookup?: (name: string) => string | null;
  wren?: (path: string, log: Logger) => WrenTool;
  prompter?: Prompter;
  picker?: DatePicker;
  now?: () => Date;
}

export const DEFAULT_WREN_BIN = "wren";

function notesConfig(deps: RunDeps, log: Logger): Configuration {
  const config = loadConfig({ env: deps.env, home: deps.home });
  log.verbose(`read config from ${config.configPath}`);
  ensureNotesDir(config, log);
  return config;
}

function locateWren(deps: RunDeps, log: Logger): WrenTool {
  const env = deps.env ?? process.env;
  const path = findExecutable(env.WREN_BIN || DEFAULT_WREN_BIN, deps.lookup ?? which);
  log.verbose(`found wren executable at ${path}`);
  return deps.wren ? deps.wren(path, log) : new WrenProcess(path, log);
}

async function dispatch(inv: Invocation, deps: RunDeps, log: Logger, prompter: Prompter): Promise<number> {
  const { route, force } = inv;

  // The only route that never touches wren
  if (route.kind === "exact") {
    completeExact(notesConfig(deps, log), route.title, log, force);
    return 0;
  }

  const wren = locateWren(deps, log);

  switch (route.kind) {
    case "help":
      wren.run(["--help"]);
      log.print("\n--- w help ---");
      log.print(USAGE);
      return 0;

    case "cron":
      await createCronTask(notesConfig(deps, log), route.title, prompter, log, force);
      return 0;

    case "future": {
      const env = deps.env ?? process.env;
      await createFutureTask(notesConfig(deps, log), route.title, {
        picker: deps.picker ?? new ZenityPicker(env, log, deps.lookup ?? which),
        prompter,
        log,
        now: deps.now,
        force,
      });
      return 0;
    }

    case "disambiguate": {
      const outcome = await resolveDone(route.pattern, wren, prompter, log);
      prompter.close();
      switch (outcome.kind) {
        case "aborted":
          throw new AbortedError();
        case "delegate":
          log.verbose("zero or one candidate, proxying the original command");
          return wren.run(route.forward);
        case "proceed":
          log.verbose(`completing exact filename: ${outcome.filename}`);
          return wren.run(replacePattern(route.forward, route.patternIndex, outcome.filename));
      }
    }

    case "proxy":
      log.verbose("proxying to wren");
      return wren.run(route.forward);
  }
}

export async function run(argv: string[], deps: RunDeps = {}): Promise<number> {
  let log = new Logger({ stdout: deps.stdout, stderr: deps.stderr });
  const prompter = deps.prompter ?? new ReadlinePrompter();
  try {
    const inv = classify(argv);
    log = log.withOptions(inv);
    return await dispatch(inv, deps, log, prompter);
  } catch (err) {
    if (err instanceof WrapperError) {
      log.error(`w: ${err.message}`);
      return err.exitCode;
    }
    throw err;
  } finally {
    prompter.close();
  }
}
