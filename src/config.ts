// Config reading: locates wren's notes directory (native YAML/JSON parsing)

import { existsSync, mkdirSync, readFileSync, statSync } from "fs";
import { homedir } from "os";
import { dirname, join, resolve } from "path";
import YAML from "yaml";
import { ConfigError, WrapperError, errorMessage } from "./errors.ts";
import type { Logger } from "./log.ts";

export interface Configuration {
  readonly configPath: string;
  readonly notesDir: string;
}

export interface ConfigOptions {
  env?: NodeJS.ProcessEnv;
  home?: string;
}

export function wrenConfigPath(opts: ConfigOptions = {}): string {
  const env = opts.env ?? process.env;
  if (env.WREN_CONFIG) return env.WREN_CONFIG;
  return join(opts.home ?? homedir(), ".config", "wren", "wren.json");
}

/** Expand a leading ~ and resolve relative paths against the config file's directory. */
export function expandNotesDir(raw: string, configPath: string, home: string): string {
  let p = raw;
  if (p === "~") p = home;
  else if (p.startsWith("~/")) p = join(home, p.slice(2));
  return resolve(dirname(configPath), p);
}

function parseConfigFile(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigError(`could not read config ${path}: ${errorMessage(err)}`);
  }
  try {
    // JSON is valid YAML 1.2, so wren.json parses as-is
    return YAML.parse(text);
  } catch (err) {
    throw new ConfigError(`config ${path} is not valid JSON/YAML: ${errorMessage(err)}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function loadConfig(opts: ConfigOptions = {}): Configuration {
  const home = opts.home ?? homedir();
  const configPath = wrenConfigPath({ ...opts, home });
  if (!existsSync(configPath)) {
    throw new ConfigError(`config file not found at ${configPath}`);
  }

  const data = parseConfigFile(configPath);
  if (!isRecord(data)) {
    throw new ConfigError(`config ${configPath} must be a mapping`);
  }
  const raw = data.notes_dir;
  if (typeof raw !== "string" || raw.trim() === "") {
    throw new ConfigError(`could not read 'notes_dir' from ${configPath}`);
  }

  return { configPath, notesDir: expandNotesDir(raw.trim(), configPath, home) };
}

/** Create the notes directory if it is missing. A missing directory is not a config error. */
export function ensureNotesDir(config: Configuration, log: Logger): void {
  if (existsSync(config.notesDir)) {
    if (!statSync(config.notesDir).isDirectory()) {
      throw new WrapperError(`notes directory ${config.notesDir} is not a directory`);
    }
    return;
  }
  log.verbose(`notes directory ${config.notesDir} does not exist, creating it`);
  try {
    mkdirSync(config.notesDir, { recursive: true });
  } catch (err) {
    throw new WrapperError(`could not create notes directory ${config.notesDir}: ${errorMessage(err)}`);
  }
}
