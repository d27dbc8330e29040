import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { ensureNotesDir, loadConfig, wrenConfigPath } from "./config.ts";
import { ConfigError, WrapperError } from "./errors.ts";
import { captureLog, makeTmpDir } from "./test-helpers.ts";

let home: string;
let configPath: string;

function writeConfig(text: string): void {
  writeFileSync(configPath, text);
}

beforeEach(() => {
  home = makeTmpDir("config");
  mkdirSync(join(home, ".config", "wren"), { recursive: true });
  configPath = join(home, ".config", "wren", "wren.json");
});

afterEach(() => {
  rmSync(home, { recursive: true, force: true });
});

describe("wrenConfigPath", () => {
  test("defaults under ~/.config/wren", () => {
    expect(wrenConfigPath({ env: {}, home: "/home/someone" })).toBe("/home/someone/.config/wren/wren.json");
  });

  test("WREN_CONFIG overrides the default", () => {
    expect(wrenConfigPath({ env: { WREN_CONFIG: "/etc/wren.json" }, home })).toBe("/etc/wren.json");
  });
});

describe("loadConfig", () => {
  test("reads an absolute notes_dir", () => {
    const notes = join(home, "notes");
    writeConfig(JSON.stringify({ notes_dir: notes }));
    expect(loadConfig({ env: {}, home })).toEqual({ configPath, notesDir: notes });
  });

  test("expands ~ to the home directory", () => {
    writeConfig(JSON.stringify({ notes_dir: "~/notes" }));
    expect(loadConfig({ env: {}, home }).notesDir).toBe(join(home, "notes"));
  });

  test("relative paths resolve beside the config file", () => {
    writeConfig(JSON.stringify({ notes_dir: "notes" }));
    expect(loadConfig({ env: {}, home }).notesDir).toBe(join(home, ".config", "wren", "notes"));
  });

  test("accepts YAML as well as JSON", () => {
    writeConfig("notes_dir: ~/tasks\n");
    expect(loadConfig({ env: {}, home }).notesDir).toBe(join(home, "tasks"));
  });

  test("missing file is a ConfigError with exit 2", () => {
    rmSync(join(home, ".config"), { recursive: true, force: true });
    let caught: unknown;
    try {
      loadConfig({ env: {}, home });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError && caught.exitCode).toBe(2);
  });

  test("plain text that is not a mapping is rejected", () => {
    writeConfig("this is not json");
    expect(() => loadConfig({ env: {}, home })).toThrow(ConfigError);
  });

  test("malformed JSON is rejected", () => {
    writeConfig('{"notes_dir": ');
    expect(() => loadConfig({ env: {}, home })).toThrow(ConfigError);
  });

  test("missing notes_dir key is rejected", () => {
    writeConfig(JSON.stringify({ another_key: "value" }));
    expect(() => loadConfig({ env: {}, home })).toThrow(`could not read 'notes_dir' from ${configPath}`);
  });
});

describe("ensureNotesDir", () => {
  test("creates a missing directory", () => {
    const { log } = captureLog();
    const notesDir = join(home, "deep", "notes");
    ensureNotesDir({ configPath, notesDir }, log);
    expect(existsSync(notesDir)).toBe(true);
  });

  test("a file in the way is not a config error", () => {
    const { log } = captureLog();
    const notesDir = join(home, "notes");
    writeFileSync(notesDir, "");
    let caught: unknown;
    try {
      ensureNotesDir({ configPath, notesDir }, log);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(WrapperError);
    expect(caught).not.toBeInstanceOf(ConfigError);
  });
});
