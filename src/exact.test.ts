import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { existsSync, lstatSync, mkdirSync, readFileSync, readdirSync, rmSync, symlinkSync, writeFileSync } from "fs";
import { join } from "path";
import type { Configuration } from "./config.ts";
import { CollisionError, NotFoundError } from "./errors.ts";
import { completeExact } from "./exact.ts";
import { captureLog, makeTmpDir } from "./test-helpers.ts";

let config: Configuration;
let notes: string;

beforeEach(() => {
  notes = makeTmpDir("exact");
  config = { configPath: join(notes, "wren.json"), notesDir: notes };
  writeFileSync(join(notes, "buy-milk"), "2 litres");
  writeFileSync(join(notes, "buy-milk-and-eggs"), "");
});

afterEach(() => {
  rmSync(notes, { recursive: true, force: true });
});

describe("completeExact", () => {
  test("moves only the exact name into done/", () => {
    const { log, out } = captureLog();
    const dest = completeExact(config, "buy-milk", log);

    expect(dest).toBe(join(notes, "done", "buy-milk"));
    expect(readFileSync(dest, "utf-8")).toBe("2 litres");
    expect(existsSync(join(notes, "buy-milk"))).toBe(false);
    expect(existsSync(join(notes, "buy-milk-and-eggs"))).toBe(true);
    expect(out).toEqual(["Marked done: buy-milk"]);
  });

  test("works when done/ already exists", () => {
    mkdirSync(join(notes, "done"));
    const { log } = captureLog();
    completeExact(config, "buy-milk-and-eggs", log);
    expect(readdirSync(join(notes, "done"))).toEqual(["buy-milk-and-eggs"]);
  });

  test("a missing title is NotFoundError and changes nothing", () => {
    const { log } = captureLog();
    expect(() => completeExact(config, "buy", log)).toThrow(new NotFoundError("task not found with exact name: 'buy'"));
    expect(readdirSync(notes).sort()).toEqual(["buy-milk", "buy-milk-and-eggs"]);
  });

  test("a symlinked task is moved as the link", () => {
    symlinkSync(join(notes, "buy-milk"), join(notes, "linked-task"));
    const { log } = captureLog();
    const dest = completeExact(config, "linked-task", log);

    expect(lstatSync(dest).isSymbolicLink()).toBe(true);
    expect(readFileSync(dest, "utf-8")).toBe("2 litres");
    expect(existsSync(join(notes, "linked-task"))).toBe(false);
  });

  test("a directory with that name is not a task", () => {
    mkdirSync(join(notes, "projects"));
    const { log } = captureLog();
    expect(() => completeExact(config, "projects", log)).toThrow(NotFoundError);
  });

  test("an existing done/<title> is a collision unless forced", () => {
    mkdirSync(join(notes, "done"));
    writeFileSync(join(notes, "done", "buy-milk"), "last week");
    const { log } = captureLog();

    expect(() => completeExact(config, "buy-milk", log)).toThrow(CollisionError);
    expect(existsSync(join(notes, "buy-milk"))).toBe(true);

    completeExact(config, "buy-milk", log, true);
    expect(readFileSync(join(notes, "done", "buy-milk"), "utf-8")).toBe("2 litres");
    expect(existsSync(join(notes, "buy-milk"))).toBe(false);
  });
});
