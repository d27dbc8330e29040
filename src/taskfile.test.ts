import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { readFileSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { ArgumentError, CollisionError } from "./errors.ts";
import { createTaskFile, taskFilePath } from "./taskfile.ts";
import { makeTmpDir } from "./test-helpers.ts";

let dir: string;

beforeEach(() => {
  dir = makeTmpDir("taskfile");
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("taskFilePath", () => {
  test("joins a plain name onto the notes directory", () => {
    expect(taskFilePath(dir, "0 4 * * * Pay rent")).toBe(join(dir, "0 4 * * * Pay rent"));
  });

  test("rejects names that are not a single path component", () => {
    for (const name of ["", "  ", ".", "..", "a/b", "../escape"]) {
      expect(() => taskFilePath(dir, name)).toThrow(ArgumentError);
    }
  });
});

describe("createTaskFile", () => {
  test("creates an empty file", () => {
    const created = createTaskFile(dir, "Pay rent");
    expect(created).toEqual({ path: join(dir, "Pay rent"), replaced: false });
    expect(readFileSync(created.path, "utf-8")).toBe("");
  });

  test("never overwrites an existing file", () => {
    const path = join(dir, "Pay rent");
    writeFileSync(path, "keep me");
    expect(() => createTaskFile(dir, "Pay rent")).toThrow(CollisionError);
    expect(readFileSync(path, "utf-8")).toBe("keep me");
  });

  test("force replaces an existing file", () => {
    const path = join(dir, "Pay rent");
    writeFileSync(path, "old");
    expect(createTaskFile(dir, "Pay rent", true)).toEqual({ path, replaced: true });
    expect(readFileSync(path, "utf-8")).toBe("");
  });
});
