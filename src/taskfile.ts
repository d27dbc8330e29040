// Task files: the filename is the task; creation is exclusive

import { writeFileSync } from "fs";
import { dirname, join, resolve } from "path";
import { ArgumentError, CollisionError, WrapperError, errnoCode, errorMessage } from "./errors.ts";

export interface CreatedTask {
  path: string;
  replaced: boolean;
}

/** Full path of a task file, refusing any name that would leave `notesDir`. */
export function taskFilePath(notesDir: string, filename: string): string {
  if (filename.trim() === "") {
    throw new ArgumentError("task title must not be empty");
  }
  if (filename === "." || filename === ".." || filename.includes("/") || filename.includes("\0")) {
    throw new ArgumentError(`not a valid task filename: '${filename}'`);
  }
  const dir = resolve(notesDir);
  const path = join(dir, filename);
  if (dirname(path) !== dir) {
    throw new ArgumentError(`task filename escapes the notes directory: '${filename}'`);
  }
  return path;
}

/**
 * Create an empty task file with O_EXCL semantics. An existing file is a
 * CollisionError and stays untouched; `force` truncates it instead.
 */
export function createTaskFile(notesDir: string, filename: string, force: boolean = false): CreatedTask {
  const path = taskFilePath(notesDir, filename);
  try {
    writeFileSync(path, "", { flag: "wx" });
    return { path, replaced: false };
  } catch (err) {
    if (errnoCode(err) !== "EEXIST") {
      throw new WrapperError(`could not create task file ${path}: ${errorMessage(err)}`);
    }
  }
  if (!force) throw new CollisionError(path);
  try {
    writeFileSync(path, "", { flag: "w" });
  } catch (err) {
    throw new WrapperError(`could not replace task file ${path}: ${errorMessage(err)}`);
  }
  return { path, replaced: true };
}
