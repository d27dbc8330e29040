// Exact completion: move <notes>/<title> into done/ without wren's substring match

import { existsSync, mkdirSync, renameSync, statSync } from "fs";
import { join } from "path";
import type { Configuration } from "./config.ts";
import { CollisionError, NotFoundError, WrapperError, errnoCode, errorMessage } from "./errors.ts";
import type { Logger } from "./log.ts";
import { taskFilePath } from "./taskfile.ts";

export const DONE_DIR = "done";

/** Follows symlinks: a link to a task file is a task; the link itself is moved. */
function isRegularFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return false;
    throw err;
  }
}

export function completeExact(
  config: Configuration,
  title: string,
  log: Logger,
  force: boolean = false,
): string {
  const source = taskFilePath(config.notesDir, title);
  log.verbose(`marking exact task done: ${source}`);
  if (!isRegularFile(source)) {
    throw new NotFoundError(`task not found with exact name: '${title}'`);
  }

  const doneDir = join(config.notesDir, DONE_DIR);
  const dest = join(doneDir, title);
  if (!force && existsSync(dest)) throw new CollisionError(dest);

  try {
    renameSync(source, dest);
  } catch (err) {
    if (errnoCode(err) !== "ENOENT" || existsSync(doneDir)) {
      throw new WrapperError(`could not move '${title}' to ${doneDir}: ${errorMessage(err)}`);
    }
    log.verbose(`creating ${doneDir}`);
    try {
      mkdirSync(doneDir, { recursive: true });
      renameSync(source, dest);
    } catch (retryErr) {
      throw new WrapperError(`could not move '${title}' to ${doneDir}: ${errorMessage(retryErr)}`);
    }
  }

  log.info(`Marked done: ${title}`);
  return dest;
}
