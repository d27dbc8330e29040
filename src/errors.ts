// Error taxonomy: every failure the wrapper reports carries its exit status

export class WrapperError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number = 1) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

/** Missing or unusable wren config. Fatal. */
export class ConfigError extends WrapperError {
  constructor(message: string) {
    super(message, 2);
  }
}

/** The wren executable is not on PATH. Fatal. */
export class ToolNotFoundError extends WrapperError {
  constructor(name: string) {
    super(`'${name}' executable not found on $PATH`, 2);
  }
}

export class ArgumentError extends WrapperError {}

export class NotFoundError extends WrapperError {}

export class CollisionError extends WrapperError {
  readonly path: string;

  constructor(path: string) {
    super(`task file already exists: ${path}`);
    this.path = path;
  }
}

export class AbortedError extends WrapperError {
  constructor(message: string = "Aborted.") {
    super(message);
  }
}

/** Node system errors carry a string code (ENOENT, EEXIST, ...). */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
