// Wrapper output: stdout chatter honours -q, diagnostics go to stderr

export type Sink = (line: string) => void;

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  stdout?: Sink;
  stderr?: Sink;
}

export class Logger {
  readonly verboseEnabled: boolean;
  readonly quiet: boolean;
  private readonly out: Sink;
  private readonly err: Sink;

  constructor(opts: LoggerOptions = {}) {
    this.quiet = opts.quiet ?? false;
    this.verboseEnabled = (opts.verbose ?? false) && !this.quiet;
    this.out = opts.stdout ?? ((line) => console.log(line));
    this.err = opts.stderr ?? ((line) => console.error(line));
  }

  /** Normal progress output; suppressed by -q. */
  info(message: string): void {
    if (!this.quiet) this.out(message);
  }

  /** Output the user asked for (help); printed even with -q. */
  print(message: string): void {
    this.out(message);
  }

  /** Debug trace, only with -v. */
  verbose(message: string): void {
    if (this.verboseEnabled) this.err(`w: ${message}`);
  }

  error(message: string): void {
    this.err(message);
  }

  /** Same sinks, different verbosity (used once flags are parsed). */
  withOptions(opts: Pick<LoggerOptions, "verbose" | "quiet">): Logger {
    return new Logger({ ...opts, stdout: this.out, stderr: this.err });
  }
}
