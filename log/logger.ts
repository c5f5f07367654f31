export type LogScope = "compiler" | "director" | "cli";

export type LogSink = Pick<Console, "log" | "warn" | "error">;

export interface LoggerOptions {
  enabled?: boolean;
  sink?: LogSink;
  talk?: string; // name of the conversation the messages are about
}

/**
 * Scoped logger, silent unless enabled. Messages go to the sink (the console
 * by default) prefixed with `[talkgraph <scope>]` or
 * `[talkgraph <scope>:<talk>]`.
 */
export class Logger {
  readonly enabled: boolean;
  private sink: LogSink;
  private prefix: string;

  constructor(
    readonly scope: LogScope,
    private options: LoggerOptions = {},
  ) {
    this.enabled = options.enabled ?? false;
    this.sink = options.sink ?? console;
    this.prefix = options.talk
      ? `[talkgraph ${scope}:${options.talk}]`
      : `[talkgraph ${scope}]`;
  }

  /** Same sink and switch, with messages tagged by a talk name. */
  forTalk(talk: string): Logger {
    return new Logger(this.scope, { ...this.options, talk });
  }

  log(message: string, ...args: unknown[]): void {
    if (this.enabled) this.sink.log(`${this.prefix} ${message}`, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled) this.sink.warn(`${this.prefix} ${message}`, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled) this.sink.error(`${this.prefix} ${message}`, ...args);
  }
}
