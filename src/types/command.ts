/** Raw stdout of a run: text from in-process executors, bytes from a child process. */
export type CommandOutput = string | Buffer;

/**
 * Named options accepted by every command callable. The dispatcher reads `raw` and
 * `encoding`; the rest are handed to the matched parser untouched.
 */
export interface InvokeOptions {
  /** Skip output parsers even when one would match. */
  readonly raw?: boolean;
  /** Decode unparsed byte output to text instead of returning the Buffer. */
  readonly encoding?: BufferEncoding;
  readonly [name: string]: unknown;
}

/**
 * Pairs the arguments a call must contain with the transform applied to its stdout.
 * `requiredOptions` is checked against the literal argument list of the call,
 * never against the toolkit's defaults or option aliases.
 */
export interface ParserBinding<T = unknown> {
  readonly requiredOptions: ReadonlySet<string> | readonly string[];
  readonly transform: (stdout: string, options: InvokeOptions) => T;
}

/** One toolkit subcommand as exposed to callers. */
export interface CommandSpec<T = unknown> {
  readonly identifier: string;
  readonly publicName: string;
  readonly parsers: readonly ParserBinding<T>[];
}

export interface CommandTableEntry<T = unknown> {
  readonly identifier: string;
  readonly parsers?: readonly ParserBinding<T>[];
}

/** Declarative surface for adding commands: public name → identifier and parsers. */
export type CommandTable = Readonly<Record<string, CommandTableEntry>>;

/** What the executor hands back for a single run of a subcommand. */
export interface ExecutionOutcome {
  readonly exitCode: number;
  readonly stderrLines: readonly string[];
  /** stderr exactly as written, line endings included. */
  readonly stderr: string;
  readonly stdout: CommandOutput;
}

/** Value of one invocation together with the stderr lines it produced. */
export interface DispatchRecord<T> {
  readonly value: CommandOutput | T;
  readonly stderrLines: readonly string[];
}
