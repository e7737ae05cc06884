import { isUtf8 } from 'node:buffer';
import type { Logger } from 'pino';
import type {
  CommandOutput,
  CommandSpec,
  DispatchRecord,
  ExecutionOutcome,
  InvokeOptions,
  ParserBinding,
} from '../types/command.js';
import type { Executor } from '../execution/executor.js';
import { DispatchError, DispatchErrorCode } from '../errors.js';
import { logger as rootLogger } from '../logger.js';
import { classifyDiagnostics, DEFAULT_BENIGN_PREFIXES } from './diagnostics.js';
import { selectParser } from './matching.js';

export interface DispatcherDeps {
  readonly executor: Executor;
  readonly benignPrefixes?: readonly string[];
}

/**
 * Emulates one toolkit subcommand as an async function call.
 *
 * Captures stdout and stderr of every run. Rejects with a {@link DispatchError} when
 * the subcommand exits non-zero, or when it exits zero but leaves anything on stderr
 * other than a known notice. Otherwise returns stdout, transformed by the first parser
 * binding whose required options all appear in the call's arguments.
 */
export class CommandDispatcher<T = never> {
  readonly identifier: string;
  readonly publicName: string;
  readonly parsers: readonly ParserBinding<T>[];

  private readonly executor: Executor;
  private readonly benignPrefixes: readonly string[];
  private readonly log: Logger;
  // Overwritten by every call; concurrent calls on one instance race here (use run() for call-scoped lines).
  private lastStderr: readonly string[] = [];

  constructor(spec: CommandSpec<T>, deps: DispatcherDeps) {
    this.identifier = spec.identifier;
    this.publicName = spec.publicName;
    this.parsers = Object.freeze([...spec.parsers]);
    this.executor = deps.executor;
    this.benignPrefixes = deps.benignPrefixes ?? DEFAULT_BENIGN_PREFIXES;
    this.log = rootLogger.child({ command: spec.publicName });
  }

  /**
   * Run the subcommand and resolve to stdout or the matched parser's result.
   * Unparsed output keeps the executor's form: a Buffer from LocalExecutor
   * unless `encoding` is given.
   */
  async invoke(args: readonly string[], options: InvokeOptions = {}): Promise<CommandOutput | T> {
    const { value } = await this.run(args, options);
    return value;
  }

  /** Like {@link invoke}, but also resolves to the stderr lines of this particular call. */
  async run(args: readonly string[], options: InvokeOptions = {}): Promise<DispatchRecord<T>> {
    this.log.debug({ identifier: this.identifier, argCount: args.length }, 'Dispatching command');

    const outcome = await this.executor.execute(this.identifier, args);
    this.lastStderr = outcome.stderrLines;

    try {
      this.check(outcome);
    } catch (err) {
      if (err instanceof DispatchError) {
        this.log.warn({ code: err.code, exitCode: outcome.exitCode }, 'Command failed');
      }
      throw err;
    }

    return { value: this.parse(outcome.stdout, args, options), stderrLines: outcome.stderrLines };
  }

  /** Stderr lines of the most recent call, unfiltered. */
  getMessages(): readonly string[] {
    return this.lastStderr;
  }

  /** Usage text the toolkit prints when the subcommand is run without arguments. */
  async usage(): Promise<string> {
    const outcome = await this.executor.execute(this.identifier, []);
    return outcome.stderr;
  }

  private check(outcome: ExecutionOutcome): void {
    if (outcome.exitCode !== 0) {
      const stderr = outcome.stderrLines.join('\n');
      throw new DispatchError(
        DispatchErrorCode.EXECUTION_FAILED,
        `${this.identifier} returned with error ${outcome.exitCode}: ${stderr}`,
        { command: this.identifier, exitCode: outcome.exitCode, stderr },
      );
    }

    const { suspicious } = classifyDiagnostics(outcome.stderrLines, this.benignPrefixes);
    if (suspicious.length > 0) {
      throw new DispatchError(DispatchErrorCode.UNEXPECTED_DIAGNOSTIC, suspicious.join('\n'), {
        command: this.identifier,
        lines: suspicious,
      });
    }
  }

  private parse(stdout: CommandOutput, args: readonly string[], options: InvokeOptions): CommandOutput | T {
    const binding = options.raw || stdout.length === 0 ? undefined : selectParser(this.parsers, args);
    if (binding) {
      const text = asText(stdout);
      if (text !== undefined) {
        this.log.trace({ requiredOptions: [...binding.requiredOptions] }, 'Applying output parser');
        return binding.transform(text, options);
      }
      this.log.debug('Output is not UTF-8 text, returning it unparsed');
    }
    if (typeof stdout === 'string' || options.encoding === undefined) return stdout;
    return stdout.toString(options.encoding);
  }
}

/** Parsers only ever see text; byte output that is not valid UTF-8 (BAM, BCF) is never decoded. */
function asText(stdout: CommandOutput): string | undefined {
  if (typeof stdout === 'string') return stdout;
  return isUtf8(stdout) ? stdout.toString('utf8') : undefined;
}
