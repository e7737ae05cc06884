// Command execution layer — every dispatched subcommand passes through this module.
// LocalExecutor is the only boundary between the adapter and the toolkit binary:
// it never throws for a non-zero exit (the dispatcher classifies that), only when
// the binary cannot be started or its output cannot be collected.
import execa from 'execa';
import type { ExecutionOutcome } from '../types/command.js';
import { DispatchError, DispatchErrorCode } from '../errors.js';
import { logger } from '../logger.js';

/** Runs one toolkit subcommand. Called with no args for the usage text. */
export interface Executor {
  execute(commandIdentifier: string, args: readonly string[]): Promise<ExecutionOutcome>;
}

export interface LocalExecutorOptions {
  binary?: string;
  cwd?: string;
  env?: Record<string, string>;
  /** Largest stdout/stderr captured, in bytes. execa's default applies when unset. */
  maxBuffer?: number;
}

// Exit status reported for a child killed by a signal, matching the shell convention.
const SIGNAL_EXIT_CODE = 128;

/**
 * Executes `<binary> <identifier> ...args` as a child process, without a shell.
 * stdout is captured as bytes so binary output (BAM, BCF) survives untouched.
 */
export class LocalExecutor implements Executor {
  readonly binary: string;
  private readonly cwd?: string;
  private readonly env?: Record<string, string>;
  private readonly maxBuffer?: number;

  constructor(options: LocalExecutorOptions = {}) {
    this.binary = options.binary ?? 'samtools';
    this.cwd = options.cwd;
    this.env = options.env;
    this.maxBuffer = options.maxBuffer;
  }

  async execute(commandIdentifier: string, args: readonly string[]): Promise<ExecutionOutcome> {
    const argv = [commandIdentifier, ...args];
    logger.trace({ binary: this.binary, argv }, 'Spawning toolkit command');

    const result = await execa(this.binary, argv, {
      cwd: this.cwd,
      env: this.env,
      maxBuffer: this.maxBuffer,
      encoding: null,
      reject: false,
      stripFinalNewline: false,
    }).catch((err: unknown) => {
      throw this.failure(DispatchErrorCode.SPAWN_FAILED, commandIdentifier, err instanceof Error ? err.message : String(err));
    });

    const terminated = result.signal !== undefined;
    // With reject: false, a run that ended without an exit code comes back as a failed result.
    if (result.failed && !terminated && typeof result.exitCode !== 'number') {
      const cause = result instanceof Error ? result.message : 'no exit code reported';
      throw this.failure(
        isSpawnError(result) ? DispatchErrorCode.SPAWN_FAILED : DispatchErrorCode.CAPTURE_FAILED,
        commandIdentifier,
        cause,
      );
    }

    const stderr = result.stderr.toString('utf8');
    return {
      exitCode: terminated ? SIGNAL_EXIT_CODE : result.exitCode,
      stderrLines: splitLines(stderr),
      stderr,
      stdout: result.stdout,
    };
  }

  private failure(
    code: DispatchErrorCode.SPAWN_FAILED | DispatchErrorCode.CAPTURE_FAILED,
    command: string,
    cause: string,
  ): DispatchError {
    const verb = code === DispatchErrorCode.SPAWN_FAILED ? 'run' : 'capture output of';
    return new DispatchError(code, `Could not ${verb} ${this.binary} ${command}: ${cause}`, {
      command,
      binary: this.binary,
      cause,
    });
  }
}

/** Errors from the child's 'error' event carry the failing syscall, e.g. "spawn samtools". */
function isSpawnError(result: object): boolean {
  return 'syscall' in result && typeof result.syscall === 'string' && result.syscall.startsWith('spawn');
}

/** Split captured stderr into lines; a trailing newline does not produce an empty line. */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}
