export enum DispatchErrorCode {
  EXECUTION_FAILED = 'EXECUTION_FAILED',
  UNEXPECTED_DIAGNOSTIC = 'UNEXPECTED_DIAGNOSTIC',
  UNKNOWN_COMMAND = 'UNKNOWN_COMMAND',
  DUPLICATE_COMMAND = 'DUPLICATE_COMMAND',
  SPAWN_FAILED = 'SPAWN_FAILED',
  CAPTURE_FAILED = 'CAPTURE_FAILED',
  PARSE_FAILED = 'PARSE_FAILED',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

/** What each failure carries, so callers can branch on the code and read typed fields. */
export interface DispatchErrorContext {
  [DispatchErrorCode.EXECUTION_FAILED]: { command: string; exitCode: number; stderr: string };
  [DispatchErrorCode.UNEXPECTED_DIAGNOSTIC]: { command: string; lines: readonly string[] };
  [DispatchErrorCode.UNKNOWN_COMMAND]: { name: string };
  [DispatchErrorCode.DUPLICATE_COMMAND]: { name: string };
  // The binary could not be started at all.
  [DispatchErrorCode.SPAWN_FAILED]: { command: string; binary: string; cause: string };
  // The process started but its output could not be collected (e.g. maxBuffer exceeded).
  [DispatchErrorCode.CAPTURE_FAILED]: { command: string; binary: string; cause: string };
  [DispatchErrorCode.PARSE_FAILED]: { parser: string; line: string };
  [DispatchErrorCode.INVALID_CONFIG]: { path: string; issues?: string[] };
}

export class DispatchError<C extends DispatchErrorCode = DispatchErrorCode> extends Error {
  readonly code: C;
  readonly context: DispatchErrorContext[C];

  constructor(code: C, message: string, context: DispatchErrorContext[C]) {
    super(message);
    this.name = 'DispatchError';
    this.code = code;
    this.context = context;
  }
}

export function isDispatchError<C extends DispatchErrorCode>(err: unknown, code?: C): err is DispatchError<C> {
  return err instanceof DispatchError && (code === undefined || err.code === code);
}
