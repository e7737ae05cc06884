export { DispatchError, DispatchErrorCode, isDispatchError } from './errors.js';
export type { DispatchErrorContext } from './errors.js';
export { logger } from './logger.js';
export { LocalExecutor, splitLines } from './execution/executor.js';
export type { Executor, LocalExecutorOptions } from './execution/executor.js';
export {
  DEFAULT_BENIGN_PREFIXES,
  isBenignLine,
  classifyDiagnostics,
  resolveBenignPrefixes,
} from './dispatch/diagnostics.js';
export { optionsSatisfied, selectParser, bindParser } from './dispatch/matching.js';
export { CommandDispatcher } from './dispatch/dispatcher.js';
export type { DispatcherDeps } from './dispatch/dispatcher.js';
export { CommandRegistry } from './registry.js';
export type { CommandFunction, CommandNamespace } from './registry.js';
export { DEFAULT_COMMAND_TABLE } from './commands/table.js';
export type { DefaultCommandName } from './commands/table.js';
export { loadConfig, parseConfig, DEFAULT_CONFIG } from './config/loader.js';
export type { ConfigResult } from './config/loader.js';
export { createSamtools } from './samtools.js';
export type { CreateSamtoolsOptions } from './samtools.js';
export * from './parsers/index.js';
export type {
  CommandOutput,
  InvokeOptions,
  ParserBinding,
  CommandSpec,
  CommandTableEntry,
  CommandTable,
  ExecutionOutcome,
  DispatchRecord,
  DispatchConfig,
} from './types/index.js';
