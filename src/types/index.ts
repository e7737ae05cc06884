export type {
  CommandOutput,
  InvokeOptions,
  ParserBinding,
  CommandSpec,
  CommandTableEntry,
  CommandTable,
  ExecutionOutcome,
  DispatchRecord,
} from './command.js';
export type { DispatchConfig } from './config.js';
