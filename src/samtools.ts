import type { CommandTable } from './types/command.js';
import type { DispatchConfig } from './types/config.js';
import { LocalExecutor, type Executor } from './execution/executor.js';
import { resolveBenignPrefixes } from './dispatch/diagnostics.js';
import { DEFAULT_COMMAND_TABLE } from './commands/table.js';
import { loadConfig } from './config/loader.js';
import { CommandRegistry } from './registry.js';

export interface CreateSamtoolsOptions {
  /** Used as-is; otherwise the config file is loaded. */
  config?: DispatchConfig;
  configPath?: string;
  /** Replaces the LocalExecutor built from config. */
  executor?: Executor;
  table?: CommandTable;
}

/** Build the registry for the default samtools command table from configuration. */
export function createSamtools(options: CreateSamtoolsOptions = {}): CommandRegistry {
  const config = options.config ?? loadConfig(options.configPath).config;
  const executor =
    options.executor ??
    new LocalExecutor({ binary: config.samtools.binary, cwd: config.samtools.cwd ?? undefined });

  return CommandRegistry.fromTable(options.table ?? DEFAULT_COMMAND_TABLE, {
    executor,
    benignPrefixes: resolveBenignPrefixes(config.diagnostics.benign_prefixes, config.diagnostics.replace_defaults),
  });
}
