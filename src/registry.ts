import type { CommandSpec, CommandTable, InvokeOptions } from './types/command.js';
import { CommandDispatcher, type DispatcherDeps } from './dispatch/dispatcher.js';
import { DispatchError, DispatchErrorCode } from './errors.js';
import { logger } from './logger.js';

/** A registered subcommand as a plain function: `samtools.view('-c', 'in.bam')`. */
export interface CommandFunction {
  (...args: string[]): Promise<unknown>;
  withOptions(options: InvokeOptions, ...args: string[]): Promise<unknown>;
  usage(): Promise<string>;
  getMessages(): readonly string[];
  readonly dispatcher: CommandDispatcher<unknown>;
}

export type CommandNamespace = Readonly<Record<string, CommandFunction>>;

/**
 * Command Registry — one dispatcher per declared subcommand, built once and
 * immutable afterwards. Callers look commands up by public name.
 */
export class CommandRegistry {
  private readonly dispatchers = new Map<string, CommandDispatcher<unknown>>();

  constructor(specs: readonly CommandSpec<unknown>[], deps: DispatcherDeps) {
    for (const spec of specs) {
      if (this.dispatchers.has(spec.publicName)) {
        throw new DispatchError(DispatchErrorCode.DUPLICATE_COMMAND, `Duplicate command name: ${spec.publicName}`, {
          name: spec.publicName,
        });
      }
      this.dispatchers.set(spec.publicName, new CommandDispatcher(Object.freeze({ ...spec }), deps));
    }
    logger.debug({ commandCount: this.dispatchers.size }, 'Command registry built');
  }

  static fromTable(table: CommandTable, deps: DispatcherDeps): CommandRegistry {
    const specs = Object.entries(table).map(([publicName, entry]) => ({
      publicName,
      identifier: entry.identifier,
      parsers: entry.parsers ?? [],
    }));
    return new CommandRegistry(specs, deps);
  }

  get(name: string): CommandDispatcher<unknown> | undefined {
    return this.dispatchers.get(name);
  }

  require(name: string): CommandDispatcher<unknown> {
    const dispatcher = this.dispatchers.get(name);
    if (!dispatcher) {
      throw new DispatchError(DispatchErrorCode.UNKNOWN_COMMAND, `Unknown command: ${name}`, { name });
    }
    return dispatcher;
  }

  has(name: string): boolean {
    return this.dispatchers.has(name);
  }

  names(): string[] {
    return [...this.dispatchers.keys()];
  }

  get size(): number {
    return this.dispatchers.size;
  }

  /** Frozen object exposing every command as a callable under its public name. */
  namespace(): CommandNamespace {
    const entries = [...this.dispatchers].map(([name, dispatcher]) => [name, toFunction(dispatcher)] as const);
    return Object.freeze(Object.fromEntries(entries));
  }
}

function toFunction(dispatcher: CommandDispatcher<unknown>): CommandFunction {
  const call = (...args: string[]): Promise<unknown> => dispatcher.invoke(args);
  return Object.assign(call, {
    withOptions: (options: InvokeOptions, ...args: string[]) => dispatcher.invoke(args, options),
    usage: () => dispatcher.usage(),
    getMessages: () => dispatcher.getMessages(),
    dispatcher,
  });
}
