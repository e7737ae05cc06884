import type { ParserBinding } from '../types/command.js';

/**
 * True when every required option appears verbatim in the call's arguments.
 * An empty requirement is always satisfied.
 */
export function optionsSatisfied(
  required: ReadonlySet<string> | readonly string[],
  args: readonly string[],
): boolean {
  const supplied = new Set(args);
  for (const option of required) {
    if (!supplied.has(option)) return false;
  }
  return true;
}

/** First binding, in registration order, whose required options are all present. */
export function selectParser<T>(
  bindings: readonly ParserBinding<T>[],
  args: readonly string[],
): ParserBinding<T> | undefined {
  return bindings.find((binding) => optionsSatisfied(binding.requiredOptions, args));
}

/** Convenience constructor used by command tables. */
export function bindParser<T>(
  requiredOptions: readonly string[],
  transform: ParserBinding<T>['transform'],
): ParserBinding<T> {
  return Object.freeze({ requiredOptions: new Set(requiredOptions), transform });
}
