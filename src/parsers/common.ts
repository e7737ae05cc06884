import { DispatchError, DispatchErrorCode, isDispatchError } from '../errors.js';

/** Non-empty lines of a tabular output, trailing carriage returns removed. */
export function dataLines(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.replace(/\r$/, ''))
    .filter((line) => line.length > 0);
}

export function parseFailed(parser: string, line: string, reason: string): DispatchError {
  return new DispatchError(DispatchErrorCode.PARSE_FAILED, `${parser}: ${reason}: ${JSON.stringify(line)}`, {
    parser,
    line,
  });
}

/** Parse a non-negative decimal integer field, rejecting anything else. */
export function toCount(field: string, parser: string, line: string): number {
  if (!/^\d+$/.test(field)) {
    throw parseFailed(parser, line, `expected an integer, got ${JSON.stringify(field)}`);
  }
  return Number(field);
}

/**
 * Wrap a reader so output in a layout it does not recognise (another `-O` format,
 * extra columns from a flag) comes back as the original text instead of failing.
 */
export function orText<T>(parse: (text: string) => T): (text: string) => T | string {
  return (text) => {
    try {
      return parse(text);
    } catch (err) {
      if (isDispatchError(err, DispatchErrorCode.PARSE_FAILED)) return text;
      throw err;
    }
  };
}
