// Stderr classification. The toolkit does not reliably signal failure through its
// exit status, so anything on stderr that is not a known notice counts as an error.
// The prefixes are matched verbatim against the toolkit's own log wording; if a
// toolkit release rewords a notice, extend the set through config rather than here.

/** Notices the toolkit writes to stderr during normal operation. */
export const DEFAULT_BENIGN_PREFIXES: readonly string[] = Object.freeze([
  '[sam_header_read2]',
  '[bam_index_load]',
  '[bam_sort_core]',
  '[samopen] SAM header is present',
]);

export interface ClassifiedDiagnostics {
  readonly benign: readonly string[];
  readonly suspicious: readonly string[];
}

export function isBenignLine(line: string, prefixes: readonly string[]): boolean {
  return prefixes.some((prefix) => line.startsWith(prefix));
}

/** Split stderr lines into benign notices and suspicious lines, preserving order within each. */
export function classifyDiagnostics(lines: readonly string[], prefixes: readonly string[]): ClassifiedDiagnostics {
  const benign: string[] = [];
  const suspicious: string[] = [];
  for (const line of lines) {
    (isBenignLine(line, prefixes) ? benign : suspicious).push(line);
  }
  return { benign, suspicious };
}

/**
 * Resolve the effective prefix set: configured prefixes are added to the defaults,
 * or used alone when `replaceDefaults` is set.
 */
export function resolveBenignPrefixes(extra: readonly string[] = [], replaceDefaults = false): readonly string[] {
  const base = replaceDefaults ? [] : DEFAULT_BENIGN_PREFIXES;
  return Object.freeze([...new Set([...base, ...extra])]);
}
