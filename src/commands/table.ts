// Toolkit subcommands exposed as callables. This table is the only place commands are declared:
// adding one means adding an entry, never a new code path.
import type { CommandTable } from '../types/command.js';
import { bindParser } from '../dispatch/matching.js';
import { orText, parseDepth, parseFlagstat, parseIdxstats } from '../parsers/index.js';

export const DEFAULT_COMMAND_TABLE = {
  // documented subcommands
  view: { identifier: 'view' },
  sort: { identifier: 'sort' },
  // Column count varies with -s/-O/--output-extra, so text pileup is returned as is; see parsePileup.
  mpileup: { identifier: 'mpileup' },
  depth: { identifier: 'depth', parsers: [bindParser([], orText(parseDepth))] },
  faidx: { identifier: 'faidx' },
  tview: { identifier: 'tview' },
  index: { identifier: 'index' },
  idxstats: { identifier: 'idxstats', parsers: [bindParser([], orText(parseIdxstats))] },
  fixmate: { identifier: 'fixmate' },
  flagstat: { identifier: 'flagstat', parsers: [bindParser([], orText(parseFlagstat))] },
  calmd: { identifier: 'calmd' },
  merge: { identifier: 'merge' },
  rmdup: { identifier: 'rmdup' },
  reheader: { identifier: 'reheader' },
  cat: { identifier: 'cat' },
  targetcut: { identifier: 'targetcut' },
  phase: { identifier: 'phase' },
  // others; `import` is reserved in most callers' languages, hence the public name
  samimport: { identifier: 'import' },
  bam2fq: { identifier: 'bam2fq' },
} satisfies CommandTable;

export type DefaultCommandName = keyof typeof DEFAULT_COMMAND_TABLE;
