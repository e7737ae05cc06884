import { dataLines, parseFailed, toCount } from './common.js';

export interface FlagstatCount {
  passed: number;
  failed: number;
}

/**
 * Flag statistics keyed by category, e.g. `total`, `mapped`, `properlyPaired`,
 * `withMateMappedToADifferentChrMapQ5`.
 */
export type FlagstatReport = Record<string, FlagstatCount>;

const LINE = /^(\d+) \+ (\d+) (.+)$/;

export function parseFlagstat(text: string): FlagstatReport {
  const report: FlagstatReport = {};
  for (const line of dataLines(text)) {
    const match = LINE.exec(line);
    if (!match) throw parseFailed('flagstat', line, 'expected "<passed> + <failed> <category>"');
    const [, passed, failed, label] = match;
    report[categoryKey(label)] = {
      passed: toCount(passed, 'flagstat', line),
      failed: toCount(failed, 'flagstat', line),
    };
  }
  return report;
}

/**
 * "in total (QC-passed reads + QC-failed reads)" → "total";
 * "mapped (98.33% : N/A)" → "mapped";
 * "with mate mapped to a different chr (mapQ>=5)" → "withMateMappedToADifferentChrMapQ5".
 */
export function categoryKey(label: string): string {
  const stripped = label
    .replace(/\s*\([^)]*(%|QC-passed)[^)]*\)/g, '')
    .replace(/^in\s+/, '');
  const words = stripped.split(/[^A-Za-z0-9]+/).filter(Boolean);
  return words
    .map((word, i) => (i === 0 ? word.toLowerCase() : word.charAt(0).toUpperCase() + word.slice(1)))
    .join('');
}
