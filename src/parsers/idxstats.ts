import { dataLines, parseFailed, toCount } from './common.js';

/** One reference sequence of an index statistics report. `*` stands for unplaced reads. */
export interface IdxstatsRecord {
  reference: string;
  length: number;
  mapped: number;
  unmapped: number;
}

export function parseIdxstats(text: string): IdxstatsRecord[] {
  return dataLines(text).map((line) => {
    const fields = line.split('\t');
    if (fields.length !== 4) {
      throw parseFailed('idxstats', line, `expected 4 tab-separated fields, got ${fields.length}`);
    }
    const [reference, length, mapped, unmapped] = fields;
    return {
      reference,
      length: toCount(length, 'idxstats', line),
      mapped: toCount(mapped, 'idxstats', line),
      unmapped: toCount(unmapped, 'idxstats', line),
    };
  });
}
