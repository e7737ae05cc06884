import { dataLines, parseFailed, toCount } from './common.js';

/** Per-position read depth, one entry in `depths` per input alignment file. */
export interface DepthRecord {
  reference: string;
  position: number;
  depths: number[];
}

/** Reads `depth` output; the `#CHROM` header written under `-H` is skipped. */
export function parseDepth(text: string): DepthRecord[] {
  return dataLines(text)
    .filter((line) => !line.startsWith('#'))
    .map((line) => {
      const [reference, position, ...depths] = line.split('\t');
      if (position === undefined || depths.length === 0) {
        throw parseFailed('depth', line, 'expected reference, position and at least one depth');
      }
      return {
        reference,
        position: toCount(position, 'depth', line),
        depths: depths.map((d) => toCount(d, 'depth', line)),
      };
    });
}
