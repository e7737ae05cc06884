import { dataLines, parseFailed, toCount } from './common.js';

export interface PileupSample {
  depth: number;
  bases: string;
  qualities: string;
}

/** One reference position of a text pileup. */
export interface PileupRecord {
  reference: string;
  position: number;
  referenceBase: string;
  samples: PileupSample[];
}

/**
 * Parse the text pileup layout: reference, 1-based position, reference base,
 * then a depth/bases/qualities triple per input file.
 */
export function parsePileup(text: string): PileupRecord[] {
  return dataLines(text).map((line) => {
    const [reference, position, referenceBase, ...rest] = line.split('\t');
    if (referenceBase === undefined || rest.length === 0 || rest.length % 3 !== 0) {
      throw parseFailed('pileup', line, 'expected 3 leading columns followed by depth/bases/qualities triples');
    }
    const samples: PileupSample[] = [];
    for (let i = 0; i < rest.length; i += 3) {
      samples.push({ depth: toCount(rest[i], 'pileup', line), bases: rest[i + 1], qualities: rest[i + 2] });
    }
    return { reference, position: toCount(position, 'pileup', line), referenceBase, samples };
  });
}
