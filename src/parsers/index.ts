export { parseIdxstats } from './idxstats.js';
export type { IdxstatsRecord } from './idxstats.js';
export { parseFlagstat, categoryKey } from './flagstat.js';
export type { FlagstatReport, FlagstatCount } from './flagstat.js';
export { parseDepth } from './depth.js';
export type { DepthRecord } from './depth.js';
export { parsePileup } from './pileup.js';
export type { PileupRecord, PileupSample } from './pileup.js';
export { orText } from './common.js';
