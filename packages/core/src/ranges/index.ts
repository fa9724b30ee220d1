export { normalizeLines, splitLines } from './normalize.js';
export { entryContains, findMatchingEntry, parseTarget } from './match.js';
export type { IPAddress, TargetAddress } from './match.js';
