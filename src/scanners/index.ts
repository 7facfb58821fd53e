export { DuplicatesScanner, findDuplicates } from './duplicates.js';
export { CandidateIndex } from './candidate-index.js';
export { confirmDuplicates, partitionByDigest } from './confirm.js';
export type { ConfirmOptions, ConfirmResult } from './confirm.js';
export { rankGroups, wastedBytes } from './ranker.js';
export { DEFAULT_PREFIX_BYTES, prefixHash, fullHash, xxhashHasher } from './hasher.js';
export { assertValidRoot, countFiles, walkFiles, toRelativePath } from './walker.js';
export type { WalkOptions } from './walker.js';
export { runWithConcurrency } from './pool.js';
export { InvalidRootError, FileReadError, errorMessage } from './errors.js';
export type * from '../types.js';
