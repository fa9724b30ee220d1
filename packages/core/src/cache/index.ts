/**
 * Range Cache Module
 *
 * Per-provider snapshots of published range lists, trusted for a fixed freshness window.
 *
 * ## Built-in stores
 * - `file`: one JSON file per provider (default, under the home directory)
 * - `in-memory`: process-local, for tests and short-lived runs
 */

export { createRangeCache } from './factory.js';
export type { RangeCacheDeps } from './factory.js';
export { FileRangeCache, snapshotFileName } from './file-range-cache.js';
export type { FileRangeCacheOptions } from './file-range-cache.js';
export { MemoryRangeCache } from './memory-range-cache.js';
export type { MemoryRangeCacheOptions } from './memory-range-cache.js';
export { checkFreshness, decodeSnapshot, toEpochSeconds } from './snapshot.js';
export { systemClock } from './types.js';
export type { CacheMissReason, CacheReadResult, Clock, RangeCacheStore } from './types.js';
export {
    CACHE_TYPES,
    CacheSnapshotSchema,
    DEFAULT_CACHE_TTL_SECONDS,
    FileRangeCacheSchema,
    InMemoryRangeCacheSchema,
    RangeCacheConfigSchema,
    type CacheSnapshot,
    type CacheType,
    type FileRangeCacheConfig,
    type InMemoryRangeCacheConfig,
    type RangeCacheConfig,
    type RangeCacheConfigInput,
} from './schemas.js';
export { CacheError } from './errors.js';
export { CacheErrorCode } from './error-codes.js';
