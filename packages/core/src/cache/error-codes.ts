/**
 * Cache-specific error codes
 * Read misses (not found, corrupt, stale) are results, not errors
 */
export enum CacheErrorCode {
    WRITE_FAILED = 'cache_write_failed',
    INVALID_CONFIG = 'cache_invalid_config',
    UNKNOWN_TYPE = 'cache_unknown_type',
}
