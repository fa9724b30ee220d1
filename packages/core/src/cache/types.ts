/**
 * Why a snapshot could not be trusted
 */
export type CacheMissReason = 'not_found' | 'corrupt' | 'stale';

/**
 * Outcome of reading a provider's snapshot.
 * On a miss, `ranges` holds whatever could be decoded and must not be trusted.
 */
export type CacheReadResult =
    | { ok: true; ranges: string[]; fetchedAt: number }
    | { ok: false; reason: CacheMissReason; ranges: string[]; detail?: string };

/**
 * Snapshot storage for a single provider's range list
 */
export interface RangeCacheStore {
    /** Where the snapshot lives, for logs and diagnostics */
    readonly location: string;

    read(): Promise<CacheReadResult>;

    /**
     * Persist `{ fetchedAt: now, ranges }`, replacing any previous snapshot
     * @throws CdnscopeRuntimeError (cache_write_failed)
     */
    write(ranges: readonly string[]): Promise<void>;
}

/** Milliseconds since epoch */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
