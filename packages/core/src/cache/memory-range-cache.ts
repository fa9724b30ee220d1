import { DEFAULT_CACHE_TTL_SECONDS } from './schemas.js';
import type { CacheSnapshot } from './schemas.js';
import { checkFreshness, createSnapshot } from './snapshot.js';
import { systemClock } from './types.js';
import type { CacheReadResult, Clock, RangeCacheStore } from './types.js';

export interface MemoryRangeCacheOptions {
    provider: string;
    ttlSeconds?: number;
    clock?: Clock;
}

/**
 * In-process snapshot store. Same freshness rules as the file store; data is lost when the
 * process exits.
 */
export class MemoryRangeCache implements RangeCacheStore {
    readonly location: string;
    private readonly ttlSeconds: number;
    private readonly clock: Clock;
    private snapshot: CacheSnapshot | null = null;

    constructor(options: MemoryRangeCacheOptions) {
        this.location = `memory:${options.provider}`;
        this.ttlSeconds = options.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
        this.clock = options.clock ?? systemClock;
    }

    async read(): Promise<CacheReadResult> {
        if (!this.snapshot) {
            return { ok: false, reason: 'not_found', ranges: [] };
        }
        return checkFreshness(this.snapshot, this.ttlSeconds, this.clock);
    }

    async write(ranges: readonly string[]): Promise<void> {
        this.snapshot = createSnapshot(ranges, this.clock);
    }

    /**
     * Seed a snapshot directly, e.g. one fetched at a chosen time
     */
    load(snapshot: CacheSnapshot): void {
        this.snapshot = { fetchedAt: snapshot.fetchedAt, ranges: [...snapshot.ranges] };
    }

    clear(): void {
        this.snapshot = null;
    }
}
