import type { CacheReadResult, RangeCacheStore } from '../cache/types.js';
import { errorMessage } from '../errors/CdnscopeRuntimeError.js';
import type { Logger } from '../logger/types.js';
import { CdnscopeLogComponent } from '../logger/types.js';
import type { RangeFetchOptions, RangeProvider, RangeSource } from './types.js';

export interface CachedRangeSourceOptions {
    source: RangeSource;
    cache: RangeCacheStore;
    logger: Logger;
}

/**
 * Puts a provider's snapshot in front of its live fetch.
 *
 * A fresh, non-empty snapshot is returned without touching the network. Anything else
 * (missing, corrupt, stale or empty) leads to exactly one live fetch; a non-empty result is
 * written back. Stale data is never served, even when the live fetch fails.
 */
export class CachedRangeSource implements RangeProvider {
    readonly name: string;
    readonly source: RangeSource;
    readonly cache: RangeCacheStore;
    private readonly logger: Logger;

    constructor(options: CachedRangeSourceOptions) {
        this.name = options.source.name;
        this.source = options.source;
        this.cache = options.cache;
        this.logger = options.logger.createChild(CdnscopeLogComponent.PROVIDER);
    }

    /**
     * @throws CdnscopeRuntimeError (provider_fetch_failed) when the cache is unusable and the
     * live fetch fails
     */
    async fetchWithCache(options: RangeFetchOptions = {}): Promise<string[]> {
        const cached = await this.readCache();
        if (cached.ok && cached.ranges.length > 0) {
            this.logger.silly(`Serving ${cached.ranges.length} cached ranges for ${this.name}`, {
                fetchedAt: cached.fetchedAt,
            });
            return cached.ranges;
        }

        this.logger.debug(`Cache miss for ${this.name}, fetching live ranges`, {
            reason: cached.ok ? 'empty' : cached.reason,
            ...(!cached.ok && cached.detail !== undefined && { detail: cached.detail }),
            location: this.cache.location,
        });

        const ranges = await this.source.fetch(options);

        if (ranges.length > 0) {
            try {
                await this.cache.write(ranges);
            } catch (error) {
                // The live data is still good; the next call simply fetches again
                this.logger.warn(`Could not cache ranges for ${this.name}: ${errorMessage(error)}`, {
                    location: this.cache.location,
                });
            }
        }

        return ranges;
    }

    private async readCache(): Promise<CacheReadResult> {
        try {
            return await this.cache.read();
        } catch (error) {
            return { ok: false, reason: 'corrupt', ranges: [], detail: errorMessage(error) };
        }
    }
}
