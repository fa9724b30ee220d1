import type { Logger } from '../logger/types.js';
import { CacheError } from './errors.js';
import { FileRangeCache } from './file-range-cache.js';
import { MemoryRangeCache } from './memory-range-cache.js';
import { CACHE_TYPES, RangeCacheConfigSchema } from './schemas.js';
import type { Clock, RangeCacheStore } from './types.js';

export interface RangeCacheDeps {
    clock?: Clock;
    logger?: Logger;
}

/**
 * Create the snapshot store for one provider based on configuration.
 *
 * @param config - Cache configuration with a 'type' discriminator
 * @throws CdnscopeRuntimeError if validation fails or the type is unknown
 *
 * @example
 * ```typescript
 * const store = createRangeCache({ type: 'file', directory: '/var/cache/cdnscope' }, 'fastly');
 * ```
 */
export function createRangeCache(
    config: unknown,
    provider: string,
    deps: RangeCacheDeps = {}
): RangeCacheStore {
    const parsed = RangeCacheConfigSchema.safeParse(config);
    if (!parsed.success) {
        throw CacheError.invalidConfig(parsed.error.message);
    }

    const validated = parsed.data;
    switch (validated.type) {
        case 'file':
            return new FileRangeCache({
                provider,
                directory: validated.directory,
                ttlSeconds: validated.ttlSeconds,
                clock: deps.clock,
                logger: deps.logger,
            });
        case 'in-memory':
            return new MemoryRangeCache({
                provider,
                ttlSeconds: validated.ttlSeconds,
                clock: deps.clock,
            });
        default: {
            const unknownConfig: { type: string } = validated;
            throw CacheError.unknownType(unknownConfig.type, CACHE_TYPES);
        }
    }
}
