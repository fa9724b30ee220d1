import { createRangeCache } from './cache/factory.js';
import type { Clock, RangeCacheStore } from './cache/types.js';
import { validateConfig } from './config/loader.js';
import type { CdnscopeConfig } from './config/schemas.js';
import { LookupEngine } from './engine/lookup-engine.js';
import type { LookupMatch, ProviderFailure } from './engine/lookup-engine.js';
import { errorMessage } from './errors/CdnscopeRuntimeError.js';
import { createLogger } from './logger/factory.js';
import type { Logger } from './logger/types.js';
import { CdnscopeLogComponent } from './logger/types.js';
import { createBuiltinSources } from './providers/builtin.js';
import { CachedRangeSource } from './providers/cached-source.js';
import { ProviderError } from './providers/errors.js';
import { ProviderRegistry } from './providers/registry.js';
import type { RangeSource } from './providers/types.js';

export interface CdnscopeDeps {
    /** Range sources to register; defaults to the built-in providers */
    sources?: RangeSource[];
    /** Replaces the logger built from config */
    logger?: Logger;
    clock?: Clock;
    /** Replaces the configured snapshot store, per provider */
    cacheFactory?: (provider: string) => RangeCacheStore;
    onProviderError?: (failure: ProviderFailure) => void;
}

export interface WarmReport {
    warmed: string[];
    failed: Array<{ name: string; message: string }>;
}

/**
 * Public surface: membership lookups plus direct access to each provider's cached ranges.
 */
export class Cdnscope {
    constructor(
        private readonly registry: ProviderRegistry<CachedRangeSource>,
        private readonly engine: LookupEngine,
        private readonly logger: Logger
    ) {}

    /**
     * @returns the name of the provider whose published ranges contain `ip`, or null
     */
    async lookup(ip: string): Promise<string | null> {
        const match = await this.engine.locate(ip);
        return match?.provider ?? null;
    }

    /**
     * Like lookup(), but also reports the range entry that matched
     */
    locate(ip: string): Promise<LookupMatch | null> {
        return this.engine.locate(ip);
    }

    /**
     * @throws CdnscopeRuntimeError (provider_not_found)
     */
    get(name: string): CachedRangeSource {
        return this.registry.get(name);
    }

    /**
     * Cache-or-live ranges for one provider.
     * @throws CdnscopeRuntimeError (provider_not_found or provider_fetch_failed)
     */
    async fetch(provider: string | CachedRangeSource): Promise<string[]> {
        const handle = typeof provider === 'string' ? this.registry.get(provider) : provider;
        return handle.fetchWithCache();
    }

    /**
     * Best-effort: fill every provider's cache, collecting failures instead of throwing
     */
    async warmAll(): Promise<WarmReport> {
        const entries = Array.from(this.registry.all());
        const outcomes = await Promise.allSettled(entries.map(([, provider]) => provider.fetchWithCache()));

        const report: WarmReport = { warmed: [], failed: [] };
        outcomes.forEach((outcome, index) => {
            const name = entries[index]?.[0] ?? `#${index}`;
            if (outcome.status === 'fulfilled') {
                report.warmed.push(name);
            } else {
                const message = errorMessage(outcome.reason);
                this.logger.warn(`Could not warm ${name}: ${message}`);
                report.failed.push({ name, message });
            }
        });
        return report;
    }

    providers(): string[] {
        return this.registry.names();
    }

    async destroy(): Promise<void> {
        await this.logger.destroy();
    }
}

function selectSources(sources: RangeSource[], names: string[] | undefined): RangeSource[] {
    if (!names) {
        return sources;
    }
    const available = sources.map((source) => source.name);
    return names.map((name) => {
        const source = sources.find((candidate) => candidate.name === name);
        if (!source) {
            throw ProviderError.notFound(name, available);
        }
        return source;
    });
}

/**
 * Build a ready-to-query instance: validate config, register one cached source per provider
 * and seal the registry.
 *
 * @throws CdnscopeValidationError for invalid config
 * @throws CdnscopeRuntimeError when `providers` names an unavailable source
 *
 * @example
 * ```typescript
 * const cdnscope = createCdnscope({ cache: { type: 'file', directory: '/tmp/cdnscope' } });
 * await cdnscope.lookup('104.16.1.1'); // 'cloudflare'
 * ```
 */
export function createCdnscope(config: unknown = {}, deps: CdnscopeDeps = {}): Cdnscope {
    const validated: CdnscopeConfig = validateConfig(config);
    const logger = deps.logger ?? createLogger({ config: validated.logger });
    const registryLogger = logger.createChild(CdnscopeLogComponent.REGISTRY);

    const sources = selectSources(deps.sources ?? createBuiltinSources(), validated.providers);
    const cacheFor =
        deps.cacheFactory ??
        ((provider: string) =>
            createRangeCache(validated.cache, provider, { clock: deps.clock, logger }));

    const registry = new ProviderRegistry<CachedRangeSource>();
    for (const source of sources) {
        registry.register(
            source.name,
            new CachedRangeSource({ source, cache: cacheFor(source.name), logger })
        );
    }
    registry.seal();
    registryLogger.debug(`Registered ${registry.size} providers`, { providers: registry.names() });

    const engine = new LookupEngine({
        registry,
        logger,
        providerTimeoutMs: validated.lookup.providerTimeoutMs,
        queryTimeoutMs: validated.lookup.queryTimeoutMs,
        onProviderError: deps.onProviderError,
    });

    return new Cdnscope(registry, engine, logger);
}
