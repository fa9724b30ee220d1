import { ProviderError } from './errors.js';
import type { RangeProvider } from './types.js';

const PROVIDER_NAME_PATTERN = /^[a-z0-9][a-z0-9_-]*$/i;

/**
 * Name-keyed set of providers, built once at startup and then sealed.
 *
 * The registry is passed explicitly to whatever needs it; there is no process-wide
 * instance. Once sealed it is read-only, so concurrent queries can read it without
 * coordination.
 *
 * @example
 * ```typescript
 * const registry = new ProviderRegistry();
 * registry.register('fastly', cachedFastly);
 * registry.seal();
 * const fastly = registry.get('fastly');
 * ```
 */
export class ProviderRegistry<TProvider extends RangeProvider = RangeProvider> {
    private readonly providers = new Map<string, TProvider>();
    private sealed = false;

    /**
     * @throws CdnscopeRuntimeError if the name is invalid or taken, or the registry is sealed
     */
    register(name: string, provider: TProvider): void {
        if (this.sealed) {
            throw ProviderError.registrySealed(name);
        }
        if (!PROVIDER_NAME_PATTERN.test(name)) {
            throw ProviderError.invalidName(name);
        }
        if (this.providers.has(name)) {
            throw ProviderError.alreadyRegistered(name);
        }
        this.providers.set(name, provider);
    }

    /**
     * Make the registry read-only. Idempotent.
     */
    seal(): this {
        this.sealed = true;
        return this;
    }

    isSealed(): boolean {
        return this.sealed;
    }

    /**
     * @throws CdnscopeRuntimeError (provider_not_found) for an unregistered name
     */
    get(name: string): TProvider {
        const provider = this.providers.get(name);
        if (!provider) {
            throw ProviderError.notFound(name, this.names());
        }
        return provider;
    }

    has(name: string): boolean {
        return this.providers.has(name);
    }

    /**
     * Every provider keyed by name, in registration order
     */
    all(): ReadonlyMap<string, TProvider> {
        return this.providers;
    }

    names(): string[] {
        return Array.from(this.providers.keys());
    }

    get size(): number {
        return this.providers.size;
    }
}
